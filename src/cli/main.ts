#!/usr/bin/env node
import "dotenv/config";
import { runCli } from "./program.js";

runCli(process.argv.slice(2), {
	stdout: (line) => process.stdout.write(`${line}\n`),
	stderr: (line) => process.stderr.write(`${line}\n`),
	env: process.env,
	cwd: process.cwd(),
})
	.then((code) => {
		process.exitCode = code;
	})
	.catch((e: unknown) => {
		process.stderr.write(`turtle-engine: ${e instanceof Error ? e.message : String(e)}\n`);
		process.exitCode = 1;
	});
