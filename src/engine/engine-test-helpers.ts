/**
 * Doubles shared by the engine tests.
 */

import type { LockBusy, ReleaseOutcome, RunGuard, RunLock } from "../lock/types.js";
import type { EngineConfig, EngineConfigFile } from "../shared/config.js";
import { DEFAULT_ENGINE_CONFIG, mergeConfig } from "../shared/config.js";
import type { LockError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

/** Single-process stand-in for FileRunLock. */
export class FakeRunLock implements RunLock {
	holder: string | null = null;
	acquisitions = 0;
	releases = 0;

	async acquire(ownerId: string): Promise<Result<RunGuard, LockBusy | LockError>> {
		if (this.holder !== null) {
			const busy: LockBusy = { kind: "busy", reason: "held", holder: null, ageMs: 0 };
			return err(busy);
		}
		this.holder = ownerId;
		this.acquisitions++;
		return ok({ owner: ownerId, token: "test-token", acquiredAtMs: 0, path: "memory", reclaimed: null });
	}

	async release(guard: RunGuard): Promise<Result<ReleaseOutcome, LockError>> {
		if (this.holder !== guard.owner) return ok("not_owner");
		this.holder = null;
		this.releases++;
		return ok("released");
	}
}

export const TEST_GROUPS = { AAPL: "tech", MSFT: "tech", ES: "index", NQ: "index", GC: "metals" };

export function testConfig(overlay: EngineConfigFile = {}): EngineConfig {
	return mergeConfig(DEFAULT_ENGINE_CONFIG, {
		dataDir: "/tmp/turtle-test",
		correlationGroups: TEST_GROUPS,
		...overlay,
	});
}
