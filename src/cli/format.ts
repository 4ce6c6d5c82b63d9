/**
 * Plain-text rendering of run reports and portfolio status for the terminal.
 */

import type { RunReport } from "../engine/check-orchestrator.js";
import type { LockState } from "../lock/types.js";
import { reservedUnits, unitCount } from "../position/position.js";
import type { ArchiveContents } from "../persistence/types.js";
import type { PortfolioSnapshot, Position } from "../position/types.js";
import type { ExposureReport, UtilisationLine } from "../risk/types.js";
import { Decimal } from "../shared/decimal.js";
import { toIso } from "../shared/time.js";

export function formatRunReport(report: RunReport): string[] {
	if (report.busy !== null) {
		const holder = report.busy.holder !== null ? ` by ${report.busy.holder.owner}` : "";
		return [`check busy: guard ${report.busy.reason}${holder}`];
	}

	const lines = [
		`check ${report.status}: ${report.symbols.length} symbol(s), ${report.positions.length} position(s), ${report.saved ? "saved" : "not saved"}`,
	];
	for (const symbol of report.symbols) {
		if (symbol.status === "processed") continue;
		lines.push(`  symbol ${symbol.symbol} ${symbol.status}: ${symbol.detail ?? "no detail"}`);
	}
	for (const p of report.positions) {
		const actions = p.actions.length > 0 ? `: ${p.actions.join("; ")}` : "";
		const skipped = p.skipped !== null ? ` [skipped: ${p.skipped}]` : "";
		lines.push(`  ${p.positionId} ${p.from} -> ${p.to}${actions}${skipped}`);
	}
	for (const v of report.violations) {
		lines.push(`  limit ${v.kind} ${v.scope}: ${v.reason}`);
	}
	for (const id of report.archived) {
		lines.push(`  archived ${id}`);
	}
	if (report.reclaimed !== null) {
		lines.push(`  reclaimed stale lock of ${report.reclaimed.previousOwner ?? "unknown owner"}`);
	}
	return lines;
}

export function formatPosition(p: Position): string {
	const units = `units ${unitCount(p)}/${p.maxUnits}`;
	const pending = reservedUnits(p) - unitCount(p);
	const last = p.lastPrice !== null ? ` last ${p.lastPrice.toString()}` : "";
	return [
		`${p.id} ${p.status}`,
		`${units}${pending > 0 ? ` (+${pending} pending)` : ""}`,
		`entry ${p.entryPrice.toString()} stop ${p.stopLoss.toString()}${last}`,
		`upnl ${p.unrealizedPnl.toString()}`,
	].join("  ");
}

function formatLine(line: UtilisationLine): string {
	const flag = line.ratio >= 1 ? " FULL" : "";
	return `  ${line.kind} ${line.scope}: ${line.used}/${line.limit}${flag}`;
}

export function formatStatus(
	snapshot: PortfolioSnapshot,
	exposure: ExposureReport,
	nowMs: number,
): string[] {
	const saved = snapshot.savedAtMs !== null ? toIso(snapshot.savedAtMs) : "never";
	const lines = [`${snapshot.positions.length} active position(s), saved ${saved}`];
	lines.push(...snapshot.positions.map((p) => `  ${formatPosition(p)}`));

	const near = new Set(exposure.nearLimit);
	lines.push("exposure:");
	for (const line of exposure.lines) {
		lines.push(near.has(line) ? `${formatLine(line)} (near limit)` : formatLine(line));
	}

	for (const [symbol, state] of Object.entries(snapshot.backoff)) {
		if (state.retryAfterMs <= nowMs) continue;
		lines.push(
			`backoff ${symbol}: ${state.failures} failure(s), retry after ${toIso(state.retryAfterMs)} (${state.lastError})`,
		);
	}
	return lines;
}

export function formatGuard(state: LockState): string {
	switch (state.state) {
		case "free":
			return "guard: free";
		case "held": {
			const { owner, pid, host, acquiredAt } = state.marker;
			return `guard: held by ${owner} (pid ${pid} on ${host}) since ${acquiredAt}`;
		}
		case "unreadable":
			return `guard: unreadable marker, ${Math.round(state.ageMs / 1000)}s old`;
	}
}

export function formatArchive(archive: ArchiveContents): string {
	const realized = Decimal.sum(archive.positions.map((p) => p.realizedPnl));
	const unreadable =
		archive.corruptLines.length > 0 ? `, ${archive.corruptLines.length} unreadable line(s)` : "";
	return `archive: ${archive.positions.length} position(s), realized ${realized.toString()}${unreadable}`;
}
