/**
 * MonitoringScheduler: the stop-loss loop.
 *
 * Each cycle fetches the account snapshot, narrows it to the monitored
 * positions, evaluates triggers and liquidates every triggered position in
 * turn. A failing cycle is reported and the loop carries on; only the
 * abort signal stops it.
 *
 * @example
 * ```ts
 * const scheduler = new MonitoringScheduler({ config, provider, liquidator, ledger, bus, logger });
 * await scheduler.run(controller.signal);
 * ```
 */

import type { BotEventBus } from "../events/event-bus.js";
import type { InFlightGuard } from "../execution/in-flight-guard.js";
import { summarizeExecution } from "../execution/summary.js";
import type { ExecutionResult, Liquidator } from "../execution/types.js";
import type { Logger } from "../lib/logger/index.js";
import type { Position } from "../position/position.js";
import type { PositionSnapshotProvider } from "../position/types.js";
import { type ExecutionLedger, toLedgerRecord } from "../persistence/types.js";
import { type StopLossConfig, effectiveSelectionMode } from "../shared/config.js";
import { type TradingError, classifyError } from "../shared/errors.js";
import {
	type Clock,
	Duration,
	type Sleep,
	SystemClock,
	sleep as realSleep,
} from "../shared/time.js";
import { describeReason, evaluateTrigger } from "../trigger/evaluator.js";
import { filterMonitored } from "../trigger/selection.js";
import type {
	CycleReport,
	LiquidationOutcome,
	SchedulerStats,
	TriggeredPosition,
} from "./types.js";

export interface MonitoringSchedulerDeps {
	readonly config: StopLossConfig;
	readonly provider: PositionSnapshotProvider;
	readonly liquidator: Liquidator;
	readonly ledger: ExecutionLedger;
	readonly bus: BotEventBus;
	readonly logger: Logger;
	readonly guard?: InFlightGuard;
	readonly clock?: Clock;
	readonly sleep?: Sleep;
	/** Called with every report, including skipped and failed cycles. */
	readonly onReport?: (report: CycleReport) => void;
}

interface MutableStats {
	cycles: number;
	failedCycles: number;
	skippedCycles: number;
	consecutiveErrors: number;
	triggers: number;
	liquidations: number;
	executionErrors: number;
	lastCycleAt: number | null;
}

export class MonitoringScheduler {
	private readonly config: StopLossConfig;
	private readonly provider: PositionSnapshotProvider;
	private readonly liquidator: Liquidator;
	private readonly ledger: ExecutionLedger;
	private readonly bus: BotEventBus;
	private readonly logger: Logger;
	private readonly guard: InFlightGuard | null;
	private readonly clock: Clock;
	private readonly sleep: Sleep;
	private readonly onReport: ((report: CycleReport) => void) | null;

	private cycleInProgress = false;
	private readonly stats: MutableStats = {
		cycles: 0,
		failedCycles: 0,
		skippedCycles: 0,
		consecutiveErrors: 0,
		triggers: 0,
		liquidations: 0,
		executionErrors: 0,
		lastCycleAt: null,
	};

	constructor(deps: MonitoringSchedulerDeps) {
		this.config = deps.config;
		this.provider = deps.provider;
		this.liquidator = deps.liquidator;
		this.ledger = deps.ledger;
		this.bus = deps.bus;
		this.logger = deps.logger.child({ module: "scheduler" });
		this.guard = deps.guard ?? null;
		this.clock = deps.clock ?? SystemClock;
		this.sleep = deps.sleep ?? realSleep;
		this.onReport = deps.onReport ?? null;
	}

	getStats(): SchedulerStats {
		return { ...this.stats };
	}

	/** Cycle → sleep → cycle until the signal aborts. */
	async run(signal: AbortSignal): Promise<void> {
		this.announce();
		while (!signal.aborted) {
			await this.runCycle(signal);
			if (signal.aborted) break;
			this.logger.debug(
				{ seconds: this.config.checkIntervalSeconds },
				"Waiting for next monitoring cycle",
			);
			await this.sleep(Duration.seconds(this.config.checkIntervalSeconds), signal);
		}
		this.logger.info({ cycles: this.stats.cycles }, "Monitoring stopped");
	}

	/** Announces the start like `run`, then runs a single cycle. */
	async runOnce(signal?: AbortSignal): Promise<CycleReport> {
		this.announce();
		return this.runCycle(signal);
	}

	/** One full cycle. A call made while another cycle runs is refused. */
	async runCycle(signal?: AbortSignal): Promise<CycleReport> {
		const startedAt = this.clock.now();
		if (this.cycleInProgress) {
			this.stats.skippedCycles += 1;
			this.logger.warn("Previous monitoring cycle still running, skipping");
			return this.publish(this.emptyReport(this.stats.cycles, "skipped", startedAt, null));
		}

		this.cycleInProgress = true;
		this.stats.cycles += 1;
		const cycle = this.stats.cycles;
		let report: CycleReport;
		try {
			report = await this.executeCycle(cycle, startedAt, signal);
			this.stats.consecutiveErrors = 0;
			this.bus.emit({
				type: "cycle_completed",
				timestamp: this.clock.now(),
				cycle,
				positions: report.positions.length,
				monitored: report.monitored.length,
				triggered: report.triggered.length,
				liquidated: report.outcomes.filter((o) => o.ok && o.result.success).length,
				durationMs: report.durationMs,
			});
		} catch (e: unknown) {
			const error = classifyError(e);
			this.stats.failedCycles += 1;
			this.stats.consecutiveErrors += 1;
			this.bus.emit({
				type: "cycle_error",
				timestamp: this.clock.now(),
				error: error.message,
				code: error.code,
				consecutiveErrors: this.stats.consecutiveErrors,
			});
			report = this.emptyReport(cycle, "failed", startedAt, error);
		} finally {
			this.stats.lastCycleAt = startedAt;
			this.cycleInProgress = false;
		}
		return this.publish(report);
	}

	private announce(): void {
		this.bus.emit({
			type: "bot_started",
			timestamp: this.clock.now(),
			stopLossPercentage: this.config.stopLossPercentage,
			stopLossPrice: this.config.stopLossPrice,
			checkIntervalSeconds: this.config.checkIntervalSeconds,
			dryRun: this.config.dryRun,
			selectionMode: effectiveSelectionMode(this.config),
			selectedCount: this.config.selectedTokenIds.size,
		});
	}

	private async executeCycle(
		cycle: number,
		startedAt: number,
		signal: AbortSignal | undefined,
	): Promise<CycleReport> {
		const log = this.logger.child({ cycle });
		const snapshot = await this.provider.fetchPositions(this.config.minPositionValue);
		if (!snapshot.ok) {
			throw snapshot.error;
		}
		const { positions, skipped } = snapshot.value;

		const selection = filterMonitored(positions, this.config);
		for (const tokenId of selection.missingTokenIds) {
			log.warn({ tokenId }, "Selected position not found in current portfolio");
		}

		const triggered: TriggeredPosition[] = [];
		for (const position of selection.monitored) {
			const decision = evaluateTrigger(position, this.config);
			if (decision.triggered) {
				triggered.push({ position, reasons: decision.reasons });
			}
		}
		log.info(
			{
				positions: positions.length,
				monitored: selection.monitored.length,
				triggered: triggered.length,
			},
			triggered.length > 0 ? "Stop loss triggered" : "No stop loss triggers",
		);

		const outcomes: LiquidationOutcome[] = [];
		for (const entry of triggered) {
			if (signal?.aborted) break;
			const outcome = await this.handleTrigger(entry, signal, log);
			if (outcome) outcomes.push(outcome);
		}

		return {
			cycle,
			status: "completed",
			ok: true,
			startedAt,
			durationMs: this.clock.now() - startedAt,
			positions,
			monitored: selection.monitored,
			triggered,
			outcomes,
			missingTokenIds: selection.missingTokenIds,
			skippedRecords: skipped.length,
			error: null,
		};
	}

	private async handleTrigger(
		entry: TriggeredPosition,
		signal: AbortSignal | undefined,
		log: Logger,
	): Promise<LiquidationOutcome | null> {
		const { position } = entry;
		this.stats.triggers += 1;
		this.bus.emit({
			type: "trigger_fired",
			timestamp: this.clock.now(),
			position: position.toSummary(),
			reasons: entry.reasons.map(describeReason),
		});

		if (this.guard && !this.guard.tryAcquire(position.tokenId)) {
			log.warn({ tokenId: position.tokenId }, "Liquidation already in flight, skipping");
			return null;
		}

		let result: ExecutionResult;
		try {
			result = await this.liquidator.liquidate(position, signal);
		} catch (e: unknown) {
			const error = classifyError(e);
			this.stats.executionErrors += 1;
			this.bus.emit({
				type: "execution_error",
				timestamp: this.clock.now(),
				position: position.toSummary(),
				error: error.message,
				code: error.code,
			});
			return { tokenId: position.tokenId, ok: false, error };
		} finally {
			this.guard?.release(position.tokenId);
		}

		if (result.success) this.stats.liquidations += 1;
		await this.record(position, result, log);
		this.bus.emit({
			type: "liquidation_executed",
			timestamp: this.clock.now(),
			position: position.toSummary(),
			result: summarizeExecution(result),
		});
		return { tokenId: position.tokenId, ok: true, result };
	}

	/** A ledger failure is logged; it never undoes or blocks a liquidation. */
	private async record(position: Position, result: ExecutionResult, log: Logger): Promise<void> {
		try {
			await this.ledger.append(toLedgerRecord(position, result, this.clock.now()));
		} catch (e: unknown) {
			const error: TradingError = classifyError(e);
			log.error(
				{ tokenId: position.tokenId, error: error.message },
				"Failed to append execution to ledger",
			);
		}
	}

	private emptyReport(
		cycle: number,
		status: "failed" | "skipped",
		startedAt: number,
		error: TradingError | null,
	): CycleReport {
		return {
			cycle,
			status,
			ok: false,
			startedAt,
			durationMs: this.clock.now() - startedAt,
			positions: [],
			monitored: [],
			triggered: [],
			outcomes: [],
			missingTokenIds: [],
			skippedRecords: 0,
			error,
		};
	}

	private publish(report: CycleReport): CycleReport {
		this.onReport?.(report);
		return report;
	}
}
