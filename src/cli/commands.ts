/**
 * CLI command handlers. Each takes a CommandContext so the entry point owns
 * process concerns (env, stdout, signals) and the handlers stay testable.
 */

import { writeFile } from "node:fs/promises";
import { BotEventBus } from "../events/event-bus.js";
import { DryRunLiquidator } from "../execution/dry-run-liquidator.js";
import { InFlightGuard } from "../execution/in-flight-guard.js";
import { ChunkedLiquidator } from "../execution/liquidation-executor.js";
import type { Liquidator } from "../execution/types.js";
import { ClobClient } from "../lib/clob/client.js";
import {
	POLYGON_CHAIN_ID,
	connectPolymarket,
	connectPolymarketPublic,
} from "../lib/clob/polymarket-providers.js";
import type { ClobProviders } from "../lib/clob/types.js";
import type { Logger } from "../lib/logger/index.js";
import { MonitoringScheduler } from "../monitor/scheduler.js";
import type { SchedulerStats } from "../monitor/types.js";
import { attachLogSubscriber } from "../notify/log-subscriber.js";
import { TelegramNotifier } from "../notify/telegram.js";
import { FileLedger, readLedger } from "../persistence/file-ledger.js";
import { ledgerToCsv, summarizeLedger } from "../persistence/ledger-csv.js";
import { SelectionStore } from "../persistence/selection-store.js";
import { DataApiPositionProvider } from "../position/data-api-provider.js";
import type { PositionSnapshotProvider } from "../position/types.js";
import { SelectionMode, type StopLossConfig, effectiveSelectionMode } from "../shared/config.js";
import { ConfigError } from "../shared/errors.js";
import type { MarketTokenId } from "../shared/identifiers.js";
import { SystemClock } from "../shared/time.js";
import { evaluateTrigger } from "../trigger/evaluator.js";
import { filterMonitored } from "../trigger/selection.js";
import { renderCycleSummary, renderPositionsTable } from "../tui/renderer.js";
import type { SelectAction } from "./args.js";
import {
	type RunFlags,
	type RuntimeSettings,
	buildStopLossConfig,
	clobConfigFrom,
	describeConfig,
	requireAccount,
} from "./settings.js";

export interface CommandContext {
	readonly env: NodeJS.ProcessEnv;
	readonly settings: RuntimeSettings;
	readonly logger: Logger;
	/** Writes one block of user-facing output. */
	readonly out: (text: string) => void;
	/** Built on first use so commands that never fetch need no account. */
	readonly positions: () => PositionSnapshotProvider;
	/** Venue for the run; a dry run never asks for credentials. */
	readonly venue: (dryRun: boolean) => Promise<ClobProviders>;
	readonly color?: boolean;
}

/** @throws ConfigError when the account or Data API URL is missing */
export function dataApiProvider(
	settings: RuntimeSettings,
	logger: Logger,
): PositionSnapshotProvider {
	const provider = DataApiPositionProvider.create({
		baseUrl: settings.dataApiUrl,
		user: requireAccount(settings),
		logger,
	});
	if (!provider.ok) throw provider.error;
	return provider.value;
}

/**
 * A dry run only reads order books, so it connects without a wallet. A live
 * run derives API credentials from PRIVATE_KEY.
 * @throws AuthError when a live run has no usable PRIVATE_KEY
 */
export async function clobProviders(
	settings: RuntimeSettings,
	logger: Logger,
	dryRun: boolean,
): Promise<ClobProviders> {
	if (dryRun) {
		return connectPolymarketPublic(settings.clobHost, POLYGON_CHAIN_ID, logger);
	}
	const clob = clobConfigFrom(settings);
	return connectPolymarket({ ...clob, logger });
}

async function loadSelection(settings: RuntimeSettings): Promise<MarketTokenId[]> {
	const loaded = await new SelectionStore(settings.selectionFile).load();
	if (!loaded.ok) throw loaded.error;
	return loaded.value;
}

async function loadConfig(ctx: CommandContext, flags: RunFlags): Promise<StopLossConfig> {
	const selected = flags.all ? [] : await loadSelection(ctx.settings);
	const config = buildStopLossConfig(ctx.env, flags, selected);
	if (!config.ok) throw config.error;
	return config.value;
}

export async function showConfig(ctx: CommandContext): Promise<void> {
	const config = await loadConfig(ctx, { live: false, all: false });
	ctx.out(describeConfig(config, ctx.settings).join("\n"));
}

/** Prints the snapshot, marking what the stored selection monitors. */
export async function showPositions(ctx: CommandContext): Promise<void> {
	const config = await loadConfig(ctx, { live: false, all: false });
	const snapshot = await ctx.positions().fetchPositions(config.minPositionValue);
	if (!snapshot.ok) throw snapshot.error;

	const { positions, skipped } = snapshot.value;
	const monitored = new Set(filterMonitored(positions, config).monitored.map((p) => p.tokenId));
	const rows = positions.map((position) => ({
		position,
		monitored: monitored.has(position.tokenId),
		triggered: monitored.has(position.tokenId) && evaluateTrigger(position, config).triggered,
	}));
	ctx.out(renderPositionsTable(rows, config, { color: ctx.color ?? false }));
	if (skipped.length > 0) {
		ctx.out(`Skipped ${skipped.length} malformed position records`);
	}
}

export async function updateSelection(ctx: CommandContext, action: SelectAction): Promise<void> {
	const store = new SelectionStore(ctx.settings.selectionFile);
	switch (action.type) {
		case "clear":
			await store.clear();
			ctx.out("Selection cleared");
			return;
		case "ids":
			await store.save(action.tokenIds);
			ctx.out(`Selected ${action.tokenIds.length} positions`);
			return;
		case "all": {
			const config = await loadConfig(ctx, { live: false, all: true });
			const snapshot = await ctx.positions().fetchPositions(config.minPositionValue);
			if (!snapshot.ok) throw snapshot.error;
			const ids = snapshot.value.positions.map((p) => p.tokenId);
			await store.save(ids);
			ctx.out(`Selected ${ids.length} positions`);
			return;
		}
	}
}

export async function showLedger(ctx: CommandContext, csvPath: string | null): Promise<void> {
	const { records, corruptLines } = await readLedger(ctx.settings.ledgerFile);
	for (const line of corruptLines) {
		ctx.logger.warn(
			{ file: line.filePath, lineNumber: line.lineNumber, reason: line.reason },
			"Skipping corrupt ledger line",
		);
	}

	if (csvPath !== null) {
		await writeFile(csvPath, ledgerToCsv(records), "utf-8");
		ctx.out(`Exported ${records.length} executions to ${csvPath}`);
		return;
	}
	if (records.length === 0) {
		ctx.out(`No executions recorded in ${ctx.settings.ledgerFile}`);
		return;
	}
	const totals = summarizeLedger(records);
	ctx.out(
		[
			`Executions: ${totals.executions}`,
			`Successful: ${totals.successful}`,
			`Dry runs: ${totals.dryRuns}`,
			`Orders placed: ${totals.ordersPlaced}`,
			`Total size ordered: ${totals.totalSizeOrdered.toFixed(2)}`,
		].join("\n"),
	);
}

/**
 * Validates everything that could stop a live run before connecting, then
 * monitors until the signal aborts (or for one cycle with `--once`).
 * @throws ConfigError or AuthError on startup failure
 */
export async function runMonitor(
	ctx: CommandContext,
	flags: RunFlags & { readonly once: boolean },
	signal: AbortSignal,
): Promise<SchedulerStats> {
	const config = await loadConfig(ctx, flags);
	if (effectiveSelectionMode(config) === SelectionMode.None) {
		throw new ConfigError("No positions selected for monitoring", {
			hint: "Run stop-loss select <tokenId...>, or pass --all",
		});
	}
	const provider = ctx.positions();
	const client = new ClobClient(await ctx.venue(config.dryRun));
	const liquidator: Liquidator = config.dryRun
		? new DryRunLiquidator({ client, logger: ctx.logger })
		: new ChunkedLiquidator({ client, logger: ctx.logger });
	if (config.dryRun) {
		ctx.logger.warn("Dry run: no orders will be placed, pass --live to trade");
	}

	const bus = new BotEventBus((error, event) => {
		ctx.logger.error(
			{ event: event.type, error: error instanceof Error ? error.message : String(error) },
			"Event subscriber failed",
		);
	});
	attachLogSubscriber(bus, ctx.logger);
	const notifier = TelegramNotifier.fromSettings(
		ctx.settings.telegramBotToken?.reveal() ?? null,
		ctx.settings.telegramChatId,
		ctx.logger,
	);
	notifier?.attach(bus);

	const ledger = FileLedger.create({
		filePath: ctx.settings.ledgerFile,
		...(ctx.settings.ledgerMaxBytes !== null && {
			maxFileSizeBytes: ctx.settings.ledgerMaxBytes,
		}),
	});
	const scheduler = new MonitoringScheduler({
		config,
		provider,
		liquidator,
		ledger,
		bus,
		logger: ctx.logger,
		guard: InFlightGuard.create(SystemClock),
		onReport: (report) => {
			ctx.out(renderCycleSummary(report, config, SystemClock.now(), { color: ctx.color ?? false }));
		},
	});

	try {
		if (flags.once) {
			await scheduler.runOnce(signal);
		} else {
			await scheduler.run(signal);
		}
	} finally {
		await ledger.close();
		await notifier?.flush();
	}
	return scheduler.getStats();
}
