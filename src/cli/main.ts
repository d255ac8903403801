#!/usr/bin/env node
import * as dotenv from "dotenv";
import { createLogger } from "../lib/logger/index.js";
import { classifyError } from "../shared/errors.js";
import { USAGE, parseCommand } from "./args.js";
import {
	type CommandContext,
	clobProviders,
	dataApiProvider,
	runMonitor,
	showConfig,
	showLedger,
	showPositions,
	updateSelection,
} from "./commands.js";
import { loadRuntimeSettings } from "./settings.js";

async function main(argv: readonly string[]): Promise<void> {
	dotenv.config();
	const parsed = parseCommand(argv);
	if (!parsed.ok) throw parsed.error;
	const command = parsed.value;
	if (command.kind === "help") {
		process.stdout.write(`${USAGE}\n`);
		return;
	}

	const settings = loadRuntimeSettings(process.env);
	const logger = createLogger({
		level: settings.logLevel,
		...(settings.logFile !== null && { filePath: settings.logFile }),
	});
	const ctx: CommandContext = {
		env: process.env,
		settings,
		logger,
		out: (text) => process.stdout.write(`${text}\n`),
		positions: () => dataApiProvider(settings, logger),
		venue: (dryRun) => clobProviders(settings, logger, dryRun),
		color: process.stdout.isTTY === true,
	};

	switch (command.kind) {
		case "run": {
			const controller = new AbortController();
			const stop = (signal: NodeJS.Signals): void => {
				logger.info({ signal }, "Shutting down");
				controller.abort();
			};
			process.once("SIGINT", stop);
			process.once("SIGTERM", stop);
			try {
				const stats = await runMonitor(ctx, command, controller.signal);
				logger.info({ ...stats }, "Stop-loss monitor exited");
			} finally {
				process.off("SIGINT", stop);
				process.off("SIGTERM", stop);
			}
			return;
		}
		case "positions":
			return showPositions(ctx);
		case "select":
			return updateSelection(ctx, command.action);
		case "config":
			return showConfig(ctx);
		case "ledger":
			return showLedger(ctx, command.csvPath);
	}
}

main(process.argv.slice(2)).catch((e: unknown) => {
	const error = classifyError(e);
	process.stderr.write(`Error: ${error.message}\n`);
	if (error.hint !== undefined) process.stderr.write(`Hint: ${error.hint}\n`);
	process.exitCode = 1;
});
