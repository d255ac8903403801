import { parseArgs } from "node:util";
import { ConfigError } from "../shared/errors.js";
import { type MarketTokenId, marketTokenId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

export type Command =
	| { readonly kind: "run"; readonly once: boolean; readonly live: boolean; readonly all: boolean }
	| { readonly kind: "positions" }
	| { readonly kind: "select"; readonly action: SelectAction }
	| { readonly kind: "config" }
	| { readonly kind: "ledger"; readonly csvPath: string | null }
	| { readonly kind: "help" };

export type SelectAction =
	| { readonly type: "ids"; readonly tokenIds: readonly MarketTokenId[] }
	| { readonly type: "all" }
	| { readonly type: "clear" };

export const USAGE = `Usage: stop-loss <command> [options]

Commands:
  run [--once] [--live] [--all]   Monitor positions and liquidate on stop loss
  positions                       Print the current positions
  select <tokenId...>             Monitor only these positions
  select --all | --clear          Select every current position, or clear the selection
  config                          Print the effective configuration
  ledger [--csv <file>]           Summarize the execution ledger or export it as CSV

Options:
  --once    Run a single monitoring cycle and exit
  --live    Place real orders (default is a dry run)
  --all     Monitor every position regardless of the selection file`;

const OPTIONS = {
	once: { type: "boolean", default: false },
	live: { type: "boolean", default: false },
	all: { type: "boolean", default: false },
	clear: { type: "boolean", default: false },
	csv: { type: "string" },
	help: { type: "boolean", short: "h", default: false },
} as const;

function tokenize(argv: readonly string[]) {
	return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
}

/** Parses argv (without the node and script entries) into a Command. */
export function parseCommand(argv: readonly string[]): Result<Command, ConfigError> {
	let parsed: ReturnType<typeof tokenize>;
	try {
		parsed = tokenize(argv);
	} catch (e: unknown) {
		const message = e instanceof Error ? e.message : String(e);
		return err(new ConfigError(message, { hint: "Run stop-loss --help for usage" }));
	}

	const { values, positionals } = parsed;
	const [name, ...rest] = positionals;
	const flag = (value: boolean | undefined): boolean => value === true;
	if (flag(values.help) || name === undefined || name === "help") return ok({ kind: "help" });

	switch (name) {
		case "run":
			return ok({
				kind: "run",
				once: flag(values.once),
				live: flag(values.live),
				all: flag(values.all),
			});
		case "positions":
			return ok({ kind: "positions" });
		case "config":
			return ok({ kind: "config" });
		case "ledger":
			return ok({ kind: "ledger", csvPath: values.csv ?? null });
		case "select":
			return parseSelect(rest, flag(values.all), flag(values.clear));
		default:
			return err(
				new ConfigError(`Unknown command "${name}"`, { hint: "Run stop-loss --help for usage" }),
			);
	}
}

function parseSelect(
	ids: readonly string[],
	all: boolean,
	clear: boolean,
): Result<Command, ConfigError> {
	const chosen = [ids.length > 0, all, clear].filter(Boolean).length;
	if (chosen !== 1) {
		return err(
			new ConfigError("select takes token ids, --all or --clear (exactly one)", {
				hint: "Example: stop-loss select 7132...8841 5520...0193",
			}),
		);
	}
	if (all) return ok({ kind: "select", action: { type: "all" } });
	if (clear) return ok({ kind: "select", action: { type: "clear" } });
	return ok({ kind: "select", action: { type: "ids", tokenIds: ids.map(marketTokenId) } });
}
