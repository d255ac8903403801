export type { PositionRow, RenderOptions } from "./types.js";
export {
	NO_POSITIONS,
	describeMode,
	renderCycleSummary,
	renderPositionsTable,
	rowsFromReport,
} from "./renderer.js";
export { colorize, bold, pnlColor, RESET, GREEN, RED, YELLOW, CYAN } from "./ansi.js";
