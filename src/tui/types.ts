import type { Position } from "../position/position.js";

/** One line of the positions table. */
export interface PositionRow {
	readonly position: Position;
	readonly monitored: boolean;
	readonly triggered: boolean;
}

export interface RenderOptions {
	/** Emit ANSI colors. Off by default so output can go to files and pipes. */
	readonly color?: boolean;
}
