import type { Decimal } from "../shared/decimal.js";

export const RESET = "\x1b[0m";
export const GREEN = "\x1b[32m";
export const RED = "\x1b[31m";
export const YELLOW = "\x1b[33m";
export const CYAN = "\x1b[36m";
export const BOLD = "\x1b[1m";

export function colorize(text: string, color: string): string {
	return `${color}${text}${RESET}`;
}

export function bold(text: string): string {
	return `${BOLD}${text}${RESET}`;
}

/** Losses red, everything else green. */
export function pnlColor(value: Decimal): string {
	return value.isNegative() ? RED : GREEN;
}
