import { SelectionMode, type StopLossConfig, effectiveSelectionMode } from "../shared/config.js";
import type { MarketTokenId } from "../shared/identifiers.js";
import type { Position } from "../position/position.js";
import type { SelectionResult } from "./types.js";

const NOTHING: SelectionResult = { monitored: [], missingTokenIds: [] };

/**
 * Reduces a snapshot to the positions under monitoring.
 *
 * `none`, and `selected` with no ids, monitor nothing. A selected id missing
 * from the snapshot (closed, or below the minimum value) is reported in
 * `missingTokenIds` rather than treated as an error.
 */
export function filterMonitored(
	positions: readonly Position[],
	config: StopLossConfig,
): SelectionResult {
	switch (effectiveSelectionMode(config)) {
		case SelectionMode.None:
			return NOTHING;
		case SelectionMode.All:
			return { monitored: [...positions], missingTokenIds: [] };
		case SelectionMode.Selected: {
			const selected = config.selectedTokenIds;
			const monitored = positions.filter((p) => selected.has(p.tokenId));
			const present = new Set<MarketTokenId>(monitored.map((p) => p.tokenId));
			const missingTokenIds = [...selected].filter((id) => !present.has(id));
			return { monitored, missingTokenIds };
		}
	}
}
