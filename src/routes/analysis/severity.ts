import type { Severity } from "../../types";

/** Display priority of a severity. Lower is more urgent; unknown severities sort after everything else. */
export function severityRank( severity: Severity ): number {
	switch ( severity ) {
		case "critical": return 1;
		case "high": return 2;
		case "medium": return 3;
		case "low": return 4;
		case "unknown": return 5;
	}
}

/**
 * Maps a producer's severity label to a Severity. "warning" and "caution" are the labels some stations use for high
 * and medium; anything unrecognised is "unknown".
 */
export function parseSeverity( label: string ): Severity {
	switch ( label.trim().toLowerCase() ) {
		case "critical":
			return "critical";
		case "high":
		case "warning":
			return "high";
		case "medium":
		case "caution":
			return "medium";
		case "low":
			return "low";
		default:
			return "unknown";
	}
}
