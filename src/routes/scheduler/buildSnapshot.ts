import type { Alert, DashboardSnapshot, KPISnapshot, Reading, RefreshParameters, Window } from "../../types";
import { aggregate } from "../analysis/MetricsAggregator";
import { analyzeAnomalies } from "../analysis/AnomalyDetector";
import { AlertRanker } from "../analysis/AlertRanker";
import { ZoneClassifier } from "../analysis/ZoneClassifier";
import { compareZones, recentReadings, summarizeCities } from "../analysis/breakdowns";
import { computeDeltas } from "../analysis/advisories";

export interface SnapshotInput {
	cycleId: number;
	computedAt: number;
	parameters: RefreshParameters;
	window: Window;
	/** Readings and alerts of one fetch pair. */
	readings: readonly Reading[];
	alerts: readonly Alert[];
	previousKpis: KPISnapshot | null;
	classifier: ZoneClassifier;
	referenceTemperature: number;
}

/**
 * Runs every computation of a cycle over the same fetched data. Synchronous and free of I/O.
 */
export function buildSnapshot( input: SnapshotInput ): DashboardSnapshot {
	const { parameters, window, classifier } = input;

	// Sources filter by zone already; this keeps the invariant when one does not.
	const readings = input.readings.filter( reading => classifier.matches( reading.region, parameters.zones ) );
	const kpis = aggregate( readings, input.computedAt );

	return {
		cycleId: input.cycleId,
		computedAt: input.computedAt,
		parameters,
		window,
		kpis,
		deltas: computeDeltas( kpis, input.previousKpis, input.referenceTemperature ),
		anomalies: analyzeAnomalies( readings, parameters.anomalyField, parameters.anomalyThreshold ),
		alerts: new AlertRanker( classifier ).rank( input.alerts, window, parameters.zones, parameters.alertLimit ),
		cities: summarizeCities( readings, classifier ),
		zoneComparison: compareZones( readings, classifier ),
		recentReadings: recentReadings( readings ),
		readings
	};
}
