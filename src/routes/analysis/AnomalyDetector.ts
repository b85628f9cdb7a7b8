import type { AnomalyReport, AnomalyResult, Reading, ReadingField, SeriesStats } from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import { EMPTY_WELFORD, isUsable, roundTo, welfordStdDev, welfordUpdate } from "./stats";

/** Thresholds accepted by the detector. Configuration applies a narrower range on top of this. */
export const THRESHOLD_BOUNDS = { min: 0, max: 5 } as const;

/** Below this many values the standard deviation is undefined and nothing is flagged. */
export const MIN_SAMPLE_SIZE = 2;

export const DEFAULT_TOP_ANOMALIES = 10;

export function validateThreshold( threshold: number ): void {
	if ( !Number.isFinite( threshold ) || threshold < THRESHOLD_BOUNDS.min || threshold > THRESHOLD_BOUNDS.max ) {
		throw new CodedError(
			ErrorCode.InvalidParameter,
			`Anomaly threshold must be within [${ THRESHOLD_BOUNDS.min }, ${ THRESHOLD_BOUNDS.max }] (got ${ threshold })`
		);
	}
}

/**
 * Computes the pooled statistics of one field over the whole sequence. Readings with a missing value are skipped.
 */
export function describeSeries( readings: readonly Reading[], field: ReadingField ): SeriesStats {
	let state = EMPTY_WELFORD;
	for ( const reading of readings ) {
		const value = reading[ field ];
		if ( isUsable( value ) ) {
			state = welfordUpdate( state, value );
		}
	}

	const stdDev = welfordStdDev( state );
	return {
		mean: state.mean,
		stdDev,
		sampleSize: state.n,
		degenerate: state.n < MIN_SAMPLE_SIZE || !( stdDev > 0 )
	};
}

/**
 * Scores every reading by its z-score over `field` and flags those beyond the threshold.
 *
 * A constant or single-value series is degenerate: every reading gets a z-score of 0 and none is flagged. Readings
 * whose field is missing are returned unflagged with a z-score of 0.
 *
 * @throws CodedError with InvalidParameter if the threshold is out of range.
 */
export function detect( readings: readonly Reading[], field: ReadingField, threshold: number ): AnomalyResult[] {
	validateThreshold( threshold );
	const stats = describeSeries( readings, field );

	return readings.map( reading => {
		const value = reading[ field ];
		if ( stats.degenerate || !isUsable( value ) ) {
			return { ...reading, zScore: 0, isAnomaly: false };
		}
		const zScore = ( value - stats.mean ) / stats.stdDev;
		return { ...reading, zScore, isAnomaly: Math.abs( zScore ) > threshold };
	} );
}

/** Orders results by descending |z|, the most recent first on ties. */
export function compareAnomalies( a: AnomalyResult, b: AnomalyResult ): number {
	return Math.abs( b.zScore ) - Math.abs( a.zScore ) || b.timestamp - a.timestamp;
}

/** The flagged readings, most extreme first. */
export function rankAnomalies( results: readonly AnomalyResult[], limit: number = DEFAULT_TOP_ANOMALIES ): AnomalyResult[] {
	return results.filter( result => result.isAnomaly ).sort( compareAnomalies ).slice( 0, Math.max( limit, 0 ) );
}

export function analyzeAnomalies(
	readings: readonly Reading[],
	field: ReadingField,
	threshold: number,
	topLimit: number = DEFAULT_TOP_ANOMALIES
): AnomalyReport {
	const results = detect( readings, field, threshold );
	const anomalyCount = results.filter( result => result.isAnomaly ).length;

	return {
		field,
		threshold,
		stats: describeSeries( readings, field ),
		results,
		top: rankAnomalies( results, topLimit ),
		anomalyCount,
		totalReadings: results.length,
		anomalyPct: results.length > 0 ? roundTo( anomalyCount / results.length * 100, 2 ) : 0
	};
}
