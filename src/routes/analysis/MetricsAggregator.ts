import type { KPISnapshot, Reading } from "../../types";
import { isUsable, roundTo } from "./stats";

/** Station statuses that count towards the active alert KPI. */
export const ALERT_STATUSES: readonly string[] = [ "alert", "warning", "critical" ];

export function isAlertStatus( status: string ): boolean {
	return ALERT_STATUSES.includes( status.trim().toLowerCase() );
}

/**
 * Reduces a reading set to the headline KPIs.
 *
 * Temperatures that are missing or not finite are left out of the temperature aggregates only; the reading is still
 * counted everywhere else. Temperature aggregates are 0 when nothing usable is left, so callers have to look at
 * `totalEvents` to tell an empty window from a reading of 0 °C.
 *
 * @param readings The readings of one window.
 * @param computedAt The Unix epoch seconds the snapshot is stamped with.
 */
export function aggregate( readings: readonly Reading[], computedAt: number ): KPISnapshot {
	const stations = new Set<string>();
	const locations = new Set<string>();
	let tempSum = 0, tempCount = 0;
	let maxTemp = -Infinity, minTemp = Infinity;
	let activeAlertCount = 0;
	let latestTs: number | null = null;

	for ( const reading of readings ) {
		stations.add( reading.stationId );
		locations.add( reading.locationId );

		if ( isUsable( reading.temperature ) ) {
			tempSum += reading.temperature;
			tempCount++;
			maxTemp = Math.max( maxTemp, reading.temperature );
			minTemp = Math.min( minTemp, reading.temperature );
		}

		if ( isAlertStatus( reading.status ) ) {
			activeAlertCount++;
		}

		if ( latestTs === null || reading.timestamp > latestTs ) {
			latestTs = reading.timestamp;
		}
	}

	return {
		totalEvents: readings.length,
		activeStations: stations.size,
		locations: locations.size,
		avgTemp: tempCount > 0 ? roundTo( tempSum / tempCount, 1 ) : 0,
		maxTemp: tempCount > 0 ? roundTo( maxTemp, 1 ) : 0,
		minTemp: tempCount > 0 ? roundTo( minTemp, 1 ) : 0,
		activeAlertCount,
		latestTs,
		computedAt
	};
}
