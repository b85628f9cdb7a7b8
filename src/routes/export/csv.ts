import { stringify } from "csv-stringify/sync";
import { format } from "date-fns";
import { TZDate } from "@date-fns/tz";

import type { Reading } from "../../types";

export const CSV_COLUMNS = [
	{ key: "timestamp", header: "timestamp" },
	{ key: "stationId", header: "station_id" },
	{ key: "locationId", header: "location_id" },
	{ key: "city", header: "city" },
	{ key: "region", header: "region" },
	{ key: "temperature", header: "temperature" },
	{ key: "feelsLike", header: "feels_like" },
	{ key: "humidity", header: "humidity" },
	{ key: "pressure", header: "pressure" },
	{ key: "windSpeed", header: "wind_speed" },
	{ key: "precipitation", header: "precipitation" },
	{ key: "status", header: "status" }
] as const;

/**
 * Serializes readings as comma-separated text with a header row. Timestamps are ISO-8601 in UTC and missing
 * measurements are empty fields.
 */
export function readingsToCsv( readings: readonly Reading[] ): string {
	if ( readings.length === 0 ) {
		// An empty export still names its columns.
		return `${ CSV_COLUMNS.map( column => column.header ).join( "," ) }\n`;
	}

	const rows = readings.map( reading => ( {
		...reading,
		timestamp: new Date( reading.timestamp * 1000 ).toISOString()
	} ) );

	return stringify( rows, {
		header: true,
		columns: CSV_COLUMNS.map( column => ( { key: column.key, header: column.header } ) )
	} );
}

/** Download name of an export made at `now`, stamped in the display timezone. */
export function exportFileName( now: Date, timezone: string ): string {
	return `readings_${ format( new TZDate( now.getTime(), timezone ), "yyyyMMdd_HHmmss" ) }.csv`;
}
