import type { CitySummary, Reading, ZoneComparisonPoint } from "../../types";
import { ZONES } from "../../types";
import { isAlertStatus } from "./MetricsAggregator";
import { temperatureBand } from "./advisories";
import { meanOf, roundTo } from "./stats";
import { ZoneClassifier } from "./ZoneClassifier";

export const DEFAULT_RECENT_READINGS = 20;

function round1( value: number | null ): number | null {
	return value === null ? null : roundTo( value, 1 );
}

function groupBy<K, T>( items: readonly T[], keyOf: ( item: T ) => K ): Map<K, T[]> {
	const groups = new Map<K, T[]>();
	for ( const item of items ) {
		const key = keyOf( item );
		const group = groups.get( key );
		if ( group ) {
			group.push( item );
		} else {
			groups.set( key, [ item ] );
		}
	}
	return groups;
}

/** Per-city averages for the window, warmest city first. */
export function summarizeCities( readings: readonly Reading[], classifier: ZoneClassifier ): CitySummary[] {
	const groups = groupBy( readings, reading => `${ reading.city }\u0000${ reading.region }` );

	const summaries: CitySummary[] = [];
	for ( const group of groups.values() ) {
		const { city, region } = group[ 0 ];
		const avgTemp = round1( meanOf( group.map( r => r.temperature ) ) );
		summaries.push( {
			city,
			region,
			zone: classifier.classify( region ),
			avgTemp,
			avgFeelsLike: round1( meanOf( group.map( r => r.feelsLike ) ) ),
			avgHumidity: round1( meanOf( group.map( r => r.humidity ) ) ),
			avgWindSpeed: round1( meanOf( group.map( r => r.windSpeed ) ) ),
			alertCount: group.filter( r => isAlertStatus( r.status ) ).length,
			latestTs: group.reduce( ( latest, r ) => Math.max( latest, r.timestamp ), -Infinity ),
			band: avgTemp === null ? null : temperatureBand( avgTemp )
		} );
	}

	// Cities without a usable temperature go last.
	return summaries.sort( ( a, b ) =>
		( b.avgTemp ?? -Infinity ) - ( a.avgTemp ?? -Infinity ) || a.city.localeCompare( b.city ) );
}

/** Mean temperature and humidity per timestamp and zone, for the coastal vs interior comparison series. */
export function compareZones( readings: readonly Reading[], classifier: ZoneClassifier ): ZoneComparisonPoint[] {
	const points: ZoneComparisonPoint[] = [];
	const byTimestamp = groupBy( readings, reading => reading.timestamp );

	for ( const timestamp of Array.from( byTimestamp.keys() ).sort( ( a, b ) => a - b ) ) {
		const byZone = groupBy( byTimestamp.get( timestamp ) ?? [], reading => classifier.classify( reading.region ) );
		for ( const zone of ZONES ) {
			const group = byZone.get( zone );
			if ( !group ) continue;
			points.push( {
				timestamp,
				zone,
				avgTemp: meanOf( group.map( r => r.temperature ) ),
				avgHumidity: meanOf( group.map( r => r.humidity ) )
			} );
		}
	}

	return points;
}

/** The newest readings first. */
export function recentReadings( readings: readonly Reading[], count: number = DEFAULT_RECENT_READINGS ): Reading[] {
	return [ ...readings ].sort( ( a, b ) => b.timestamp - a.timestamp ).slice( 0, Math.max( count, 0 ) );
}
