import type { KPISnapshot, SnapshotDeltas, TemperatureBand } from "../../types";
import { roundTo } from "./stats";

/** Long-run average temperature of the Caribbean coast, in Celsius. */
export const DEFAULT_REFERENCE_TEMPERATURE = 28;

const RECOMMENDATIONS: Readonly<Record<string, string>> = {
	extreme_heat: "Avoid sun exposure | Drink water constantly | Seek cool places",
	high_heat: "Reduce physical activity | Use sunscreen | Stay hydrated",
	heat_index_critical: "Do NOT stay outdoors | Remain indoors",
	heavy_rain: "Drive slower | Avoid flood-prone areas",
	strong_wind: "Secure loose objects | Drive with caution",
	low_pressure: "Stay informed | A storm may be approaching"
};

export const DEFAULT_RECOMMENDATION = "Abnormal conditions | Stay informed";

export function recommendationFor( alertType: string ): string {
	return Object.prototype.hasOwnProperty.call( RECOMMENDATIONS, alertType )
		? RECOMMENDATIONS[ alertType ]
		: DEFAULT_RECOMMENDATION;
}

export function temperatureBand( celsius: number ): TemperatureBand {
	if ( celsius >= 35 ) return "extreme";
	if ( celsius >= 30 ) return "hot";
	if ( celsius >= 25 ) return "warm";
	if ( celsius >= 20 ) return "mild";
	if ( celsius >= 15 ) return "cool";
	return "cold";
}

/**
 * Differences against the reference temperature and against the previous cycle. A side without readings yields null
 * rather than a difference against a 0 °C placeholder.
 */
export function computeDeltas(
	current: KPISnapshot,
	previous: KPISnapshot | null,
	referenceTemperature: number = DEFAULT_REFERENCE_TEMPERATURE
): SnapshotDeltas {
	const hasData = current.totalEvents > 0;

	let avgTempVsPrevious: number | null = null;
	if ( hasData && previous !== null && previous.totalEvents > 0 ) {
		avgTempVsPrevious = roundTo( current.avgTemp - previous.avgTemp, 1 );
	}

	return {
		avgTempVsReference: hasData ? roundTo( current.avgTemp - referenceTemperature, 1 ) : null,
		avgTempVsPrevious,
		totalEventsVsPrevious: previous !== null ? current.totalEvents - previous.totalEvents : null
	};
}
