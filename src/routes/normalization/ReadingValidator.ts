import type { Reading, ValidationResult } from "../../types";

/** Plausible ranges for station measurements. Values outside are reported, not dropped. */
export const PLAUSIBLE_RANGES = {
	temperature: { min: -60, max: 60 },
	humidity: { min: 0, max: 100 },
	pressure: { min: 850, max: 1090 },
	windSpeed: { min: 0, max: 400 },
	precipitation: { min: 0, max: 500 }
} as const;

type RangedField = keyof typeof PLAUSIBLE_RANGES;

const RANGED_FIELDS: readonly RangedField[] = [ "temperature", "humidity", "pressure", "windSpeed", "precipitation" ];

/**
 * Checks a reading set for implausible values. The result never blocks a cycle: every finding is a warning, and
 * findings of the same kind are counted rather than listed one by one.
 */
export function validateReadings( readings: readonly Reading[] ): ValidationResult {
	const result: ValidationResult = {
		valid: true,
		errors: [],
		warnings: []
	};

	// Check 1: values outside their plausible range
	for ( const field of RANGED_FIELDS ) {
		const { min, max } = PLAUSIBLE_RANGES[ field ];
		const outliers = readings.filter( reading => {
			const value = reading[ field ];
			return value !== null && ( value < min || value > max );
		} );
		if ( outliers.length > 0 ) {
			result.warnings.push(
				`${ outliers.length } reading(s) with ${ field } outside [${ min }, ${ max }], ` +
				`e.g. station ${ outliers[ 0 ].stationId }: ${ outliers[ 0 ][ field ] }`
			);
		}
	}

	// Check 2: apparent temperature without an air temperature
	const feelsLikeOnly = readings.filter( reading => reading.temperature === null && reading.feelsLike !== null ).length;
	if ( feelsLikeOnly > 0 ) {
		result.warnings.push( `${ feelsLikeOnly } reading(s) with a feels-like value but no temperature` );
	}

	// Check 3: readings with no measurement at all
	const empty = readings.filter( reading =>
		reading.temperature === null && reading.feelsLike === null && reading.humidity === null &&
		reading.pressure === null && reading.windSpeed === null && reading.precipitation === null ).length;
	if ( empty > 0 ) {
		result.warnings.push( `${ empty } reading(s) without any measurement` );
	}

	return result;
}
