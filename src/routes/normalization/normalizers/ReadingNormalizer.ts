import { BaseNormalizer, NormalizationOutcome, isRawRecord } from "../BaseNormalizer";
import type { Reading } from "../../../types";

/** Readings are identified by station and timestamp. */
export function readingIdentity( reading: Reading ): string {
	return `${ reading.stationId }@${ reading.timestamp }`;
}

/**
 * Normalizer for station readings.
 *
 * Accepts the store's snake_case columns (`ts`, `station_id`, `feels_like`, ...) as well as camelCase request bodies.
 * A reading needs a usable timestamp and a station ID; every measurement is optional and becomes null when missing.
 */
export class ReadingNormalizer extends BaseNormalizer<Reading> {
	readonly name = "ReadingNormalizer";

	normalize( raw: unknown ): NormalizationOutcome<Reading> {
		const errors: string[] = [];
		const warnings: string[] = [];

		if ( !isRawRecord( raw ) ) {
			return { record: null, validation: { valid: false, errors: [ "Reading is not an object" ], warnings } };
		}

		const timestamp = this.parseTimestamp( this.pick( raw, "timestamp", "ts" ) );
		const stationId = this.parseText( this.pick( raw, "stationId", "station_id" ) );

		if ( timestamp === undefined ) {
			errors.push( "Missing or invalid timestamp" );
		}
		if ( stationId === undefined ) {
			errors.push( "Missing station ID" );
		}
		if ( timestamp === undefined || stationId === undefined ) {
			return { record: null, validation: { valid: false, errors, warnings } };
		}

		const region = this.parseText( this.pick( raw, "region" ) );
		if ( region === undefined ) {
			warnings.push( `Station ${ stationId } reported no region` );
		}

		const reading: Reading = {
			timestamp,
			stationId,
			locationId: this.parseText( this.pick( raw, "locationId", "location_id" ) ) ?? stationId,
			city: this.parseText( this.pick( raw, "city" ) ) ?? "",
			region: region ?? "",
			temperature: this.parseMeasurement( this.pick( raw, "temperature" ) ),
			feelsLike: this.parseMeasurement( this.pick( raw, "feelsLike", "feels_like" ) ),
			humidity: this.parseMeasurement( this.pick( raw, "humidity" ) ),
			pressure: this.parseMeasurement( this.pick( raw, "pressure" ) ),
			windSpeed: this.parseMeasurement( this.pick( raw, "windSpeed", "wind_speed" ) ),
			precipitation: this.parseMeasurement( this.pick( raw, "precipitation" ) ),
			status: this.parseText( this.pick( raw, "status" ) )?.toLowerCase() ?? "normal"
		};

		return { record: Object.freeze( reading ), validation: { valid: true, errors, warnings } };
	}

	public identify( reading: Reading ): string {
		return readingIdentity( reading );
	}
}
