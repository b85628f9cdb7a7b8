import path from "path";

import type { ReadingField, RefreshParameters, WindowMinutes, ZoneFilter } from "./types";
import { READING_FIELDS, WINDOW_MINUTES } from "./types";
import { CodedError, ErrorCode } from "./errors";
import { DEFAULT_COASTAL_REGIONS, parseZoneFilter } from "./routes/analysis/ZoneClassifier";
import { DEFAULT_ALERT_LIMIT } from "./routes/analysis/AlertRanker";
import { DEFAULT_REFERENCE_TEMPERATURE } from "./routes/analysis/advisories";

/** The range of anomaly thresholds a deployment may configure. */
export const CONFIG_THRESHOLD_BOUNDS = { min: 1.5, max: 4.0 } as const;

/** Describes why a threshold is outside the configurable range, or returns null when it is inside. */
export function thresholdProblem( threshold: number ): string | null {
	return threshold >= CONFIG_THRESHOLD_BOUNDS.min && threshold <= CONFIG_THRESHOLD_BOUNDS.max ? null :
		`must be between ${ CONFIG_THRESHOLD_BOUNDS.min } and ${ CONFIG_THRESHOLD_BOUNDS.max }`;
}

/**
 * @throws CodedError with InvalidParameter if the threshold is outside the configurable range.
 */
export function validateConfiguredThreshold( threshold: number ): void {
	const problem = thresholdProblem( threshold );
	if ( problem ) {
		throw new CodedError( ErrorCode.InvalidParameter, `Anomaly threshold ${ problem } (got ${ threshold })` );
	}
}

export interface AppConfig {
	host: string | undefined;
	port: number;
	parameters: RefreshParameters;
	refreshIntervalMs: number;
	retryBackoffMs: number;
	coastalRegions: readonly string[];
	referenceTemperature: number;
	displayTimezone: string;
	/** Directory for persisted observations, or undefined when persistence is off. */
	persistenceDir: string | undefined;
}

type Env = Record<string, string | undefined>;

/** Reads settings, collecting every error instead of stopping at the first. */
class ConfigReader {
	public readonly errors: string[] = [];

	public constructor( private readonly env: Env ) {}

	public text( name: string, fallback: string ): string {
		const value = this.env[ name ]?.trim();
		return value ? value : fallback;
	}

	public number( name: string, fallback: number, check: ( value: number ) => string | null ): number {
		const raw = this.env[ name ]?.trim();
		if ( !raw ) {
			return fallback;
		}
		const value = Number( raw );
		if ( !Number.isFinite( value ) ) {
			this.errors.push( `${ name } must be a number (got '${ raw }')` );
			return fallback;
		}
		const problem = check( value );
		if ( problem ) {
			this.errors.push( `${ name } ${ problem } (got ${ value })` );
			return fallback;
		}
		return value;
	}
}

function positive( value: number ): string | null {
	return value > 0 ? null : "must be positive";
}

function positiveInteger( value: number ): string | null {
	return Number.isInteger( value ) && value > 0 ? null : "must be a positive integer";
}

function isWindowMinutes( value: number ): value is WindowMinutes {
	return WINDOW_MINUTES.some( minutes => minutes === value );
}

function isReadingField( value: string ): value is ReadingField {
	return READING_FIELDS.some( field => field === value );
}

function isTimezone( name: string ): boolean {
	try {
		new Intl.DateTimeFormat( "en-US", { timeZone: name } );
		return true;
	} catch {
		return false;
	}
}

/**
 * Reads the service configuration from environment variables.
 * @throws CodedError with InvalidParameter listing every invalid setting. Values are never clamped.
 */
export function loadConfig( env: Env = process.env ): AppConfig {
	const reader = new ConfigReader( env );

	const port = reader.number( "PORT", 3000, value =>
		Number.isInteger( value ) && value >= 0 && value <= 65535 ? null : "must be a port number" );

	const windowValue = reader.number( "WINDOW_MINUTES", 60, value =>
		isWindowMinutes( value ) ? null : `must be one of ${ WINDOW_MINUTES.join( ", " ) }` );
	const windowMinutes: WindowMinutes = isWindowMinutes( windowValue ) ? windowValue : 60;

	let zones: ZoneFilter = [];
	try {
		zones = parseZoneFilter( reader.text( "ZONE_FILTER", "all" ) );
	} catch ( err ) {
		reader.errors.push( `ZONE_FILTER: ${ err instanceof Error ? err.message : String( err ) }` );
	}

	const fieldName = reader.text( "ANOMALY_FIELD", "temperature" );
	let anomalyField: ReadingField = "temperature";
	if ( isReadingField( fieldName ) ) {
		anomalyField = fieldName;
	} else {
		reader.errors.push( `ANOMALY_FIELD must be one of ${ READING_FIELDS.join( ", " ) } (got '${ fieldName }')` );
	}

	const anomalyThreshold = reader.number( "ANOMALY_THRESHOLD", 2.5, thresholdProblem );
	const alertLimit = reader.number( "ALERT_LIMIT", DEFAULT_ALERT_LIMIT, positiveInteger );
	const refreshSeconds = reader.number( "REFRESH_INTERVAL_SECONDS", 30, positive );
	const retrySeconds = reader.number( "RETRY_BACKOFF_SECONDS", 5, positive );
	const referenceTemperature = reader.number( "REFERENCE_TEMPERATURE", DEFAULT_REFERENCE_TEMPERATURE, () => null );

	const coastalText = env.COASTAL_REGIONS?.trim();
	const coastalRegions = coastalText ?
		coastalText.split( "," ).map( region => region.trim() ).filter( region => region.length > 0 ) :
		DEFAULT_COASTAL_REGIONS;

	const displayTimezone = reader.text( "DISPLAY_TIMEZONE", "America/Bogota" );
	if ( !isTimezone( displayTimezone ) ) {
		reader.errors.push( `DISPLAY_TIMEZONE is not a known timezone (got '${ displayTimezone }')` );
	}

	if ( reader.errors.length > 0 ) {
		throw new CodedError( ErrorCode.InvalidParameter, `Invalid configuration: ${ reader.errors.join( "; " ) }` );
	}

	return {
		host: env.HOST?.trim() || undefined,
		port,
		parameters: { windowMinutes, zones, anomalyField, anomalyThreshold, alertLimit },
		refreshIntervalMs: refreshSeconds * 1000,
		retryBackoffMs: retrySeconds * 1000,
		coastalRegions,
		referenceTemperature,
		displayTimezone,
		persistenceDir: env.LOCAL_PERSISTENCE ?
			reader.text( "PERSISTENCE_LOCATION", path.join( __dirname, "..", "data" ) ) :
			undefined
	};
}
