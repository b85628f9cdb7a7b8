import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { loadConfig } from "../src/config";
import { DEFAULT_COASTAL_REGIONS } from "../src/routes/analysis/ZoneClassifier";
import { CodedError, ErrorCode } from "../src/errors";

function invalidConfig( ...fragments: string[] ): ( err: unknown ) => boolean {
	return err => err instanceof CodedError && err.errCode === ErrorCode.InvalidParameter &&
		fragments.every( fragment => err.message.includes( fragment ) );
}

describe( "loadConfig", () => {
	it( "applies defaults for an empty environment", () => {
		const config = loadConfig( {} );
		assert.deepEqual( config, {
			host: undefined,
			port: 3000,
			parameters: {
				windowMinutes: 60,
				zones: [],
				anomalyField: "temperature",
				anomalyThreshold: 2.5,
				alertLimit: 10
			},
			refreshIntervalMs: 30000,
			retryBackoffMs: 5000,
			coastalRegions: DEFAULT_COASTAL_REGIONS,
			referenceTemperature: 28,
			displayTimezone: "America/Bogota",
			persistenceDir: undefined
		} );
	} );

	it( "reads every setting", () => {
		const config = loadConfig( {
			HOST: "127.0.0.1",
			PORT: "8080",
			WINDOW_MINUTES: "15",
			ZONE_FILTER: "coastal",
			ANOMALY_FIELD: "humidity",
			ANOMALY_THRESHOLD: "1.5",
			REFRESH_INTERVAL_SECONDS: "10",
			RETRY_BACKOFF_SECONDS: "2.5",
			ALERT_LIMIT: "3",
			COASTAL_REGIONS: "Valle del Cauca, Chocó ,",
			REFERENCE_TEMPERATURE: "24",
			DISPLAY_TIMEZONE: "UTC",
			LOCAL_PERSISTENCE: "true",
			PERSISTENCE_LOCATION: "/var/lib/weather"
		} );

		assert.equal( config.host, "127.0.0.1" );
		assert.equal( config.port, 8080 );
		assert.deepEqual( config.parameters, {
			windowMinutes: 15,
			zones: [ "Coastal" ],
			anomalyField: "humidity",
			anomalyThreshold: 1.5,
			alertLimit: 3
		} );
		assert.equal( config.refreshIntervalMs, 10000 );
		assert.equal( config.retryBackoffMs, 2500 );
		assert.deepEqual( config.coastalRegions, [ "Valle del Cauca", "Chocó" ] );
		assert.equal( config.referenceTemperature, 24 );
		assert.equal( config.displayTimezone, "UTC" );
		assert.equal( config.persistenceDir, "/var/lib/weather" );
	} );

	it( "rejects out-of-range values instead of clamping them, listing every error", () => {
		assert.throws( () => loadConfig( { ANOMALY_THRESHOLD: "4.5", WINDOW_MINUTES: "45" } ), invalidConfig(
			"WINDOW_MINUTES must be one of 5, 15, 30, 60, 180, 360, 1440 (got 45)",
			"ANOMALY_THRESHOLD must be between 1.5 and 4 (got 4.5)"
		) );
	} );

	it( "rejects malformed numbers and unknown names", () => {
		assert.throws( () => loadConfig( { PORT: "http" } ), invalidConfig( "PORT must be a number (got 'http')" ) );
		assert.throws( () => loadConfig( { ALERT_LIMIT: "0" } ), invalidConfig( "ALERT_LIMIT must be a positive integer (got 0)" ) );
		assert.throws( () => loadConfig( { REFRESH_INTERVAL_SECONDS: "-1" } ), invalidConfig( "REFRESH_INTERVAL_SECONDS must be positive" ) );
		assert.throws( () => loadConfig( { ANOMALY_FIELD: "dewPoint" } ), invalidConfig( "ANOMALY_FIELD must be one of" ) );
		assert.throws( () => loadConfig( { ZONE_FILTER: "highlands" } ), invalidConfig( "ZONE_FILTER: Unknown zone 'highlands'" ) );
		assert.throws( () => loadConfig( { DISPLAY_TIMEZONE: "Mars/Olympus_Mons" } ), invalidConfig( "DISPLAY_TIMEZONE" ) );
	} );

	it( "accepts the threshold bounds themselves", () => {
		assert.equal( loadConfig( { ANOMALY_THRESHOLD: "4" } ).parameters.anomalyThreshold, 4 );
	} );
} );
