import { afterEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "fs";
import os from "os";
import path from "path";

import LocalReadingSource from "../src/routes/readingSources/local";
import { ZoneClassifier } from "../src/routes/analysis/ZoneClassifier";
import { ErrorCode, isCodedError } from "../src/errors";
import { HOUR_WINDOW, NOW, T0 } from "./fixtures";

const clock = () => NOW;

function rawReading( stationId: string, timestamp: number, region = "Atlántico" ) {
	return { timestamp, station_id: stationId, city: "Barranquilla", region, temperature: 30 };
}

describe( "LocalReadingSource", () => {
	const sources: LocalReadingSource[] = [];

	function createSource( persistenceDir?: string ): LocalReadingSource {
		const source = new LocalReadingSource( new ZoneClassifier(), { now: clock, persistenceDir } );
		sources.push( source );
		return source;
	}

	afterEach( async () => {
		await Promise.all( sources.splice( 0 ).map( source => source.close() ) );
	} );

	it( "captures readings, counting duplicates and rejections", () => {
		const source = createSource();
		const result = source.captureReadings( [
			rawReading( "ST-1", T0 - 60 ),
			rawReading( "ST-1", T0 - 60 ),
			{ temperature: 30 }
		] );

		assert.deepEqual( result, {
			accepted: 1,
			duplicates: 1,
			rejected: [ { index: 2, errors: [ "Missing or invalid timestamp", "Missing station ID" ] } ]
		} );
		assert.deepEqual( source.size, { readings: 1, alerts: 0 } );
	} );

	it( "serves the readings of the window and zone", async () => {
		const source = createSource();
		source.captureReadings( [
			rawReading( "ST-1", T0 - 60 ),
			rawReading( "ST-2", T0 - 30, "Antioquia" ),
			rawReading( "ST-3", T0 - 3600 ),
			rawReading( "ST-4", T0 + 60 )
		] );

		const all = await source.fetchReadings( HOUR_WINDOW, [] );
		assert.deepEqual( all.map( reading => reading.stationId ), [ "ST-1", "ST-2" ] );

		const coastal = await source.fetchReadings( HOUR_WINDOW, [ "Coastal" ] );
		assert.deepEqual( coastal.map( reading => reading.stationId ), [ "ST-1" ] );
	} );

	it( "drops records older than the retention period", () => {
		const source = createSource();
		const result = source.captureReadings( [ rawReading( "ST-1", T0 - 90000 ), rawReading( "ST-2", T0 - 89999 ) ] );
		assert.equal( result.accepted, 2 );
		assert.deepEqual( source.size, { readings: 1, alerts: 0 } );
	} );

	it( "serves only active alerts and resolves them by ID", async () => {
		const source = createSource();
		source.captureAlerts( [
			{ id: "A-1", type: "heavy_rain", detectedAt: T0 - 60, severity: "high", region: "Magdalena" },
			{ id: "A-2", type: "strong_wind", detectedAt: T0 - 30, severity: "low", status: "resolved" }
		] );

		assert.deepEqual( ( await source.fetchAlerts( HOUR_WINDOW ) ).map( alert => alert.id ), [ "A-1" ] );
		assert.equal( source.resolveAlert( "A-1" ), true );
		assert.equal( source.resolveAlert( "A-9" ), false );
		assert.deepEqual( await source.fetchAlerts( HOUR_WINDOW ), [] );
	} );

	it( "refuses fetches whose signal has aborted", async () => {
		const source = createSource();
		const controller = new AbortController();
		controller.abort();
		await assert.rejects( source.fetchReadings( HOUR_WINDOW, [], controller.signal ),
			err => isCodedError( err, ErrorCode.Cancelled ) );
	} );

	it( "persists the queues on close and loads them on start", async () => {
		const dir = fs.mkdtempSync( path.join( os.tmpdir(), "weather-monitor-" ) );
		try {
			const first = createSource( dir );
			first.captureReadings( [ rawReading( "ST-1", T0 - 60 ), rawReading( "ST-2", T0 - 30 ) ] );
			first.captureAlerts( [ { id: "A-1", type: "heavy_rain", detectedAt: T0 - 60 } ] );
			await first.close();

			assert.equal( fs.existsSync( path.join( dir, "observations.json" ) ), true );

			const second = createSource( dir );
			assert.deepEqual( second.size, { readings: 2, alerts: 1 } );
			const readings = await second.fetchReadings( HOUR_WINDOW, [] );
			assert.deepEqual( readings.map( reading => reading.stationId ), [ "ST-1", "ST-2" ] );
		} finally {
			await Promise.all( sources.splice( 0 ).map( source => source.close() ) );
			fs.rmSync( dir, { recursive: true, force: true } );
		}
	} );
} );
