import { afterEach, describe, it } from "node:test";
import assert from "node:assert/strict";

import { RefreshScheduler, parametersKey, type SchedulerOptions } from "../src/routes/scheduler/RefreshScheduler";
import { ReadingSource } from "../src/routes/readingSources/ReadingSource";
import { ZoneClassifier } from "../src/routes/analysis/ZoneClassifier";
import { ErrorCode, isCodedError } from "../src/errors";
import type { Alert, Reading } from "../src/types";
import { DEFAULT_PARAMETERS, NOW, T0, makeAlert, makeReading } from "./fixtures";

interface Gate {
	promise: Promise<void>;
	open: () => void;
}

function gate(): Gate {
	let open: () => void = () => undefined;
	const promise = new Promise<void>( resolve => {
		open = resolve;
	} );
	return { promise, open };
}

/** A source whose fetches can be held open or made to fail. */
class FakeSource extends ReadingSource {
	readonly name = "FakeSource";

	public readings: Reading[] = [];
	public alerts: Alert[] = [];
	public failure: Error | null = null;
	public hold: Gate | null = null;
	public fetches = 0;

	public constructor() {
		super( new ZoneClassifier() );
	}

	protected async fetchReadingsInternal(): Promise<readonly Reading[]> {
		this.fetches++;
		if ( this.hold ) {
			await this.hold.promise;
		}
		if ( this.failure ) {
			throw this.failure;
		}
		return this.readings;
	}

	protected async fetchAlertsInternal(): Promise<readonly Alert[]> {
		return this.alerts;
	}
}

async function waitFor( condition: () => boolean, timeoutMs = 2000 ): Promise<void> {
	const deadline = Date.now() + timeoutMs;
	while ( !condition() ) {
		if ( Date.now() > deadline ) {
			throw new Error( "Timed out waiting for condition" );
		}
		await new Promise( resolve => setTimeout( resolve, 5 ) );
	}
}

describe( "RefreshScheduler", () => {
	const schedulers: RefreshScheduler[] = [];
	let source: FakeSource;

	function createScheduler( options: Partial<SchedulerOptions> = {} ): RefreshScheduler {
		source = new FakeSource();
		source.readings = [
			makeReading( { stationId: "ST-1", timestamp: T0 - 120, temperature: 30 } ),
			makeReading( { stationId: "ST-2", timestamp: T0 - 60, temperature: 32, region: "Antioquia", city: "Medellín" } ),
			makeReading( { stationId: "ST-3", timestamp: T0 - 1800, temperature: 28 } )
		];
		source.alerts = [ makeAlert( { id: "A-1", detectedAt: T0 - 60 } ) ];

		const scheduler = new RefreshScheduler( {
			source,
			classifier: new ZoneClassifier(),
			parameters: DEFAULT_PARAMETERS,
			retryBackoffMs: 60000,
			clock: () => NOW,
			...options
		} );
		schedulers.push( scheduler );
		return scheduler;
	}

	afterEach( async () => {
		source.hold?.open();
		await Promise.all( schedulers.splice( 0 ).map( scheduler => scheduler.stop() ) );
	} );

	it( "publishes a snapshot computed from one fetch", async () => {
		const scheduler = createScheduler();
		const outcome = await scheduler.refresh();
		if ( outcome.status !== "published" ) {
			assert.fail( `expected a publication, got ${ outcome.status }` );
		}

		assert.equal( outcome.snapshot.cycleId, 1 );
		assert.equal( outcome.snapshot.computedAt, T0 );
		assert.deepEqual( outcome.snapshot.window, { start: T0 - 3600, end: T0, durationMinutes: 60 } );
		assert.equal( outcome.snapshot.kpis.totalEvents, 3 );
		assert.equal( outcome.snapshot.kpis.avgTemp, 30 );
		assert.deepEqual( outcome.snapshot.alerts.map( alert => alert.id ), [ "A-1" ] );
		assert.equal( scheduler.store.snapshot, outcome.snapshot );
		assert.equal( scheduler.getState(), "published" );
		assert.equal( scheduler.store.view( T0 ).status, "ok" );
	} );

	it( "computes deltas against the previously published snapshot", async () => {
		const scheduler = createScheduler();
		await scheduler.refresh();
		source.readings = source.readings.slice( 0, 2 );
		const outcome = await scheduler.refresh();
		if ( outcome.status !== "published" ) {
			assert.fail( `expected a publication, got ${ outcome.status }` );
		}

		assert.equal( outcome.snapshot.cycleId, 2 );
		assert.deepEqual( outcome.snapshot.deltas, { avgTempVsReference: 3, avgTempVsPrevious: 1, totalEventsVsPrevious: -1 } );
	} );

	it( "skips a trigger while a cycle for the same parameters is in flight", async () => {
		const scheduler = createScheduler();
		source.hold = gate();

		const first = scheduler.refresh();
		assert.equal( scheduler.getState(), "fetching" );
		assert.deepEqual( await scheduler.refresh(), { status: "skipped", reason: "a cycle is already in flight" } );

		source.hold.open();
		assert.equal( ( await first ).status, "published" );
		assert.equal( source.fetches, 1 );
	} );

	it( "keeps the last published snapshot when a fetch fails", async () => {
		const scheduler = createScheduler();
		const good = await scheduler.refresh();
		if ( good.status !== "published" ) {
			assert.fail( `expected a publication, got ${ good.status }` );
		}

		source.failure = new Error( "connection refused" );
		const outcome = await scheduler.refresh();
		if ( outcome.status !== "failed" ) {
			assert.fail( `expected a failure, got ${ outcome.status }` );
		}

		assert.equal( outcome.error.errCode, ErrorCode.SourceUnavailable );
		assert.equal( scheduler.getState(), "failed" );
		assert.deepEqual( scheduler.store.view( T0 ), {
			status: "failed",
			stale: true,
			snapshot: good.snapshot,
			lastError: { code: "SourceUnavailable", message: "connection refused" },
			consecutiveFailures: 1,
			lastAttemptAt: T0
		} );
	} );

	it( "retries a failed cycle after the backoff", async () => {
		const scheduler = createScheduler( { retryBackoffMs: 20 } );
		source.failure = new Error( "connection refused" );
		assert.equal( ( await scheduler.refresh() ).status, "failed" );

		source.failure = null;
		await waitFor( () => scheduler.store.snapshot !== null );

		assert.equal( source.fetches, 2 );
		assert.equal( scheduler.store.view( T0 ).status, "ok" );
		assert.equal( scheduler.store.view( T0 ).consecutiveFailures, 0 );
	} );

	it( "aborts the cycle in flight on stop without publishing", async () => {
		const scheduler = createScheduler();
		source.hold = gate();

		const pending = scheduler.refresh();
		await scheduler.stop();

		assert.deepEqual( await pending, { status: "aborted" } );
		assert.equal( scheduler.store.snapshot, null );
		assert.equal( scheduler.getState(), "cancelled" );
		assert.deepEqual( await scheduler.refresh(), { status: "skipped", reason: "scheduler stopped" } );
	} );

	it( "discards the cycle in flight when reconfigured", async () => {
		const scheduler = createScheduler();
		source.hold = gate();
		const stale = scheduler.refresh();

		source.hold = null;
		const outcome = await scheduler.reconfigure( { ...DEFAULT_PARAMETERS, windowMinutes: 15 } );
		if ( outcome.status !== "published" ) {
			assert.fail( `expected a publication, got ${ outcome.status }` );
		}

		assert.deepEqual( await stale, { status: "aborted" } );
		assert.equal( outcome.snapshot.cycleId, 2 );
		assert.equal( outcome.snapshot.window.durationMinutes, 15 );
		assert.equal( outcome.snapshot.kpis.totalEvents, 2 );
		assert.equal( scheduler.store.snapshot?.cycleId, 2 );
		assert.equal( scheduler.getParameters().windowMinutes, 15 );
	} );

	it( "rejects invalid parameters", () => {
		const scheduler = createScheduler();
		assert.throws( () => scheduler.reconfigure( { ...DEFAULT_PARAMETERS, anomalyThreshold: 7 } ),
			err => isCodedError( err, ErrorCode.InvalidParameter ) );
		assert.throws( () => scheduler.reconfigure( { ...DEFAULT_PARAMETERS, alertLimit: 0 } ),
			err => isCodedError( err, ErrorCode.InvalidParameter ) );
		assert.throws( () => createScheduler( { cadenceMs: 0 } ), err => isCodedError( err, ErrorCode.InvalidParameter ) );
		assert.equal( scheduler.getParameters(), DEFAULT_PARAMETERS );
	} );

	it( "runs a cycle on start and again on every tick", async () => {
		const scheduler = createScheduler( { cadenceMs: 20 } );
		scheduler.start();
		await waitFor( () => ( scheduler.store.snapshot?.cycleId ?? 0 ) >= 2 );
		assert.ok( source.fetches >= 2 );
	} );
} );

describe( "parametersKey", () => {
	it( "does not depend on the order of the zones", () => {
		assert.equal(
			parametersKey( { ...DEFAULT_PARAMETERS, zones: [ "Interior", "Coastal" ] } ),
			parametersKey( { ...DEFAULT_PARAMETERS, zones: [ "Coastal", "Interior" ] } )
		);
		assert.notEqual(
			parametersKey( DEFAULT_PARAMETERS ),
			parametersKey( { ...DEFAULT_PARAMETERS, anomalyThreshold: 3 } )
		);
	} );
} );
