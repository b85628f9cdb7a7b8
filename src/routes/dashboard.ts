import express from "express";
import { getUnixTime } from "date-fns";

import type { DashboardSnapshot, RefreshParameters } from "../types";
import { READING_FIELDS, WINDOW_MINUTES } from "../types";
import { CodedError, ErrorCode, toCodedError } from "../errors";
import { validateConfiguredThreshold } from "../config";
import { isRawRecord } from "./normalization/BaseNormalizer";
import { parseZoneFilter } from "./analysis/ZoneClassifier";
import { exportFileName, readingsToCsv } from "./export/csv";
import { type CycleOutcome, RefreshScheduler, validateParameters } from "./scheduler/RefreshScheduler";
import type { SnapshotView } from "./scheduler/SnapshotStore";

export interface DashboardOptions {
	scheduler: RefreshScheduler;
	displayTimezone: string;
	clock?: () => Date;
}

/** The HTTP status an error is reported with. */
export function statusForError( err: CodedError ): number {
	switch ( err.errCode ) {
		case ErrorCode.InvalidParameter:
		case ErrorCode.MalformedRecord:
			return 400;
		default:
			return 500;
	}
}

export function sendError( res: express.Response, err: unknown ): void {
	const coded = toCodedError( err );
	if ( statusForError( coded ) === 500 ) {
		console.error( "[Dashboard] Request failed:", coded );
	}
	res.status( statusForError( coded ) ).json( { error: coded.message, code: ErrorCode[ coded.errCode ] } );
}

/** The view without the full reading set, which is only served through the CSV export. */
export function summarizeView( view: SnapshotView ) {
	const { snapshot, ...rest } = view;
	if ( !snapshot ) {
		return { ...rest, snapshot: null };
	}
	const { readings, anomalies, ...summary } = snapshot;
	const { results, ...anomalySummary } = anomalies;
	return { ...rest, snapshot: { ...summary, anomalies: anomalySummary } };
}

/**
 * Builds the parameters of a reconfiguration. Missing fields keep their current value; the threshold has to be
 * within the same range as the configured one.
 * @throws CodedError with InvalidParameter if a field is malformed or out of range.
 */
export function parseParameters( body: unknown, current: RefreshParameters ): RefreshParameters {
	if ( !isRawRecord( body ) ) {
		throw new CodedError( ErrorCode.InvalidParameter, "Expected a JSON object" );
	}

	const windowMinutes = body.windowMinutes ?? current.windowMinutes;
	const window = WINDOW_MINUTES.find( minutes => minutes === windowMinutes );
	if ( window === undefined ) {
		throw new CodedError( ErrorCode.InvalidParameter, `Window must be one of ${ WINDOW_MINUTES.join( ", " ) } minutes` );
	}

	const anomalyFieldName = body.anomalyField ?? current.anomalyField;
	const anomalyField = READING_FIELDS.find( field => field === anomalyFieldName );
	if ( anomalyField === undefined ) {
		throw new CodedError( ErrorCode.InvalidParameter, `Anomaly field must be one of ${ READING_FIELDS.join( ", " ) }` );
	}

	let zones = current.zones;
	if ( typeof body.zones === "string" ) {
		zones = parseZoneFilter( body.zones );
	} else if ( Array.isArray( body.zones ) ) {
		zones = parseZoneFilter( body.zones.map( String ).join( "," ) );
	} else if ( body.zones !== undefined ) {
		throw new CodedError( ErrorCode.InvalidParameter, "Zones must be a string or an array of strings" );
	}

	const parameters: RefreshParameters = {
		windowMinutes: window,
		zones,
		anomalyField,
		anomalyThreshold: numberOr( body.anomalyThreshold, current.anomalyThreshold, "anomalyThreshold" ),
		alertLimit: numberOr( body.alertLimit, current.alertLimit, "alertLimit" )
	};
	validateParameters( parameters );
	validateConfiguredThreshold( parameters.anomalyThreshold );
	return parameters;
}

function numberOr( value: unknown, fallback: number, name: string ): number {
	if ( value === undefined ) {
		return fallback;
	}
	if ( typeof value !== "number" ) {
		throw new CodedError( ErrorCode.InvalidParameter, `${ name } must be a number` );
	}
	return value;
}

/** Reports a cycle outcome with the HTTP status it maps to. */
export function describeOutcome( outcome: CycleOutcome ): { status: number, body: object } {
	switch ( outcome.status ) {
		case "published":
			return {
				status: 200,
				body: { status: outcome.status, cycleId: outcome.snapshot.cycleId, computedAt: outcome.snapshot.computedAt }
			};
		case "failed":
			return {
				status: statusForError( outcome.error ),
				body: { status: outcome.status, error: outcome.error.message, code: ErrorCode[ outcome.error.errCode ] }
			};
		case "skipped":
			return { status: 409, body: { status: outcome.status, reason: outcome.reason } };
		case "aborted":
			return { status: 409, body: { status: outcome.status } };
	}
}

/**
 * Serves the scheduler's published snapshot. Read endpoints report the snapshot status and staleness next to their
 * section; a failed refresh leaves the last published data in place.
 */
export function dashboardRouter( options: DashboardOptions ): express.Router {
	const { scheduler, displayTimezone } = options;
	const clock = options.clock ?? ( () => new Date() );
	const router = express.Router();

	function section<T>( pick: ( snapshot: DashboardSnapshot ) => T ): express.RequestHandler {
		return function( req: express.Request, res: express.Response ) {
			const { status, stale, lastError, snapshot } = scheduler.store.view( getUnixTime( clock() ) );
			res.json( { status, stale, lastError, data: snapshot ? pick( snapshot ) : null } );
		};
	}

	function sendOutcome( res: express.Response, promise: Promise<CycleOutcome> ): void {
		promise.then(
			outcome => {
				const { status, body } = describeOutcome( outcome );
				res.status( status ).json( body );
			},
			err => sendError( res, err )
		);
	}

	router.get( "/snapshot", function( req: express.Request, res: express.Response ) {
		res.json( summarizeView( scheduler.store.view( getUnixTime( clock() ) ) ) );
	} );
	router.get( "/kpis", section( snapshot => ( { window: snapshot.window, kpis: snapshot.kpis, deltas: snapshot.deltas } ) ) );
	router.get( "/alerts/active", section( snapshot => snapshot.alerts ) );
	router.get( "/anomalies", section( snapshot => {
		const { results, ...report } = snapshot.anomalies;
		return report;
	} ) );
	router.get( "/cities", section( snapshot => snapshot.cities ) );
	router.get( "/zones/comparison", section( snapshot => snapshot.zoneComparison ) );
	router.get( "/readings/recent", section( snapshot => snapshot.recentReadings ) );

	router.get( "/export.csv", function( req: express.Request, res: express.Response ) {
		const snapshot = scheduler.store.snapshot;
		if ( !snapshot ) {
			res.status( 503 ).json( { error: "No snapshot has been published yet" } );
			return;
		}
		res.attachment( exportFileName( clock(), displayTimezone ) );
		res.type( "text/csv" ).send( readingsToCsv( snapshot.readings ) );
	} );

	router.get( "/parameters", function( req: express.Request, res: express.Response ) {
		res.json( scheduler.getParameters() );
	} );

	router.put( "/parameters", function( req: express.Request, res: express.Response ) {
		let parameters: RefreshParameters;
		try {
			parameters = parseParameters( req.body, scheduler.getParameters() );
		} catch ( err ) {
			sendError( res, err );
			return;
		}
		sendOutcome( res, scheduler.reconfigure( parameters ) );
	} );

	router.post( "/refresh", function( req: express.Request, res: express.Response ) {
		sendOutcome( res, scheduler.refresh() );
	} );

	return router;
}
