import express from "express";

import { CodedError, ErrorCode } from "./errors";
import LocalReadingSource, { captureAlerts, captureReadings, resolveAlert } from "./routes/readingSources/local";
import { RefreshScheduler } from "./routes/scheduler/RefreshScheduler";
import { dashboardRouter, sendError } from "./routes/dashboard";

export interface AppOptions {
	source: LocalReadingSource;
	scheduler: RefreshScheduler;
	displayTimezone: string;
	clock?: () => Date;
}

/**
 * Builds the HTTP application: capture endpoints for stations, the dashboard read endpoints, the CSV export and the
 * refresh controls. Listening and the scheduler's lifecycle are left to the caller.
 */
export function createApp( options: AppOptions ): express.Express {
	const { source, scheduler, displayTimezone, clock } = options;
	const app = express();

	app.use( express.json( { limit: "1mb" } ) );

	app.post( "/readings", captureReadings( source ) );
	app.post( "/alerts", captureAlerts( source ) );
	app.post( "/alerts/:id/resolve", resolveAlert( source ) );
	app.use( dashboardRouter( { scheduler, displayTimezone, clock } ) );

	app.get( "/", function( req, res ) {
		res.send( "Weather stream monitor" );
	} );

	app.use( function( req, res ) {
		res.status( 404 ).json( { error: "Not found" } );
	} );

	app.use( function( err: unknown, req: express.Request, res: express.Response, next: express.NextFunction ) {
		if ( err instanceof SyntaxError ) {
			sendError( res, new CodedError( ErrorCode.MalformedRecord, `Malformed JSON body: ${ err.message }` ) );
			return;
		}
		sendError( res, err );
	} );

	return app;
}
