import { createApp } from "./app";
import { type AppConfig, loadConfig } from "./config";
import { toCodedError } from "./errors";
import { ZoneClassifier } from "./routes/analysis/ZoneClassifier";
import LocalReadingSource from "./routes/readingSources/local";
import { RefreshScheduler } from "./routes/scheduler/RefreshScheduler";

function readConfig(): AppConfig {
	try {
		return loadConfig();
	} catch ( err ) {
		console.error( "[Server]", toCodedError( err ).message );
		process.exit( 1 );
	}
}

const config = readConfig();

const classifier = new ZoneClassifier( config.coastalRegions );
const source = new LocalReadingSource( classifier, { persistenceDir: config.persistenceDir } );
const scheduler = new RefreshScheduler( {
	source,
	classifier,
	parameters: config.parameters,
	cadenceMs: config.refreshIntervalMs,
	retryBackoffMs: config.retryBackoffMs,
	referenceTemperature: config.referenceTemperature
} );

const app = createApp( { source, scheduler, displayTimezone: config.displayTimezone } );

const server = app.listen( config.port, config.host ?? "0.0.0.0", () => {
	console.log( `[Server] Listening on ${ config.host ?? "0.0.0.0" }:${ config.port }` );
	scheduler.start();
} );

function shutdown( signal: string ): void {
	console.log( `[Server] ${ signal } received, shutting down` );
	server.close();
	scheduler.stop()
		.then( () => source.close() )
		.then(
			() => process.exit( 0 ),
			err => {
				console.error( "[Server] Error during shutdown:", err );
				process.exit( 1 );
			}
		);
}

process.on( "SIGINT", () => shutdown( "SIGINT" ) );
process.on( "SIGTERM", () => shutdown( "SIGTERM" ) );
