import express from "express";
import fs from "fs";
import path from "path";
import { getUnixTime } from "date-fns";

import type { Alert, Reading, Window, ZoneFilter } from "../../types";
import { WINDOW_MINUTES } from "../../types";
import { ReadingSource } from "./ReadingSource";
import { ReadingNormalizer } from "../normalization/normalizers/ReadingNormalizer";
import { AlertNormalizer } from "../normalization/normalizers/AlertNormalizer";
import { BaseNormalizer, isRawRecord, type NormalizedBatch } from "../normalization/BaseNormalizer";
import { inWindow } from "../window";
import { ZoneClassifier } from "../analysis/ZoneClassifier";

// Data Retention Strategy:
// - In-memory queues keep the longest selectable window plus one hour
// - Fetches filter a copy; the queues are only trimmed on capture and save
// - With persistence enabled the queues are written to observations.json every 30 minutes and on close
const RETENTION_SECONDS = ( Math.max( ...WINDOW_MINUTES ) + 60 ) * 60;
const SAVE_INTERVAL_MS = 1000 * 60 * 30;

export interface LocalSourceOptions {
	/** Directory for observations.json. Persistence is disabled when absent. */
	persistenceDir?: string;
	saveIntervalMs?: number;
	/** Clock used for retention. */
	now?: () => Date;
}

export interface CaptureResult extends Omit<NormalizedBatch<unknown>, "records"> {
	accepted: number;
}

interface PersistedQueues {
	readings: unknown[];
	alerts: unknown[];
}

/**
 * A source backed by in-memory queues that stations push readings and alerts into.
 */
export default class LocalReadingSource extends ReadingSource {
	readonly name = "LocalSource";

	private readings = new Map<string, Reading>();
	private alerts = new Map<string, Alert>();
	private readonly readingNormalizer = new ReadingNormalizer();
	private readonly alertNormalizer = new AlertNormalizer();
	private readonly observationsPath: string | undefined;
	private readonly now: () => Date;
	private saveTimer: NodeJS.Timeout | undefined;

	public constructor( classifier: ZoneClassifier, options: LocalSourceOptions = {} ) {
		super( classifier );
		this.now = options.now ?? ( () => new Date() );
		this.observationsPath = options.persistenceDir ? path.join( options.persistenceDir, "observations.json" ) : undefined;

		if ( this.observationsPath ) {
			this.load( this.observationsPath );
			this.saveTimer = setInterval( () => this.save(), options.saveIntervalMs ?? SAVE_INTERVAL_MS );
			this.saveTimer.unref();
			console.log( `[${ this.name }] Persistence enabled, saving to ${ this.observationsPath }` );
		}
	}

	public captureReadings( items: readonly unknown[] ): CaptureResult {
		return this.capture( items, this.readingNormalizer, this.readings );
	}

	public captureAlerts( items: readonly unknown[] ): CaptureResult {
		return this.capture( items, this.alertNormalizer, this.alerts );
	}

	/** Marks an alert as no longer active. Returns false if no alert has that ID. */
	public resolveAlert( id: string ): boolean {
		const alert = this.alerts.get( id );
		if ( !alert ) {
			return false;
		}
		this.alerts.set( id, Object.freeze( { ...alert, status: "resolved" } ) );
		return true;
	}

	public get size(): { readings: number, alerts: number } {
		return { readings: this.readings.size, alerts: this.alerts.size };
	}

	protected async fetchReadingsInternal( window: Window, zones: ZoneFilter ): Promise<readonly Reading[]> {
		return Array.from( this.readings.values() )
			.filter( reading => inWindow( window, reading.timestamp ) && this.classifier.matches( reading.region, zones ) )
			.sort( ( a, b ) => a.timestamp - b.timestamp );
	}

	protected async fetchAlertsInternal( window: Window ): Promise<readonly Alert[]> {
		return Array.from( this.alerts.values() )
			.filter( alert => alert.status === "active" && inWindow( window, alert.detectedAt ) );
	}

	public async close(): Promise<void> {
		if ( this.saveTimer ) {
			clearInterval( this.saveTimer );
			this.saveTimer = undefined;
		}
		if ( this.observationsPath ) {
			this.save();
		}
	}

	private capture<T>( items: readonly unknown[], normalizer: BaseNormalizer<T>, queue: Map<string, T> ): CaptureResult {
		const batch = normalizer.normalizeAll( items, key => queue.has( key ) );
		for ( const record of batch.records ) {
			queue.set( normalizer.identify( record ), record );
		}
		this.trim();
		return { accepted: batch.records.length, duplicates: batch.duplicates, rejected: batch.rejected };
	}

	private trim(): number {
		const cutoff = getUnixTime( this.now() ) - RETENTION_SECONDS;
		let deleted = 0;
		for ( const [ key, reading ] of this.readings ) {
			if ( reading.timestamp <= cutoff ) {
				this.readings.delete( key );
				deleted++;
			}
		}
		for ( const [ key, alert ] of this.alerts ) {
			if ( alert.detectedAt <= cutoff ) {
				this.alerts.delete( key );
				deleted++;
			}
		}
		return deleted;
	}

	private load( file: string ): void {
		if ( !fs.existsSync( file ) ) {
			return;
		}
		try {
			const parsed: unknown = JSON.parse( fs.readFileSync( file, "utf8" ) );
			const persisted = toPersistedQueues( parsed );
			this.captureReadings( persisted.readings );
			this.captureAlerts( persisted.alerts );
			console.log( `[${ this.name }] Loaded ${ this.readings.size } readings and ${ this.alerts.size } alerts from ${ file }` );
		} catch ( err ) {
			console.error( `[${ this.name }] Error reading persisted observations from ${ file }.`, err );
			this.readings.clear();
			this.alerts.clear();
		}
	}

	private save(): void {
		const deleted = this.trim();
		if ( !this.observationsPath ) {
			return;
		}

		try {
			const dir = path.dirname( this.observationsPath );
			if ( !fs.existsSync( dir ) ) {
				fs.mkdirSync( dir, { recursive: true } );
			}
			const queues: PersistedQueues = {
				readings: Array.from( this.readings.values() ),
				alerts: Array.from( this.alerts.values() )
			};
			fs.writeFileSync( this.observationsPath, JSON.stringify( queues ), "utf8" );

			if ( deleted > 0 ) {
				console.log( `[${ this.name }] Trimmed ${ deleted } records older than the retention period.` );
			}
		} catch ( err ) {
			console.error( `[${ this.name }] Error saving observations to ${ this.observationsPath }.`, err );
		}
	}
}

function toPersistedQueues( value: unknown ): PersistedQueues {
	if ( !isRawRecord( value ) ) {
		return { readings: [], alerts: [] };
	}
	return {
		readings: Array.isArray( value.readings ) ? value.readings : [],
		alerts: Array.isArray( value.alerts ) ? value.alerts : []
	};
}

function bodyItems( body: unknown ): unknown[] {
	return Array.isArray( body ) ? body : [ body ];
}

function sendCaptureResult( res: express.Response, result: CaptureResult ): void {
	const status = result.accepted === 0 && result.rejected.length > 0 ? 400 : 200;
	res.status( status ).json( result );
}

/** Accepts one reading or an array of readings as a JSON body. */
export function captureReadings( source: LocalReadingSource ): express.RequestHandler {
	return function( req: express.Request, res: express.Response ) {
		sendCaptureResult( res, source.captureReadings( bodyItems( req.body ) ) );
	};
}

/** Accepts one alert or an array of alerts as a JSON body. */
export function captureAlerts( source: LocalReadingSource ): express.RequestHandler {
	return function( req: express.Request, res: express.Response ) {
		sendCaptureResult( res, source.captureAlerts( bodyItems( req.body ) ) );
	};
}

export function resolveAlert( source: LocalReadingSource ): express.RequestHandler {
	return function( req: express.Request, res: express.Response ) {
		if ( source.resolveAlert( req.params.id ) ) {
			res.status( 204 ).end();
		} else {
			res.status( 404 ).json( { error: `No alert with ID '${ req.params.id }'` } );
		}
	};
}
