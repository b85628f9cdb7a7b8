import type { Alert, Reading, Window, ZoneFilter } from "../../types";
import { CodedError, ErrorCode, toCodedError } from "../../errors";
import { inWindow } from "../window";
import { ZoneClassifier } from "../analysis/ZoneClassifier";

/**
 * Rejects with a Cancelled CodedError as soon as the signal aborts, even if the wrapped operation ignores the signal.
 */
export function abortable<T>( promise: Promise<T>, signal: AbortSignal | undefined ): Promise<T> {
	if ( !signal ) {
		return promise;
	}
	if ( signal.aborted ) {
		return Promise.reject( new CodedError( ErrorCode.Cancelled, "Fetch aborted" ) );
	}

	return new Promise<T>( ( resolve, reject ) => {
		const onAbort = () => reject( new CodedError( ErrorCode.Cancelled, "Fetch aborted" ) );
		signal.addEventListener( "abort", onAbort, { once: true } );
		promise.then(
			value => {
				signal.removeEventListener( "abort", onAbort );
				resolve( value );
			},
			err => {
				signal.removeEventListener( "abort", onAbort );
				reject( err );
			}
		);
	} );
}

/**
 * Provides the readings and alerts of a time window. Concrete sources implement the internal fetches; this class
 * turns their failures into SourceUnavailable errors and keeps only records that belong to the window and zones.
 */
export abstract class ReadingSource {
	/** Source name used as the log prefix. */
	abstract readonly name: string;

	protected readonly classifier: ZoneClassifier;

	protected constructor( classifier: ZoneClassifier ) {
		this.classifier = classifier;
	}

	/**
	 * Retrieves the readings of a window. Sources may narrow by zone themselves; the result is filtered again here.
	 * @param window The window to fetch.
	 * @param zones The zone filter of the requesting view.
	 * @param signal Aborts the fetch.
	 */
	protected abstract fetchReadingsInternal( window: Window, zones: ZoneFilter, signal?: AbortSignal ): Promise<readonly Reading[]>;

	/**
	 * Retrieves the active alerts of a window.
	 */
	protected abstract fetchAlertsInternal( window: Window, signal?: AbortSignal ): Promise<readonly Alert[]>;

	/**
	 * @throws CodedError with SourceUnavailable if the fetch failed, or Cancelled if the signal aborted it.
	 */
	public async fetchReadings( window: Window, zones: ZoneFilter, signal?: AbortSignal ): Promise<Reading[]> {
		const readings = await this.guard( "readings", () => this.fetchReadingsInternal( window, zones, signal ), signal );
		return readings.filter( reading =>
			inWindow( window, reading.timestamp ) && this.classifier.matches( reading.region, zones ) );
	}

	/**
	 * @throws CodedError with SourceUnavailable if the fetch failed, or Cancelled if the signal aborted it.
	 */
	public async fetchAlerts( window: Window, signal?: AbortSignal ): Promise<Alert[]> {
		const alerts = await this.guard( "alerts", () => this.fetchAlertsInternal( window, signal ), signal );
		return alerts.filter( alert => alert.status === "active" && inWindow( window, alert.detectedAt ) );
	}

	/** Releases timers and handles held by the source. */
	public close(): Promise<void> {
		return Promise.resolve();
	}

	private async guard<T>( what: string, fetch: () => Promise<T>, signal: AbortSignal | undefined ): Promise<T> {
		try {
			return await abortable( fetch(), signal );
		} catch ( err ) {
			if ( signal?.aborted ) {
				throw new CodedError( ErrorCode.Cancelled, `Fetching ${ what } from ${ this.name } was aborted`, { cause: err } );
			}
			const coded = toCodedError( err, ErrorCode.SourceUnavailable );
			console.error( `[${ this.name }] Fetching ${ what } failed:`, coded.message );
			if ( coded.errCode === ErrorCode.SourceUnavailable ) {
				throw coded;
			}
			throw new CodedError( ErrorCode.SourceUnavailable, `Fetching ${ what } from ${ this.name } failed: ${ coded.message }`, { cause: err } );
		}
	}
}
