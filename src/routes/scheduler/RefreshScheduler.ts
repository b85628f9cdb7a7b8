import { getUnixTime } from "date-fns";

import type { Alert, DashboardSnapshot, Reading, RefreshParameters } from "../../types";
import { READING_FIELDS, WINDOW_MINUTES } from "../../types";
import { CodedError, ErrorCode, toCodedError } from "../../errors";
import { ReadingSource } from "../readingSources/ReadingSource";
import { ZoneClassifier } from "../analysis/ZoneClassifier";
import { validateThreshold } from "../analysis/AnomalyDetector";
import { validateLimit } from "../analysis/AlertRanker";
import { DEFAULT_REFERENCE_TEMPERATURE } from "../analysis/advisories";
import { validateReadings } from "../normalization/ReadingValidator";
import { createWindow } from "../window";
import { buildSnapshot } from "./buildSnapshot";
import { SnapshotStore } from "./SnapshotStore";

export const DEFAULT_CADENCE_MS = 30 * 1000;
export const DEFAULT_RETRY_BACKOFF_MS = 5 * 1000;

/**
 * idle → fetching → computing → published → (next tick) fetching …
 * A failed fetch moves to failed, which returns to idle when the retry fires. cancelled is terminal.
 */
export type SchedulerState = "idle" | "fetching" | "computing" | "published" | "failed" | "cancelled";

export type CycleTrigger = "start" | "tick" | "manual" | "retry" | "reconfigure";

export type CycleOutcome =
	| { status: "published", snapshot: DashboardSnapshot }
	| { status: "failed", error: CodedError }
	| { status: "skipped", reason: string }
	| { status: "aborted" };

export interface SchedulerOptions {
	source: ReadingSource;
	classifier: ZoneClassifier;
	parameters: RefreshParameters;
	cadenceMs?: number;
	retryBackoffMs?: number;
	referenceTemperature?: number;
	clock?: () => Date;
}

interface InFlightCycle {
	key: string;
	controller: AbortController;
	promise: Promise<CycleOutcome>;
}

/**
 * @throws CodedError with InvalidParameter describing the first invalid parameter.
 */
export function validateParameters( parameters: RefreshParameters ): void {
	if ( !WINDOW_MINUTES.some( minutes => minutes === parameters.windowMinutes ) ) {
		throw new CodedError( ErrorCode.InvalidParameter,
			`Window must be one of ${ WINDOW_MINUTES.join( ", " ) } minutes (got ${ parameters.windowMinutes })` );
	}
	if ( !READING_FIELDS.includes( parameters.anomalyField ) ) {
		throw new CodedError( ErrorCode.InvalidParameter, `Unknown anomaly field '${ parameters.anomalyField }'` );
	}
	validateThreshold( parameters.anomalyThreshold );
	validateLimit( parameters.alertLimit );
}

/** Identifies a parameter combination for single-flight coalescing. */
export function parametersKey( parameters: RefreshParameters ): string {
	return JSON.stringify( [
		parameters.windowMinutes,
		[ ...parameters.zones ].sort(),
		parameters.anomalyField,
		parameters.anomalyThreshold,
		parameters.alertLimit
	] );
}

/**
 * Periodically re-evaluates one parameter combination and publishes the result to its SnapshotStore.
 *
 * The store is created with the scheduler and closed by `stop()`; readers are handed `scheduler.store` explicitly.
 * At most one cycle is in flight per parameter combination: a trigger that arrives while one is running is skipped.
 * Cancellation is honoured while waiting for the source; computing and publishing run to completion, so a cancelled
 * cycle never publishes anything.
 */
export class RefreshScheduler {
	public readonly store: SnapshotStore;

	private readonly source: ReadingSource;
	private readonly classifier: ZoneClassifier;
	private readonly cadenceMs: number;
	private readonly retryBackoffMs: number;
	private readonly referenceTemperature: number;
	private readonly clock: () => Date;

	private parameters: RefreshParameters;
	private state: SchedulerState = "idle";
	private cycleCount = 0;
	private inFlight: InFlightCycle | null = null;
	private cadenceTimer: NodeJS.Timeout | undefined;
	private retryTimer: NodeJS.Timeout | undefined;

	/**
	 * @throws CodedError with InvalidParameter if the parameters or timings are invalid.
	 */
	public constructor( options: SchedulerOptions ) {
		validateParameters( options.parameters );
		this.cadenceMs = options.cadenceMs ?? DEFAULT_CADENCE_MS;
		this.retryBackoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
		if ( !( this.cadenceMs > 0 ) || !( this.retryBackoffMs > 0 ) ) {
			throw new CodedError( ErrorCode.InvalidParameter, "Refresh cadence and retry backoff must be positive" );
		}

		this.source = options.source;
		this.classifier = options.classifier;
		this.parameters = options.parameters;
		this.referenceTemperature = options.referenceTemperature ?? DEFAULT_REFERENCE_TEMPERATURE;
		this.clock = options.clock ?? ( () => new Date() );
		this.store = new SnapshotStore( 2 * this.cadenceMs / 1000 );
	}

	public getState(): SchedulerState {
		return this.state;
	}

	public getParameters(): RefreshParameters {
		return this.parameters;
	}

	/** Starts the cadence timer and runs the first cycle right away. */
	public start(): void {
		if ( this.state === "cancelled" ) {
			throw new CodedError( ErrorCode.Cancelled, "Scheduler has been stopped" );
		}
		if ( this.cadenceTimer ) {
			return;
		}
		this.cadenceTimer = setInterval( () => this.trigger( "tick" ), this.cadenceMs );
		console.log( `[Scheduler] Refreshing every ${ this.cadenceMs / 1000 }s for ${ parametersKey( this.parameters ) }` );
		this.trigger( "start" );
	}

	/** Runs a cycle now. Skipped if one is already in flight for the same parameters. */
	public refresh(): Promise<CycleOutcome> {
		return this.runCycle( "manual" );
	}

	/**
	 * Switches to new parameters. A cycle in flight for the old parameters is aborted and its results discarded.
	 * @throws CodedError with InvalidParameter if the parameters are invalid.
	 */
	public reconfigure( parameters: RefreshParameters ): Promise<CycleOutcome> {
		validateParameters( parameters );
		if ( this.state === "cancelled" ) {
			return Promise.resolve( { status: "skipped", reason: "scheduler stopped" } );
		}
		this.abortInFlight();
		this.parameters = parameters;
		this.state = "idle";
		return this.runCycle( "reconfigure" );
	}

	/** Stops the timers, aborts the cycle in flight and closes the store. Terminal. */
	public async stop(): Promise<void> {
		if ( this.state === "cancelled" ) {
			return;
		}
		this.state = "cancelled";
		clearInterval( this.cadenceTimer );
		clearTimeout( this.retryTimer );
		this.cadenceTimer = undefined;
		this.retryTimer = undefined;

		const pending = this.abortInFlight();
		if ( pending ) {
			await pending;
		}
		this.store.close();
		console.log( "[Scheduler] Stopped" );
	}

	private trigger( reason: CycleTrigger ): void {
		this.runCycle( reason ).then(
			outcome => {
				if ( outcome.status === "skipped" ) {
					console.log( `[Scheduler] ${ reason } skipped: ${ outcome.reason }` );
				}
			},
			err => console.error( `[Scheduler] Unexpected error in ${ reason } cycle:`, err )
		);
	}

	private abortInFlight(): Promise<CycleOutcome> | undefined {
		const inFlight = this.inFlight;
		if ( !inFlight ) {
			return undefined;
		}
		this.inFlight = null;
		inFlight.controller.abort();
		return inFlight.promise;
	}

	private async runCycle( reason: CycleTrigger ): Promise<CycleOutcome> {
		if ( this.state === "cancelled" ) {
			return { status: "skipped", reason: "scheduler stopped" };
		}

		const key = parametersKey( this.parameters );
		if ( this.inFlight ) {
			if ( this.inFlight.key === key ) {
				return { status: "skipped", reason: "a cycle is already in flight" };
			}
			this.abortInFlight();
		}

		const controller = new AbortController();
		const promise = this.execute( reason, this.parameters, controller.signal );
		this.inFlight = { key, controller, promise };

		try {
			return await promise;
		} finally {
			if ( this.inFlight?.controller === controller ) {
				this.inFlight = null;
			}
		}
	}

	/**
	 * One cycle. An aborted cycle leaves state, store and timers alone; whoever aborted it owns them.
	 */
	private async execute( reason: CycleTrigger, parameters: RefreshParameters, signal: AbortSignal ): Promise<CycleOutcome> {
		const cycleId = ++this.cycleCount;
		const window = createWindow( parameters.windowMinutes, this.clock() );

		this.state = "fetching";
		this.store.recordAttempt( window.end );

		let readings: Reading[];
		let alerts: Alert[];
		try {
			[ readings, alerts ] = await Promise.all( [
				this.source.fetchReadings( window, parameters.zones, signal ),
				this.source.fetchAlerts( window, signal )
			] );
		} catch ( err ) {
			if ( signal.aborted ) {
				console.log( `[Scheduler] Cycle ${ cycleId } (${ reason }) aborted while fetching` );
				return { status: "aborted" };
			}
			return this.fail( cycleId, toCodedError( err, ErrorCode.SourceUnavailable ) );
		}

		if ( signal.aborted ) {
			return { status: "aborted" };
		}

		this.state = "computing";
		const validation = validateReadings( readings );
		validation.warnings.forEach( warning => console.warn( `[Scheduler] Cycle ${ cycleId }: ${ warning }` ) );

		let snapshot: DashboardSnapshot;
		try {
			snapshot = buildSnapshot( {
				cycleId,
				computedAt: getUnixTime( this.clock() ),
				parameters,
				window,
				readings,
				alerts,
				previousKpis: this.store.snapshot?.kpis ?? null,
				classifier: this.classifier,
				referenceTemperature: this.referenceTemperature
			} );
		} catch ( err ) {
			return this.fail( cycleId, toCodedError( err ) );
		}

		this.store.publish( snapshot );
		this.state = "published";
		console.log( `[Scheduler] Cycle ${ cycleId } (${ reason }) published ${ snapshot.kpis.totalEvents } readings, ` +
			`${ snapshot.anomalies.anomalyCount } anomalies, ${ snapshot.alerts.length } alerts` );
		return { status: "published", snapshot };
	}

	private fail( cycleId: number, error: CodedError ): CycleOutcome {
		this.state = "failed";
		this.store.recordFailure( error );
		console.warn( `[Scheduler] Cycle ${ cycleId } failed (${ ErrorCode[ error.errCode ] }): ${ error.message }. ` +
			`Keeping the last published snapshot, retrying in ${ this.retryBackoffMs / 1000 }s` );
		this.scheduleRetry();
		return { status: "failed", error };
	}

	private scheduleRetry(): void {
		if ( this.retryTimer ) {
			return;
		}
		this.retryTimer = setTimeout( () => {
			this.retryTimer = undefined;
			if ( this.state !== "failed" ) {
				return;
			}
			this.state = "idle";
			this.trigger( "retry" );
		}, this.retryBackoffMs );
	}
}
