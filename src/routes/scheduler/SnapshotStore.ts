import type { DashboardSnapshot } from "../../types";
import { CodedError, ErrorCode } from "../../errors";

/**
 * - pending: no cycle has completed yet
 * - empty: the last cycle succeeded but found no readings in the window
 * - ok: the last cycle succeeded with readings
 * - failed: the last attempt failed; the last-known-good snapshot (if any) is still attached
 */
export type SnapshotStatus = "pending" | "empty" | "ok" | "failed";

export interface SnapshotView {
	status: SnapshotStatus;
	/** Set when the last attempt failed or the snapshot is older than the staleness limit. */
	stale: boolean;
	snapshot: DashboardSnapshot | null;
	lastError: { code: string, message: string } | null;
	consecutiveFailures: number;
	lastAttemptAt: number | null;
}

export function deepFreeze<T>( value: T ): T {
	if ( typeof value === "object" && value !== null && !Object.isFrozen( value ) ) {
		Object.freeze( value );
		for ( const child of Object.values( value ) ) {
			deepFreeze( child );
		}
	}
	return value;
}

/**
 * Holds the published snapshot of one scheduler. The scheduler is the only writer: a snapshot is frozen before it is
 * swapped in, so readers either see the previous snapshot or the new one, never a mix.
 */
export class SnapshotStore {
	private current: DashboardSnapshot | null = null;
	private lastError: CodedError | null = null;
	private consecutiveFailures = 0;
	private lastAttemptAt: number | null = null;
	private closed = false;
	private readonly staleAfterSeconds: number;

	/**
	 * @param staleAfterSeconds Age after which a snapshot is reported stale.
	 */
	public constructor( staleAfterSeconds: number ) {
		this.staleAfterSeconds = staleAfterSeconds;
	}

	public get snapshot(): DashboardSnapshot | null {
		return this.current;
	}

	public recordAttempt( at: number ): void {
		this.lastAttemptAt = at;
	}

	public publish( snapshot: DashboardSnapshot ): void {
		if ( this.closed ) {
			throw new CodedError( ErrorCode.Cancelled, "Snapshot store is closed" );
		}
		const frozen = deepFreeze( snapshot );
		this.current = frozen;
		this.lastError = null;
		this.consecutiveFailures = 0;
	}

	/** Records a failed attempt. The published snapshot is left untouched. */
	public recordFailure( error: CodedError ): void {
		this.lastError = error;
		this.consecutiveFailures++;
	}

	public view( now: number ): SnapshotView {
		const ageExceeded = this.current !== null && now - this.current.computedAt > this.staleAfterSeconds;

		let status: SnapshotStatus;
		if ( this.lastError !== null ) {
			status = "failed";
		} else if ( this.current === null ) {
			status = "pending";
		} else {
			status = this.current.kpis.totalEvents === 0 ? "empty" : "ok";
		}

		return {
			status,
			stale: this.lastError !== null || ageExceeded,
			snapshot: this.current,
			lastError: this.lastError && { code: ErrorCode[ this.lastError.errCode ], message: this.lastError.message },
			consecutiveFailures: this.consecutiveFailures,
			lastAttemptAt: this.lastAttemptAt
		};
	}

	/** Ends the store's lifecycle. Later publications are refused; the last snapshot stays readable. */
	public close(): void {
		this.closed = true;
	}
}
