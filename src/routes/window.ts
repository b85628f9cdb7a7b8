import { getUnixTime, subMinutes } from "date-fns";

import type { Window } from "../types";
import { CodedError, ErrorCode } from "../errors";

/**
 * Creates the trailing window that ends at the evaluation instant.
 * @param durationMinutes The length of the window. Must be positive.
 * @param end The evaluation instant.
 * @throws CodedError with InvalidParameter if the duration is not a positive number.
 */
export function createWindow( durationMinutes: number, end: Date ): Window {
	if ( !Number.isFinite( durationMinutes ) || durationMinutes <= 0 ) {
		throw new CodedError( ErrorCode.InvalidParameter, `Window duration must be positive (got ${ durationMinutes })` );
	}

	return {
		start: getUnixTime( subMinutes( end, durationMinutes ) ),
		end: getUnixTime( end ),
		durationMinutes
	};
}

/** Whether a timestamp (in Unix epoch seconds) is newer than the window start and not after its end. */
export function inWindow( window: Window, timestamp: number ): boolean {
	return timestamp > window.start && timestamp <= window.end;
}
