export enum ErrorCode {
	/** A reading or alert fetch failed. The cycle is retried and the last published snapshot is kept. */
	SourceUnavailable = 10,
	/** A window, threshold, limit or other setting is outside its allowed range. */
	InvalidParameter = 20,
	/** A record is missing an identifying field and was excluded. */
	MalformedRecord = 30,
	/** The operation was aborted by a shutdown or a parameter change. */
	Cancelled = 40,
	/** An error that was not expected to occur. */
	UnexpectedError = 99
}

export class CodedError extends Error {
	public readonly errCode: ErrorCode;

	public constructor( errCode: ErrorCode, message?: string, options?: { cause?: unknown } ) {
		super( message ?? ErrorCode[ errCode ], options );
		this.name = "CodedError";
		this.errCode = errCode;
	}
}

/**
 * Returns a CodedError representing the specified error. Errors that are not CodedErrors are wrapped with the
 * fallback code, keeping the original error as the cause.
 */
export function toCodedError( err: unknown, fallback: ErrorCode = ErrorCode.UnexpectedError ): CodedError {
	if ( err instanceof CodedError ) {
		return err;
	}
	const message = err instanceof Error ? err.message : String( err );
	return new CodedError( fallback, message, { cause: err } );
}

export function isCodedError( err: unknown, code: ErrorCode ): boolean {
	return err instanceof CodedError && err.errCode === code;
}
