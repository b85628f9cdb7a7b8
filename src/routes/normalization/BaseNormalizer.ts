import { getUnixTime, isValid, parseISO } from "date-fns";

import type { ValidationResult } from "../../types";

/** A record as it arrives from a store row, a persisted file or a request body. */
export type RawRecord = Readonly<Record<string, unknown>>;

export interface NormalizationOutcome<T> {
	record: T | null;
	validation: ValidationResult;
}

export interface NormalizedBatch<T> {
	/** Accepted records in input order, first occurrence of each identity. */
	records: T[];
	duplicates: number;
	rejected: { index: number, errors: string[] }[];
}

export function isRawRecord( value: unknown ): value is RawRecord {
	return typeof value === "object" && value !== null && !Array.isArray( value );
}

/**
 * Abstract base class for record normalizers. Each concrete normalizer turns one kind of raw record into a typed,
 * immutable value, or rejects it as malformed.
 */
export abstract class BaseNormalizer<T> {
	/**
	 * Normalizer name used as the log prefix (e.g. "ReadingNormalizer").
	 */
	abstract readonly name: string;

	/**
	 * Normalize a single raw record.
	 *
	 * @returns The record, or null with the validation errors when an identifying field is missing.
	 */
	abstract normalize( raw: unknown ): NormalizationOutcome<T>;

	/** Identity key used to drop duplicates. */
	public abstract identify( record: T ): string;

	/**
	 * Normalize a batch. Malformed records are reported by index and excluded; they never abort the batch. A record is
	 * a duplicate when an earlier one in the batch has the same identity, or when `known` reports its identity.
	 */
	public normalizeAll( raw: readonly unknown[], known: ( key: string ) => boolean = () => false ): NormalizedBatch<T> {
		const batch: NormalizedBatch<T> = { records: [], duplicates: 0, rejected: [] };
		const seen = new Set<string>();

		raw.forEach( ( item, index ) => {
			const { record, validation } = this.normalize( item );
			if ( record === null ) {
				batch.rejected.push( { index, errors: validation.errors } );
				this.warn( `Malformed record skipped: ${ validation.errors.join( "; " ) }` );
				return;
			}
			const key = this.identify( record );
			if ( seen.has( key ) || known( key ) ) {
				batch.duplicates++;
				return;
			}
			seen.add( key );
			batch.records.push( record );
		} );

		if ( batch.rejected.length > 0 || batch.duplicates > 0 ) {
			this.log( `Normalized ${ batch.records.length } of ${ raw.length } records ` +
				`(${ batch.rejected.length } malformed, ${ batch.duplicates } duplicate)` );
		}

		return batch;
	}

	/**
	 * Reads a timestamp given as Unix epoch seconds, an ISO-8601 string or a Date. Strings without an offset are UTC,
	 * as station uploads (`dateutc`) are.
	 *
	 * @returns Unix epoch seconds, or undefined when the value is not a usable time.
	 */
	protected parseTimestamp( value: unknown ): number | undefined {
		if ( typeof value === "number" ) {
			return Number.isFinite( value ) ? Math.floor( value ) : undefined;
		}
		if ( value instanceof Date ) {
			return isValid( value ) ? getUnixTime( value ) : undefined;
		}
		if ( typeof value === "string" && value.trim() !== "" ) {
			const trimmed = value.trim();
			if ( /^\d+(\.\d+)?$/.test( trimmed ) ) {
				return Math.floor( Number( trimmed ) );
			}
			const hasOffset = /(?:[zZ]|[+-]\d{2}:?\d{2})$/.test( trimmed );
			const date = parseISO( hasOffset ? trimmed : `${ trimmed.replace( " ", "T" ) }Z` );
			return isValid( date ) ? getUnixTime( date ) : undefined;
		}
		return undefined;
	}

	/**
	 * Reads a numeric measurement. Missing, non-numeric and sentinel (-9999) values become null.
	 */
	protected parseMeasurement( value: unknown ): number | null {
		let parsed: number;
		if ( typeof value === "number" ) {
			parsed = value;
		} else if ( typeof value === "string" && value.trim() !== "" ) {
			parsed = Number( value );
		} else {
			return null;
		}
		return Number.isFinite( parsed ) && parsed !== -9999 ? parsed : null;
	}

	protected parseText( value: unknown ): string | undefined {
		if ( typeof value === "string" ) {
			const trimmed = value.trim();
			return trimmed === "" ? undefined : trimmed;
		}
		if ( typeof value === "number" && Number.isFinite( value ) ) {
			return String( value );
		}
		return undefined;
	}

	/** The first field present under any of the given names (snake_case store columns or camelCase bodies). */
	protected pick( raw: RawRecord, ...names: string[] ): unknown {
		for ( const name of names ) {
			if ( raw[ name ] !== undefined && raw[ name ] !== null ) {
				return raw[ name ];
			}
		}
		return undefined;
	}

	protected log( message: string ): void {
		console.log( `[${ this.name }] ${ message }` );
	}

	protected warn( message: string ): void {
		console.warn( `[${ this.name }] ${ message }` );
	}
}
