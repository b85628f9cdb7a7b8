import type { Alert, RankedAlert, Window, ZoneFilter } from "../../types";
import { CodedError, ErrorCode } from "../../errors";
import { inWindow } from "../window";
import { alertIdentity } from "../normalization/normalizers/AlertNormalizer";
import { recommendationFor } from "./advisories";
import { severityRank } from "./severity";
import { ZoneClassifier } from "./ZoneClassifier";

export const DEFAULT_ALERT_LIMIT = 10;

export function compareAlerts( a: Alert, b: Alert ): number {
	return severityRank( a.severity ) - severityRank( b.severity ) || b.detectedAt - a.detectedAt;
}

export function validateLimit( limit: number ): void {
	if ( !Number.isInteger( limit ) || limit < 1 ) {
		throw new CodedError( ErrorCode.InvalidParameter, `Alert limit must be a positive integer (got ${ limit })` );
	}
}

/**
 * Orders alerts for display: filtered to the window and the zone filter, deduplicated, sorted by severity and then
 * most recent first, and truncated to `limit` after sorting.
 */
export class AlertRanker {
	private readonly classifier: ZoneClassifier;

	public constructor( classifier: ZoneClassifier = new ZoneClassifier() ) {
		this.classifier = classifier;
	}

	/**
	 * @throws CodedError with InvalidParameter if the limit is not a positive integer.
	 */
	public rank( alerts: readonly Alert[], window: Window, zones: ZoneFilter, limit: number = DEFAULT_ALERT_LIMIT ): RankedAlert[] {
		validateLimit( limit );

		const seen = new Set<string>();
		const candidates: Alert[] = [];
		for ( const alert of alerts ) {
			if ( !inWindow( window, alert.detectedAt ) || !this.classifier.matches( alert.region, zones ) ) {
				continue;
			}
			const key = alertIdentity( alert );
			if ( seen.has( key ) ) {
				continue;
			}
			seen.add( key );
			candidates.push( alert );
		}

		return candidates
			.sort( compareAlerts )
			.slice( 0, limit )
			.map( alert => ( { ...alert, recommendation: recommendationFor( alert.type ) } ) );
	}
}
