import { BaseNormalizer, NormalizationOutcome, isRawRecord } from "../BaseNormalizer";
import { parseSeverity } from "../../analysis/severity";
import type { Alert } from "../../../types";

/** Alerts are identified by the producer's ID, or by type, location and detection time when there is none. */
export function alertIdentity( alert: Alert ): string {
	return alert.id ?? `${ alert.type }|${ alert.locationId }|${ alert.city }|${ alert.detectedAt }`;
}

/**
 * Normalizer for alert records. An alert needs a detection time and a type; an unrecognised severity is kept as
 * "unknown" instead of rejecting the alert.
 */
export class AlertNormalizer extends BaseNormalizer<Alert> {
	readonly name = "AlertNormalizer";

	normalize( raw: unknown ): NormalizationOutcome<Alert> {
		const errors: string[] = [];
		const warnings: string[] = [];

		if ( !isRawRecord( raw ) ) {
			return { record: null, validation: { valid: false, errors: [ "Alert is not an object" ], warnings } };
		}

		const detectedAt = this.parseTimestamp( this.pick( raw, "detectedAt", "detected_at" ) );
		const type = this.parseText( this.pick( raw, "type", "alert_type", "alertType" ) );

		if ( detectedAt === undefined ) {
			errors.push( "Missing or invalid detection time" );
		}
		if ( type === undefined ) {
			errors.push( "Missing alert type" );
		}
		if ( detectedAt === undefined || type === undefined ) {
			return { record: null, validation: { valid: false, errors, warnings } };
		}

		const severityLabel = this.parseText( this.pick( raw, "severity" ) ) ?? "";
		const severity = parseSeverity( severityLabel );
		if ( severity === "unknown" ) {
			warnings.push( `Unknown severity '${ severityLabel }' for ${ type }` );
		}

		const alert: Alert = {
			id: this.parseText( this.pick( raw, "id", "alert_id", "alertId" ) ) ?? null,
			detectedAt,
			locationId: this.parseText( this.pick( raw, "locationId", "location_id" ) ) ?? "",
			city: this.parseText( this.pick( raw, "city" ) ) ?? "",
			region: this.parseText( this.pick( raw, "region" ) ) ?? "",
			severity,
			type,
			title: this.parseText( this.pick( raw, "title" ) ) ?? type,
			description: this.parseText( this.pick( raw, "description" ) ) ?? "",
			metricValue: this.parseMeasurement( this.pick( raw, "metricValue", "metric_value" ) ),
			status: this.parseText( this.pick( raw, "status" ) )?.toLowerCase() ?? "active"
		};

		return { record: Object.freeze( alert ), validation: { valid: true, errors, warnings } };
	}

	public identify( alert: Alert ): string {
		return alertIdentity( alert );
	}
}
