import type { Zone, ZoneFilter } from "../../types";
import { ZONES } from "../../types";
import { CodedError, ErrorCode } from "../../errors";

/** Caribbean departments treated as coastal unless the deployment overrides the set. */
export const DEFAULT_COASTAL_REGIONS: readonly string[] = [ "Atlántico", "Bolívar", "Magdalena", "Cesar", "Córdoba" ];

function regionKey( region: string ): string {
	return region.normalize( "NFC" ).trim().toLocaleLowerCase();
}

/**
 * Maps a region label to a coarse zone. Every region not in the coastal set is Interior, so the mapping is total.
 */
export class ZoneClassifier {
	private readonly coastal: ReadonlySet<string>;

	public constructor( coastalRegions: Iterable<string> = DEFAULT_COASTAL_REGIONS ) {
		this.coastal = new Set( Array.from( coastalRegions, regionKey ) );
	}

	public classify( region: string ): Zone {
		return this.coastal.has( regionKey( region ) ) ? "Coastal" : "Interior";
	}

	/** Whether a region passes the zone filter. An empty filter, or one naming every zone, keeps everything. */
	public matches( region: string, zones: ZoneFilter ): boolean {
		if ( !isRestrictive( zones ) ) {
			return true;
		}
		return zones.includes( this.classify( region ) );
	}
}

export function isRestrictive( zones: ZoneFilter ): boolean {
	return zones.length > 0 && !ZONES.every( zone => zones.includes( zone ) );
}

/**
 * Parses a zone filter such as "all", "coastal", "interior" or "coastal,interior".
 * @throws CodedError with InvalidParameter for unknown zone names.
 */
export function parseZoneFilter( text: string ): ZoneFilter {
	const zones = new Set<Zone>();
	let all = false;
	for ( const part of text.split( "," ) ) {
		switch ( part.trim().toLowerCase() ) {
			case "":
				break;
			case "all":
				all = true;
				break;
			case "coastal":
				zones.add( "Coastal" );
				break;
			case "interior":
				zones.add( "Interior" );
				break;
			default:
				throw new CodedError( ErrorCode.InvalidParameter, `Unknown zone '${ part.trim() }'` );
		}
	}
	return all ? [] : ZONES.filter( zone => zones.has( zone ) );
}
