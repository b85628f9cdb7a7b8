import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ZoneClassifier, isRestrictive, parseZoneFilter } from "../src/routes/analysis/ZoneClassifier";
import { ErrorCode, isCodedError } from "../src/errors";

describe( "ZoneClassifier", () => {
	const classifier = new ZoneClassifier();

	it( "classifies the default coastal departments as Coastal", () => {
		assert.equal( classifier.classify( "Atlántico" ), "Coastal" );
		assert.equal( classifier.classify( "Magdalena" ), "Coastal" );
	} );

	it( "ignores case, surrounding whitespace and Unicode composition", () => {
		assert.equal( classifier.classify( "  bolívar " ), "Coastal" );
		assert.equal( classifier.classify( "Atla\u0301ntico" ), "Coastal" );
	} );

	it( "classifies every other region as Interior", () => {
		assert.equal( classifier.classify( "Antioquia" ), "Interior" );
		assert.equal( classifier.classify( "" ), "Interior" );
	} );

	it( "accepts a custom coastal set", () => {
		const custom = new ZoneClassifier( [ "Valle del Cauca" ] );
		assert.equal( custom.classify( "valle del cauca" ), "Coastal" );
		assert.equal( custom.classify( "Atlántico" ), "Interior" );
	} );

	it( "treats an empty filter and a filter naming both zones as no filter", () => {
		assert.equal( classifier.matches( "Antioquia", [] ), true );
		assert.equal( classifier.matches( "Antioquia", [ "Coastal", "Interior" ] ), true );
		assert.equal( isRestrictive( [] ), false );
		assert.equal( isRestrictive( [ "Interior", "Coastal" ] ), false );
	} );

	it( "keeps only regions of the selected zone", () => {
		assert.equal( classifier.matches( "Antioquia", [ "Coastal" ] ), false );
		assert.equal( classifier.matches( "Córdoba", [ "Coastal" ] ), true );
		assert.equal( isRestrictive( [ "Interior" ] ), true );
	} );
} );

describe( "parseZoneFilter", () => {
	it( "parses single zones and lists in zone order", () => {
		assert.deepEqual( parseZoneFilter( "coastal" ), [ "Coastal" ] );
		assert.deepEqual( parseZoneFilter( " Interior , coastal" ), [ "Coastal", "Interior" ] );
	} );

	it( "maps 'all' and an empty string to no filter", () => {
		assert.deepEqual( parseZoneFilter( "all" ), [] );
		assert.deepEqual( parseZoneFilter( "ALL,coastal" ), [] );
		assert.deepEqual( parseZoneFilter( "" ), [] );
	} );

	it( "rejects unknown zone names", () => {
		assert.throws( () => parseZoneFilter( "coastal,mountain" ), err =>
			isCodedError( err, ErrorCode.InvalidParameter ) && err instanceof Error && err.message === "Unknown zone 'mountain'" );
	} );
} );
