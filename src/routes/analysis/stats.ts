/** Rounds half away from zero, the way the store rounds numeric aggregates. */
export function roundTo( value: number, decimals: number ): number {
	const factor = 10 ** decimals;
	return Math.sign( value ) * Math.round( Math.abs( value ) * factor ) / factor;
}

export function isUsable( value: number | null | undefined ): value is number {
	return typeof value === "number" && Number.isFinite( value );
}

/** The mean of the usable values, or null if there are none. */
export function meanOf( values: Iterable<number | null | undefined> ): number | null {
	let sum = 0, count = 0;
	for ( const value of values ) {
		if ( isUsable( value ) ) {
			sum += value;
			count++;
		}
	}
	return count > 0 ? sum / count : null;
}

// Welford's online algorithm: mean and variance in a single numerically stable pass.
// See: https://en.wikipedia.org/wiki/Algorithms_for_calculating_variance

export interface WelfordState {
	n: number;
	mean: number;
	/** Sum of squared deviations from the running mean. */
	m2: number;
}

export const EMPTY_WELFORD: WelfordState = { n: 0, mean: 0, m2: 0 };

export function welfordUpdate( state: WelfordState, value: number ): WelfordState {
	const n = state.n + 1;
	const delta = value - state.mean;
	const mean = state.mean + delta / n;
	const m2 = state.m2 + delta * ( value - mean );
	return { n, mean, m2 };
}

/** Sample standard deviation (n - 1). 0 when fewer than two values were seen. */
export function welfordStdDev( state: WelfordState ): number {
	if ( state.n < 2 ) return 0;
	return Math.sqrt( Math.max( state.m2, 0 ) / ( state.n - 1 ) );
}
