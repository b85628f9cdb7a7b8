import type { Alert, Reading, RefreshParameters, Window } from "../src/types";

/** 2024-03-01T12:00:00Z */
export const T0 = 1709294400;
export const NOW = new Date( T0 * 1000 );

export const HOUR_WINDOW: Window = { start: T0 - 3600, end: T0, durationMinutes: 60 };

export const DEFAULT_PARAMETERS: RefreshParameters = {
	windowMinutes: 60,
	zones: [],
	anomalyField: "temperature",
	anomalyThreshold: 2.5,
	alertLimit: 10
};

export function makeReading( overrides: Partial<Reading> = {} ): Reading {
	return {
		timestamp: T0 - 60,
		stationId: "ST-1",
		locationId: "LOC-1",
		city: "Barranquilla",
		region: "Atlántico",
		temperature: 30,
		feelsLike: null,
		humidity: null,
		pressure: null,
		windSpeed: null,
		precipitation: null,
		status: "normal",
		...overrides
	};
}

export function makeAlert( overrides: Partial<Alert> = {} ): Alert {
	return {
		id: null,
		detectedAt: T0 - 60,
		locationId: "LOC-1",
		city: "Barranquilla",
		region: "Atlántico",
		severity: "high",
		type: "extreme_heat",
		title: "Extreme heat",
		description: "",
		metricValue: null,
		status: "active",
		...overrides
	};
}
