/** A single observation pushed by a weather station. Immutable once fetched. */
export interface Reading {
	/** The time of the observation (in Unix epoch seconds). */
	timestamp: number;
	stationId: string;
	locationId: string;
	city: string;
	region: string;
	/** The air temperature (in Celsius). */
	temperature: number | null;
	/** The apparent temperature (in Celsius). */
	feelsLike: number | null;
	/** The relative humidity (as a percentage). */
	humidity: number | null;
	/** The barometric pressure (in hPa). */
	pressure: number | null;
	/** The wind speed (in km/h). */
	windSpeed: number | null;
	/** The precipitation since the previous observation (in mm). */
	precipitation: number | null;
	/** The station-reported condition, e.g. "normal", "warning" or "critical". */
	status: string;
}

/** The numeric Reading fields that anomaly detection can score. */
export type ReadingField = "temperature" | "feelsLike" | "humidity" | "pressure" | "windSpeed" | "precipitation";

export const READING_FIELDS: readonly ReadingField[] = [
	"temperature", "feelsLike", "humidity", "pressure", "windSpeed", "precipitation"
];

/**
 * The trailing time interval a cycle evaluates. All values are Unix epoch seconds; a timestamp belongs to the
 * window when `start < timestamp <= end`.
 */
export interface Window {
	start: number;
	end: number;
	durationMinutes: number;
}

export type Severity = "critical" | "high" | "medium" | "low" | "unknown";

export interface Alert {
	/** The identifier assigned by the producer, if it assigned one. */
	id: string | null;
	/** The time the alert was raised (in Unix epoch seconds). */
	detectedAt: number;
	locationId: string;
	city: string;
	region: string;
	severity: Severity;
	/** The alert type, e.g. "extreme_heat" or "heavy_rain". */
	type: string;
	title: string;
	description: string;
	/** The measurement that triggered the alert. */
	metricValue: number | null;
	/** The lifecycle status of the alert. Only "active" alerts are served by sources. */
	status: string;
}

export type Zone = "Coastal" | "Interior";

export const ZONES: readonly Zone[] = [ "Coastal", "Interior" ];

/** The zones a view is restricted to. An empty filter, or one naming every zone, keeps everything. */
export type ZoneFilter = readonly Zone[];

export interface KPISnapshot {
	totalEvents: number;
	activeStations: number;
	/** The number of distinct locations that reported in the window. */
	locations: number;
	/** Average temperature rounded to one decimal. 0 when there is no data; check `totalEvents`. */
	avgTemp: number;
	maxTemp: number;
	minTemp: number;
	/** The number of readings reporting a non-normal status. */
	activeAlertCount: number;
	/** The newest reading timestamp, or null when the window is empty. */
	latestTs: number | null;
	computedAt: number;
}

export type AnomalyResult = Reading & {
	zScore: number;
	isAnomaly: boolean;
};

/** Statistics of the scored series. */
export interface SeriesStats {
	mean: number;
	stdDev: number;
	sampleSize: number;
	/** Set when the series has fewer than two values or zero variance, in which case nothing is flagged. */
	degenerate: boolean;
}

export interface AnomalyReport {
	field: ReadingField;
	threshold: number;
	stats: SeriesStats;
	results: readonly AnomalyResult[];
	/** The most extreme anomalies, ordered by descending |z|. */
	top: readonly AnomalyResult[];
	anomalyCount: number;
	totalReadings: number;
	/** Percentage of anomalous readings, rounded to two decimals. */
	anomalyPct: number;
}

export type RankedAlert = Alert & {
	/** Advice shown next to the alert. */
	recommendation: string;
};

export type TemperatureBand = "extreme" | "hot" | "warm" | "mild" | "cool" | "cold";

export interface CitySummary {
	city: string;
	region: string;
	zone: Zone;
	avgTemp: number | null;
	avgFeelsLike: number | null;
	avgHumidity: number | null;
	avgWindSpeed: number | null;
	alertCount: number;
	latestTs: number;
	band: TemperatureBand | null;
}

export interface ZoneComparisonPoint {
	timestamp: number;
	zone: Zone;
	avgTemp: number | null;
	avgHumidity: number | null;
}

export interface SnapshotDeltas {
	/** Average temperature minus the reference temperature. */
	avgTempVsReference: number | null;
	/** Average temperature change since the previous snapshot. */
	avgTempVsPrevious: number | null;
	/** Event count change since the previous snapshot. */
	totalEventsVsPrevious: number | null;
}

/** The parameters that identify one refresh configuration. */
export interface RefreshParameters {
	windowMinutes: WindowMinutes;
	zones: ZoneFilter;
	anomalyField: ReadingField;
	anomalyThreshold: number;
	alertLimit: number;
}

export const WINDOW_MINUTES = [ 5, 15, 30, 60, 180, 360, 1440 ] as const;
export type WindowMinutes = typeof WINDOW_MINUTES[number];

/** The immutable result of one refresh cycle. */
export interface DashboardSnapshot {
	cycleId: number;
	computedAt: number;
	parameters: RefreshParameters;
	window: Window;
	kpis: KPISnapshot;
	deltas: SnapshotDeltas;
	anomalies: AnomalyReport;
	alerts: readonly RankedAlert[];
	cities: readonly CitySummary[];
	zoneComparison: readonly ZoneComparisonPoint[];
	recentReadings: readonly Reading[];
	/** The full reading set the cycle was computed from. */
	readings: readonly Reading[];
}

/** The outcome of validating a record or a configuration. */
export interface ValidationResult {
	/** Whether the validation passed. */
	valid: boolean;

	/** Blocking errors. */
	errors: string[];

	/** Non-blocking warnings. */
	warnings: string[];
}
