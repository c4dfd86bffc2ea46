import type { Feature, FeatureCollection, Polygon, Position } from "geojson";

export interface LatLon {
  lat: number;
  lon: number;
}

/** How the downwind cone around the wind direction is tested. */
export type WindConeMode = "legacy" | "circular";

/** Which time value drives the perimeter color of single-zone runs. */
export type ColorMode = "day" | "elapsed";

export type RiskLevel = "Low" | "Moderate" | "High";

/**
 * Immutable description of one simulation run.
 * Built and validated by createSimulationConfig.
 */
export interface SimulationConfig {
  readonly origin: Readonly<LatLon>;
  readonly target: Readonly<LatLon>;
  readonly totalDays: number;
  readonly hoursPerStep: number;
  readonly windDirectionDeg: number;
  readonly windSpeed: number;
  readonly baseSpreadRateKmPerHour: number;
  /** Radius cap in km, or null for unbounded growth. */
  readonly maxRadiusKm: number | null;
  readonly zoneCount: number;
  /** Ring colors, most severe first, or null to color by intensity. */
  readonly zoneColors: readonly string[] | null;
  readonly loop: boolean;
  readonly windConeMode: WindConeMode;
  readonly colorMode: ColorMode;
}

export interface TimeStep {
  day: number;
  hour: number;
  elapsedHours: number;
}

export interface RadiusProfile {
  /** Isotropic radius in km, after the cap. */
  radius: number;
  /** Downwind elongation added to the anisotropy factor. */
  windEffect: number;
}

/** Closed ring of [lon, lat] positions. */
export type PerimeterRing = Position[];

export interface FeatureStyle {
  color: string;
  fillColor: string;
  fillOpacity: number;
  weight: number;
}

export interface IconStyle {
  fillColor: string;
  fillOpacity: number;
  stroke: boolean;
  radius: number;
  weight: number;
  opacity: number;
  color: string;
}

export interface FireFeatureProperties {
  /** Timestamp in YYYY-MM-DD HH:mm:ss form. */
  time: string;
  icon: "circle";
  iconstyle: IconStyle;
  style: FeatureStyle;
  popup: string;
  day: number;
  hour: number;
  /** Zone index, 0 = most severe. */
  zone: number;
  radiusKm: number;
}

export type FireFeature = Feature<Polygon, FireFeatureProperties>;

export type FireFeatureCollection = FeatureCollection<Polygon, FireFeatureProperties>;

/** Options handed to a temporal map-feature player along with the collection. */
export interface PlaybackOptions {
  /** ISO 8601 duration between steps, e.g. PT6H. */
  period: string;
  /** ISO 8601 duration each feature stays visible. */
  duration: string;
  stepIntervalHours: number;
  autoPlay: boolean;
  loop: boolean;
  addLastPoint: boolean;
  maxSpeed: number;
  loopButton: boolean;
  dateOptions: string;
  timeSliderDragUpdate: boolean;
}

export interface DerivedSummary {
  distanceKm: number;
  estimatedArrivalHours: number;
  riskLevel: RiskLevel;
}

export interface FireSimulationResult {
  config: SimulationConfig;
  collection: FireFeatureCollection;
  playback: PlaybackOptions;
  summary: DerivedSummary;
}

/** Picks the fill color of a single-zone perimeter for one time step. */
export type IntensityColorMap = (step: TimeStep, config: SimulationConfig) => string;
