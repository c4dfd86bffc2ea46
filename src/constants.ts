// ── Spread model ──

/** Base rate of perimeter growth in km per hour of elapsed time. */
export const BASE_SPREAD_RATE_KM_PER_HOUR = 0.2;

/** Radius of the seed polygon at ignition (elapsed hour 0), in km. */
export const IGNITION_RADIUS_KM = 0.05;

/** Divisor normalizing wind speed (mph) into the wind factor. */
export const WIND_SPEED_NORMALIZER = 10;

/** Downwind elongation added per hour of elapsed time, per unit of wind factor. */
export const WIND_EFFECT_PER_HOUR = 0.01;

/** Half-width of the downwind cone, in degrees. */
export const WIND_CONE_HALF_WIDTH_DEG = 90;

// ── Perimeter geometry ──

/** Kilometers per degree of latitude (planar approximation). */
export const KM_PER_DEG_LAT = 111.32;

/** Angular spacing between perimeter samples, in degrees. */
export const SAMPLE_STEP_DEG = 10;

/** Number of distinct perimeter samples (360 / SAMPLE_STEP_DEG). */
export const PERIMETER_SAMPLES = 360 / SAMPLE_STEP_DEG;   // 36

// ── Time grid ──

/** Calendar instant of ignition. Only offsets from it matter to playback. */
export const SIMULATION_START = Date.UTC(2023, 4, 1, 0, 0, 0);   // 2023-05-01 00:00:00

export const HOURS_PER_DAY = 24;

export const MS_PER_HOUR = 3_600_000;

// ── Variants ──

/** Radius cap of the danger-zone variant, in km. */
export const DEFAULT_MAX_RADIUS_KM = 3.0;

/** Number of concentric rings drawn by the danger-zone variant. */
export const DEFAULT_ZONE_COUNT = 3;

/** Danger-zone ring colors, most severe (innermost) first. */
export const ZONE_COLORS: readonly string[] = ["#d7301f", "#fc8d59", "#fdcc8a"];

// ── Feature style ──

export const FILL_OPACITY = 0.6;

export const STYLE_WEIGHT = 1;

export const ICON_RADIUS = 5;

export const ICON_WEIGHT = 2;

export const ICON_OPACITY = 0.8;

export const ICON_STROKE_COLOR = "red";

// ── Playback ──

/** How long each feature stays visible after its timestamp. */
export const FEATURE_DURATION = "PT1H";

/** Pattern of the timestamps attached to each feature. */
export const DATE_PATTERN = "YYYY-MM-DD HH:mm:ss";

/** Fastest playback multiplier offered by the time slider. */
export const MAX_PLAYBACK_SPEED = 5;

/** Default playback rate of the map view, in frames per second. */
export const DEFAULT_FRAMES_PER_SECOND = 2;

// ── Scenario ──

/** Default fire origin, north of Palisades Village. */
export const DEFAULT_ORIGIN = { lat: 34.0556, lon: -118.5334 };

/** Default protected location, Palisades Village. */
export const DEFAULT_TARGET = { lat: 34.0453, lon: -118.5265 };

/** Radius of the protected zone drawn around the target, in km. */
export const PROTECTED_ZONE_RADIUS_KM = 0.3;

export const PROTECTION_STRATEGIES: readonly string[] = [
  "Deploy fire breaks 0.5km north of property",
  "Establish water resources at key locations",
  "Pre-wet vegetation in approach path",
  "Set up early warning sensors in fire path",
];

// ── Controls ──

export const DEFAULT_TOTAL_DAYS = 3;
export const MAX_TOTAL_DAYS = 7;

export const DEFAULT_HOURS_PER_STEP = 6;
export const MAX_HOURS_PER_STEP = 12;

/** 225 = southwest wind. */
export const DEFAULT_WIND_DIRECTION_DEG = 225;

export const DEFAULT_WIND_SPEED = 15;
export const MAX_WIND_SPEED = 30;

// ── Rendering ──

/** Target rendering frame rate, used for rAF frame-rate capping. */
export const TARGET_FPS = 30;

/** Padding in pixels kept free around the fitted map extent. */
export const MAP_PADDING = 24;

export const MAP_BACKGROUND = 0x1b1b1b;

export const ORIGIN_MARKER_COLOR = 0xff3b30;

export const TARGET_MARKER_COLOR = 0x3a7bd5;
