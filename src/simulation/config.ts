import {
  BASE_SPREAD_RATE_KM_PER_HOUR, DEFAULT_HOURS_PER_STEP, DEFAULT_MAX_RADIUS_KM, DEFAULT_ORIGIN,
  DEFAULT_TARGET, DEFAULT_TOTAL_DAYS, DEFAULT_WIND_DIRECTION_DEG, DEFAULT_WIND_SPEED,
  DEFAULT_ZONE_COUNT, ZONE_COLORS,
} from "../constants";
import type { ColorMode, LatLon, SimulationConfig, WindConeMode } from "../types/fire-types";
import { DegenerateGeometryError, InvalidConfigurationError } from "./errors";

/** The fields that tell the unbounded and danger-zone runs apart. */
export interface SimulationVariant {
  maxRadiusKm: number | null;
  zoneCount: number;
  zoneColors: readonly string[] | null;
  loop: boolean;
}

/** Unbounded linear growth, one perimeter per step colored by intensity. */
export const UNBOUNDED_VARIANT: SimulationVariant = {
  maxRadiusKm: null,
  zoneCount: 1,
  zoneColors: null,
  loop: false,
};

/** Growth capped at DEFAULT_MAX_RADIUS_KM, drawn as concentric danger zones. */
export const DANGER_ZONE_VARIANT: SimulationVariant = {
  maxRadiusKm: DEFAULT_MAX_RADIUS_KM,
  zoneCount: DEFAULT_ZONE_COUNT,
  zoneColors: ZONE_COLORS,
  loop: true,
};

export type VariantName = "unbounded" | "danger-zones";

export const VARIANTS: Record<VariantName, SimulationVariant> = {
  "unbounded": UNBOUNDED_VARIANT,
  "danger-zones": DANGER_ZONE_VARIANT,
};

/** User-facing input; anything left out takes its default. */
export interface SimulationInput extends Partial<SimulationVariant> {
  origin?: LatLon;
  target?: LatLon;
  totalDays?: number;
  hoursPerStep?: number;
  windDirectionDeg?: number;
  windSpeed?: number;
  baseSpreadRateKmPerHour?: number;
  windConeMode?: WindConeMode;
  colorMode?: ColorMode;
}

function requirePositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidConfigurationError(field, `expected an integer >= 1, got ${value}`);
  }
}

function requireFiniteNonNegative(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidConfigurationError(field, `expected a finite number >= 0, got ${value}`);
  }
}

function validateLatLon(field: string, point: LatLon): Readonly<LatLon> {
  const { lat, lon } = point;
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    throw new InvalidConfigurationError(field, `coordinates must be finite, got (${lat}, ${lon})`);
  }
  if (Math.abs(lat) > 90 || Math.abs(lon) > 180) {
    throw new InvalidConfigurationError(field, `coordinates out of range, got (${lat}, ${lon})`);
  }
  return Object.freeze({ lat, lon });
}

/**
 * Validates user input and returns a frozen SimulationConfig.
 * Fails fast with InvalidConfigurationError or DegenerateGeometryError;
 * nothing is built from a rejected input.
 */
export function createSimulationConfig(input: SimulationInput = {}): SimulationConfig {
  const variant: SimulationVariant = {
    maxRadiusKm: input.maxRadiusKm !== undefined ? input.maxRadiusKm : UNBOUNDED_VARIANT.maxRadiusKm,
    zoneCount: input.zoneCount ?? UNBOUNDED_VARIANT.zoneCount,
    zoneColors: input.zoneColors !== undefined ? input.zoneColors : UNBOUNDED_VARIANT.zoneColors,
    loop: input.loop ?? UNBOUNDED_VARIANT.loop,
  };

  const origin = validateLatLon("origin", input.origin ?? DEFAULT_ORIGIN);
  const target = validateLatLon("target", input.target ?? DEFAULT_TARGET);

  const totalDays = input.totalDays ?? DEFAULT_TOTAL_DAYS;
  requirePositiveInteger("totalDays", totalDays);

  const hoursPerStep = input.hoursPerStep ?? DEFAULT_HOURS_PER_STEP;
  requirePositiveInteger("hoursPerStep", hoursPerStep);

  const windDirectionDeg = input.windDirectionDeg ?? DEFAULT_WIND_DIRECTION_DEG;
  if (!Number.isFinite(windDirectionDeg)) {
    throw new InvalidConfigurationError("windDirectionDeg", `expected a finite number, got ${windDirectionDeg}`);
  }

  const windSpeed = input.windSpeed ?? DEFAULT_WIND_SPEED;
  requireFiniteNonNegative("windSpeed", windSpeed);

  const baseSpreadRateKmPerHour = input.baseSpreadRateKmPerHour ?? BASE_SPREAD_RATE_KM_PER_HOUR;
  if (!Number.isFinite(baseSpreadRateKmPerHour) || baseSpreadRateKmPerHour <= 0) {
    throw new InvalidConfigurationError(
      "baseSpreadRateKmPerHour", `expected a finite number > 0, got ${baseSpreadRateKmPerHour}`);
  }

  const { maxRadiusKm, zoneCount, zoneColors, loop } = variant;
  if (maxRadiusKm !== null && (!Number.isFinite(maxRadiusKm) || maxRadiusKm <= 0)) {
    throw new InvalidConfigurationError("maxRadiusKm", `expected a finite number > 0, got ${maxRadiusKm}`);
  }
  if (!Number.isInteger(zoneCount) || zoneCount <= 0) {
    throw new DegenerateGeometryError(zoneCount);
  }
  if (zoneColors === null && zoneCount > 1) {
    throw new InvalidConfigurationError("zoneColors", `${zoneCount} zones need one color each`);
  }
  if (zoneColors !== null && zoneColors.length < zoneCount) {
    throw new InvalidConfigurationError(
      "zoneColors", `expected at least ${zoneCount} colors, got ${zoneColors.length}`);
  }

  return Object.freeze({
    origin,
    target,
    totalDays,
    hoursPerStep,
    windDirectionDeg,
    windSpeed,
    baseSpreadRateKmPerHour,
    maxRadiusKm,
    zoneCount,
    zoneColors: zoneColors === null ? null : Object.freeze([...zoneColors]),
    loop,
    windConeMode: input.windConeMode ?? "legacy",
    colorMode: input.colorMode ?? "day",
  });
}
