import {
  IGNITION_RADIUS_KM, WIND_SPEED_NORMALIZER, WIND_EFFECT_PER_HOUR, WIND_CONE_HALF_WIDTH_DEG,
} from "../constants";
import type { RadiusProfile, SimulationConfig, WindConeMode } from "../types/fire-types";

/** Wind speed normalized into a unitless spread multiplier. */
export function windFactor(windSpeed: number): number {
  return windSpeed / WIND_SPEED_NORMALIZER;
}

/**
 * Isotropic radius and downwind elongation after `elapsedHours`.
 *
 * Growth is linear in elapsed time. Hour 0 is the ignition seed, a fixed
 * small radius with no elongation. The cap (when configured) limits the radius
 * only; the wind effect keeps growing after the radius saturates.
 */
export function computeRadius(
  elapsedHours: number,
  config: Pick<SimulationConfig, "baseSpreadRateKmPerHour" | "windSpeed" | "maxRadiusKm">,
): RadiusProfile {
  if (elapsedHours === 0) {
    return { radius: IGNITION_RADIUS_KM, windEffect: 0 };
  }

  let radius = elapsedHours * config.baseSpreadRateKmPerHour;
  const windEffect = windFactor(config.windSpeed) * elapsedHours * WIND_EFFECT_PER_HOUR;

  if (config.maxRadiusKm !== null && radius > config.maxRadiusKm) {
    radius = config.maxRadiusKm;
  }

  return { radius, windEffect };
}

/** Smallest angle between two bearings, in [0, 180]. */
export function circularDistanceDeg(a: number, b: number): number {
  const d = ((a - b) % 360 + 360) % 360;
  return d > 180 ? 360 - d : d;
}

/**
 * True if `angle` falls in the downwind cone.
 *
 * Legacy mode compares the raw difference, so angles near 0/360 do not wrap
 * against a wind direction on the other side of north. Circular mode uses the
 * wrapped distance.
 */
export function isDownwind(angle: number, windDirectionDeg: number, mode: WindConeMode = "legacy"): boolean {
  if (mode === "circular") {
    return circularDistanceDeg(angle, windDirectionDeg) < WIND_CONE_HALF_WIDTH_DEG;
  }
  const diff = Math.abs(angle - windDirectionDeg);
  return diff < WIND_CONE_HALF_WIDTH_DEG || diff > 360 - WIND_CONE_HALF_WIDTH_DEG;
}

/** Per-angle radius multiplier: 1 + windEffect downwind, 1 elsewhere. */
export function anisotropyFactor(
  angle: number, windDirectionDeg: number, windEffect: number, mode: WindConeMode = "legacy",
): number {
  let factor = 1.0;
  if (isDownwind(angle, windDirectionDeg, mode)) {
    factor += windEffect;
  }
  return factor;
}
