import { PERIMETER_SAMPLES, SAMPLE_STEP_DEG } from "../constants";
import type { LatLon, PerimeterRing, WindConeMode } from "../types/fire-types";
import { offsetKm, toRadians } from "../utils/geo-utils";
import { anisotropyFactor } from "./spread-model";

export interface PerimeterParams {
  /** Isotropic radius of this ring, in km. */
  radius: number;
  windEffect: number;
  windDirectionDeg: number;
  windConeMode: WindConeMode;
}

/** Sample angles 0, 10, …, 350 in degrees. */
export function sampleAngles(): number[] {
  const angles: number[] = [];
  for (let i = 0; i < PERIMETER_SAMPLES; i++) {
    angles.push(i * SAMPLE_STEP_DEG);
  }
  return angles;
}

/**
 * Closed [lon, lat] ring around `origin`.
 *
 * Each sample angle is measured counterclockwise from east and displaced by
 * radius × anisotropyFactor(angle). The first position is repeated at the end.
 */
export function buildPerimeter(origin: LatLon, params: PerimeterParams): PerimeterRing {
  const ring: PerimeterRing = sampleAngles().map(angle => {
    const factor = anisotropyFactor(angle, params.windDirectionDeg, params.windEffect, params.windConeMode);
    const angleRad = toRadians(angle);
    const dx = params.radius * factor * Math.cos(angleRad);
    const dy = params.radius * factor * Math.sin(angleRad);
    return offsetKm(origin, dx, dy);
  });
  ring.push([...ring[0]]);
  return ring;
}
