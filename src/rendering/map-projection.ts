import type { LatLon } from "../types/fire-types";
import { planarKm } from "../utils/geo-utils";

/** Planar km extent shown when every point sits on the origin. */
const MIN_SPAN_KM = 1;

export interface MapProjection {
  /** Pixels per km. */
  readonly scale: number;
  /** Screen position of a [lon, lat] position. */
  project(position: readonly number[]): [number, number];
}

/**
 * Fits the planar km extent of `positions` (and the origin itself) into a
 * width × height canvas with `padding` pixels on every side. North is up and
 * both axes share one scale.
 */
export function fitProjection(
  origin: LatLon, positions: readonly (readonly number[])[], width: number, height: number, padding: number,
): MapProjection {
  let minX = 0, maxX = 0, minY = 0, maxY = 0;
  for (const position of positions) {
    const [x, y] = planarKm(origin, position);
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
  }

  const spanX = Math.max(maxX - minX, MIN_SPAN_KM);
  const spanY = Math.max(maxY - minY, MIN_SPAN_KM);
  const usableW = Math.max(width - 2 * padding, 1);
  const usableH = Math.max(height - 2 * padding, 1);
  const scale = Math.min(usableW / spanX, usableH / spanY);

  // Center the extent in the canvas
  const centerX = (minX + maxX) / 2;
  const centerY = (minY + maxY) / 2;

  return {
    scale,
    project(position) {
      const [x, y] = planarKm(origin, position);
      return [width / 2 + (x - centerX) * scale, height / 2 - (y - centerY) * scale];
    },
  };
}
