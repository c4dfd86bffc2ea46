import { distance } from "@turf/distance";
import { point } from "@turf/helpers";
import { KM_PER_DEG_LAT } from "../constants";
import type { LatLon } from "../types/fire-types";

/** Degrees to radians. */
export function toRadians(deg: number): number {
  return deg * Math.PI / 180;
}

/**
 * Offsets a point by (dxKm east, dyKm north) on the fixed-latitude planar
 * approximation: 1° latitude = KM_PER_DEG_LAT, longitude scaled by
 * cos(origin latitude). Returns a GeoJSON-ordered [lon, lat] position.
 */
export function offsetKm(origin: LatLon, dxKm: number, dyKm: number): [number, number] {
  const lon = origin.lon + dxKm / KM_PER_DEG_LAT / Math.cos(toRadians(origin.lat));
  const lat = origin.lat + dyKm / KM_PER_DEG_LAT;
  return [lon, lat];
}

/** Inverse of offsetKm: the planar (east, north) km of `position` from `origin`. */
export function planarKm(origin: LatLon, position: readonly number[]): [number, number] {
  const [lon, lat] = position;
  const dx = (lon - origin.lon) * KM_PER_DEG_LAT * Math.cos(toRadians(origin.lat));
  const dy = (lat - origin.lat) * KM_PER_DEG_LAT;
  return [dx, dy];
}

/** Planar km from `point` to the nearest point of the segment a→b. */
export function segmentDistanceKm(point: LatLon, a: readonly number[], b: readonly number[]): number {
  const [ax, ay] = planarKm(point, a);
  const [bx, by] = planarKm(point, b);
  const ex = bx - ax, ey = by - ay;
  const lengthSq = ex * ex + ey * ey;
  // Parameter of the foot of the perpendicular from the point, clamped to the segment
  const t = lengthSq > 0 ? Math.max(0, Math.min(1, -(ax * ex + ay * ey) / lengthSq)) : 0;
  return Math.hypot(ax + t * ex, ay + t * ey);
}

/** Great-circle distance in km. */
export function greatCircleKm(a: LatLon, b: LatLon): number {
  return distance(point([a.lon, a.lat]), point([b.lon, b.lat]), { units: "kilometers" });
}

/**
 * Ray-casting point-in-polygon test.
 * ring is an array of [lon, lat] coordinate pairs forming a closed ring.
 */
export function pointInRing(lon: number, lat: number, ring: readonly (readonly number[])[]): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const xi = ring[i][0], yi = ring[i][1];
    const xj = ring[j][0], yj = ring[j][1];
    if (((yi > lat) !== (yj > lat)) &&
        (lon < (xj - xi) * (lat - yi) / (yj - yi) + xi)) {
      inside = !inside;
    }
  }
  return inside;
}
