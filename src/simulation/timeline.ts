import { PROTECTED_ZONE_RADIUS_KM } from "../constants";
import type { FireFeature, FireFeatureCollection, LatLon } from "../types/fire-types";
import { pointInRing, segmentDistanceKm } from "../utils/geo-utils";

/** All features sharing one timestamp, in emission order. */
export interface PlaybackFrame {
  time: string;
  day: number;
  hour: number;
  features: FireFeature[];
}

/** Groups consecutive features with the same timestamp into frames. */
export function groupFrames(collection: FireFeatureCollection): PlaybackFrame[] {
  const frames: PlaybackFrame[] = [];
  for (const feature of collection.features) {
    const { time, day, hour } = feature.properties;
    const last = frames[frames.length - 1];
    if (last && last.time === time) {
      last.features.push(feature);
    } else {
      frames.push({ time, day, hour, features: [feature] });
    }
  }
  return frames;
}

/**
 * True if the feature's ring contains `target` or any of its edges passes
 * within `bufferKm` of it. Distances use the planar approximation centered
 * on the target.
 */
export function reachesProtectedZone(feature: FireFeature, target: LatLon, bufferKm: number): boolean {
  const ring = feature.geometry.coordinates[0];
  if (pointInRing(target.lon, target.lat, ring)) return true;
  for (let k = 0; k < ring.length - 1; k++) {
    if (segmentDistanceKm(target, ring[k], ring[k + 1]) <= bufferKm) return true;
  }
  return false;
}

/** First frame, in playback order, whose perimeter reaches the protected zone; null if none does. */
export function findFirstContact(
  collection: FireFeatureCollection, target: LatLon, bufferKm = PROTECTED_ZONE_RADIUS_KM,
): PlaybackFrame | null {
  for (const frame of groupFrames(collection)) {
    if (frame.features.some(f => reachesProtectedZone(f, target, bufferKm))) {
      return frame;
    }
  }
  return null;
}
