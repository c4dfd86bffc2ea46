import {
  DATE_PATTERN, FEATURE_DURATION, FILL_OPACITY, ICON_OPACITY, ICON_RADIUS, ICON_STROKE_COLOR,
  ICON_WEIGHT, MAX_PLAYBACK_SPEED, STYLE_WEIGHT,
} from "../constants";
import type {
  FireFeature, FireFeatureCollection, FireSimulationResult, IntensityColorMap, PerimeterRing,
  PlaybackOptions, SimulationConfig, TimeStep,
} from "../types/fire-types";
import { COLOR_MAPS } from "../utils/color-utils";
import { buildPerimeter } from "./perimeter";
import { computeRadius } from "./spread-model";
import { computeSummary } from "./summary";
import { formatTimestamp, hoursToIsoDuration, timeSteps } from "./time-grid";

export interface BuildOptions {
  /** Overrides the color strategy selected by config.colorMode. */
  colorMap?: IntensityColorMap;
}

interface ZoneLayer {
  zone: number;
  radius: number;
  color: string;
  label: string;
}

/** Freezes the ring and each of its positions in place. */
function freezeRing(ring: PerimeterRing): PerimeterRing {
  ring.forEach(position => Object.freeze(position));
  Object.freeze(ring);
  return ring;
}

/** Builds one feature, frozen all the way down to its positions. */
function createFeature(ring: PerimeterRing, step: TimeStep, layer: ZoneLayer): FireFeature {
  const coordinates = [freezeRing(ring)];
  Object.freeze(coordinates);
  const feature = {
    type: "Feature",
    geometry: Object.freeze({ type: "Polygon", coordinates }),
    properties: Object.freeze({
      time: formatTimestamp(step.day, step.hour),
      icon: "circle",
      iconstyle: Object.freeze({
        fillColor: layer.color,
        fillOpacity: FILL_OPACITY,
        stroke: true,
        radius: ICON_RADIUS,
        weight: ICON_WEIGHT,
        opacity: ICON_OPACITY,
        color: ICON_STROKE_COLOR,
      }),
      style: Object.freeze({
        color: layer.color,
        fillColor: layer.color,
        fillOpacity: FILL_OPACITY,
        weight: STYLE_WEIGHT,
      }),
      popup: `Day ${step.day}, Hour ${step.hour}<br>${layer.label}`,
      day: step.day,
      hour: step.hour,
      zone: layer.zone,
      radiusKm: layer.radius,
    }),
  } satisfies FireFeature;
  return Object.freeze(feature);
}

/**
 * Rings for one step, outermost first so that later, more severe rings
 * paint over earlier ones.
 */
function zoneLayers(step: TimeStep, radius: number, config: SimulationConfig, colorMap: IntensityColorMap): ZoneLayer[] {
  const { zoneColors, zoneCount } = config;
  if (zoneColors === null) {
    return [{ zone: 0, radius, color: colorMap(step, config), label: "Fire Area" }];
  }
  const layers: ZoneLayer[] = [];
  for (let i = zoneCount - 1; i >= 0; i--) {
    layers.push({
      zone: i,
      radius: radius * (i + 1) / zoneCount,
      color: zoneColors[i],
      label: `Danger Zone ${i + 1}`,
    });
  }
  return layers;
}

export function playbackOptions(config: Pick<SimulationConfig, "hoursPerStep" | "loop">): PlaybackOptions {
  return {
    period: hoursToIsoDuration(config.hoursPerStep),
    duration: FEATURE_DURATION,
    stepIntervalHours: config.hoursPerStep,
    autoPlay: true,
    loop: config.loop,
    addLastPoint: true,
    maxSpeed: MAX_PLAYBACK_SPEED,
    loopButton: true,
    dateOptions: DATE_PATTERN,
    timeSliderDragUpdate: true,
  };
}

/**
 * Builds the ordered feature collection for a run.
 *
 * Features are emitted by (day, hour, zone index descending). Every zone of
 * a step shares the outer ring's wind effect.
 */
export function buildFeatures(config: SimulationConfig, options: BuildOptions = {}): FireSimulationResult {
  const colorMap = options.colorMap ?? COLOR_MAPS[config.colorMode];
  const features: FireFeature[] = [];

  for (const step of timeSteps(config)) {
    const { radius, windEffect } = computeRadius(step.elapsedHours, config);
    for (const layer of zoneLayers(step, radius, config, colorMap)) {
      const ring = buildPerimeter(config.origin, {
        radius: layer.radius,
        windEffect,
        windDirectionDeg: config.windDirectionDeg,
        windConeMode: config.windConeMode,
      });
      features.push(createFeature(ring, step, layer));
    }
  }

  const collection: FireFeatureCollection = { type: "FeatureCollection", features };

  return {
    config,
    collection,
    playback: playbackOptions(config),
    summary: computeSummary(config),
  };
}
