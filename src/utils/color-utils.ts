import { HOURS_PER_DAY } from "../constants";
import type { ColorMode, IntensityColorMap } from "../types/fire-types";

/** Color stops for the fire intensity scale: pale yellow -> orange -> dark red. */
const INTENSITY_STOPS: [number, number, number, number][] = [
  [0.000, 255, 255, 204],  // #ffffcc
  [0.125, 255, 237, 160],  // #ffeda0
  [0.250, 254, 217, 118],  // #fed976
  [0.375, 254, 178,  76],  // #feb24c
  [0.500, 253, 141,  60],  // #fd8d3c
  [0.625, 252,  78,  42],  // #fc4e2a
  [0.750, 227,  26,  28],  // #e31a1c
  [0.875, 189,   0,  38],  // #bd0026
  [1.000, 128,   0,  38],  // #800026
];

/** Maps an intensity in [0, 1] to a 0xRRGGBB color on the yellow-orange-red scale. */
export function intensityToColor(intensity: number): number {
  const frac = Math.max(0, Math.min(1, intensity));
  // Find the two surrounding stops
  let lo = INTENSITY_STOPS[0];
  let hi = INTENSITY_STOPS[INTENSITY_STOPS.length - 1];
  for (let i = 1; i < INTENSITY_STOPS.length; i++) {
    if (frac <= INTENSITY_STOPS[i][0]) {
      lo = INTENSITY_STOPS[i - 1];
      hi = INTENSITY_STOPS[i];
      break;
    }
  }
  const span = hi[0] - lo[0];
  const s = span > 0 ? (frac - lo[0]) / span : 0;
  const r = Math.round(lo[1] + s * (hi[1] - lo[1]));
  const g = Math.round(lo[2] + s * (hi[2] - lo[2]));
  const b = Math.round(lo[3] + s * (hi[3] - lo[3]));
  return r * 65536 + g * 256 + b;
}

/** Convert a 0xRRGGBB number to a CSS hex color string. */
export function intToHex(c: number): string {
  return `#${c.toString(16).padStart(6, "0")}`;
}

/** Parse a #rrggbb CSS color into a 0xRRGGBB number. */
export function hexToInt(hex: string): number {
  const match = /^#([0-9a-f]{6})$/i.exec(hex);
  if (!match) throw new Error(`Expected a #rrggbb color, got "${hex}"`);
  return parseInt(match[1], 16);
}

/** Intensity = day / totalDays; every step of one day shares a color. */
export const dayKeyedColorMap: IntensityColorMap = (step, config) =>
  intToHex(intensityToColor(step.day / config.totalDays));

/** Intensity follows elapsed hours continuously up to the last day. */
export const elapsedColorMap: IntensityColorMap = (step, config) =>
  intToHex(intensityToColor(step.elapsedHours / (config.totalDays * HOURS_PER_DAY)));

export const COLOR_MAPS: Record<ColorMode, IntensityColorMap> = {
  day: dayKeyedColorMap,
  elapsed: elapsedColorMap,
};
