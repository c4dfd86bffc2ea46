/* eslint-disable no-console */
/**
 * Writes a fire-spread run to stdout as a GeoJSON FeatureCollection, with the
 * playback options and derived summary attached as `playback` and `summary`.
 *
 * Usage: npx tsx scripts/export-fire-geojson.ts [--days 3] [--hours-per-step 6]
 *   [--wind-direction 225] [--wind-speed 15] [--variant unbounded|danger-zones]
 *   [--circular-cone] [--color-mode day|elapsed]
 */

import { parseArgs } from "node:util";
import { createSimulationConfig, VARIANTS, VariantName } from "../src/simulation/config";
import { buildFeatures } from "../src/simulation/feature-builder";
import { formatSummary } from "../src/simulation/summary";
import { findFirstContact } from "../src/simulation/timeline";
import type { ColorMode } from "../src/types/fire-types";

function parseVariant(value: string | undefined): VariantName {
  if (value === undefined || value === "unbounded") return "unbounded";
  if (value === "danger-zones") return "danger-zones";
  throw new Error(`Unknown variant "${value}" (expected unbounded or danger-zones)`);
}

function parseColorMode(value: string | undefined): ColorMode {
  if (value === undefined || value === "day") return "day";
  if (value === "elapsed") return "elapsed";
  throw new Error(`Unknown color mode "${value}" (expected day or elapsed)`);
}

function parseNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function main() {
  const { values } = parseArgs({
    options: {
      "days": { type: "string" },
      "hours-per-step": { type: "string" },
      "wind-direction": { type: "string" },
      "wind-speed": { type: "string" },
      "variant": { type: "string" },
      "circular-cone": { type: "boolean", default: false },
      "color-mode": { type: "string" },
    },
  });

  const config = createSimulationConfig({
    ...VARIANTS[parseVariant(values.variant)],
    totalDays: parseNumber(values.days),
    hoursPerStep: parseNumber(values["hours-per-step"]),
    windDirectionDeg: parseNumber(values["wind-direction"]),
    windSpeed: parseNumber(values["wind-speed"]),
    windConeMode: values["circular-cone"] ? "circular" : "legacy",
    colorMode: parseColorMode(values["color-mode"]),
  });

  const { collection, playback, summary } = buildFeatures(config);
  const text = formatSummary(summary);
  console.error(`Built ${collection.features.length} features`);
  console.error(`Distance: ${text.distance}, arrival: ${text.arrival}, risk: ${text.risk}`);

  const contact = findFirstContact(collection, config.target);
  console.error(contact
    ? `Protected zone reached at ${contact.time}`
    : "Protected zone not reached");

  console.log(JSON.stringify({ ...collection, playback, summary }, null, 2));
}

try {
  main();
} catch (err) {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}
