import type { DerivedSummary, RiskLevel, SimulationConfig } from "../types/fire-types";
import { greatCircleKm } from "../utils/geo-utils";
import { windFactor } from "./spread-model";

/**
 * Risk classification for the current wind.
 * High (southwest quadrant, above 10) is checked before Moderate (above 20).
 */
export function riskLevel(windDirectionDeg: number, windSpeed: number): RiskLevel {
  if (windDirectionDeg > 180 && windDirectionDeg < 270 && windSpeed > 10) {
    return "High";
  }
  if (windSpeed > 20) {
    return "Moderate";
  }
  return "Low";
}

/** Hours for the perimeter to cover `distanceKm` at the current wind. */
export function estimatedArrivalHours(
  distanceKm: number, config: Pick<SimulationConfig, "baseSpreadRateKmPerHour" | "windSpeed">,
): number {
  return distanceKm / (config.baseSpreadRateKmPerHour * (1 + windFactor(config.windSpeed)));
}

export function computeSummary(config: SimulationConfig): DerivedSummary {
  const distanceKm = greatCircleKm(config.origin, config.target);
  return {
    distanceKm,
    estimatedArrivalHours: estimatedArrivalHours(distanceKm, config),
    riskLevel: riskLevel(config.windDirectionDeg, config.windSpeed),
  };
}

export interface SummaryText {
  distance: string;
  arrival: string;
  risk: string;
}

/** Display strings: distance to 2 decimals, arrival to 1 decimal. */
export function formatSummary(summary: DerivedSummary): SummaryText {
  return {
    distance: `${summary.distanceKm.toFixed(2)} km`,
    arrival: `${summary.estimatedArrivalHours.toFixed(1)} hours`,
    risk: summary.riskLevel,
  };
}
