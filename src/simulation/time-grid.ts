import { HOURS_PER_DAY, MS_PER_HOUR, SIMULATION_START } from "../constants";
import type { SimulationConfig, TimeStep } from "../types/fire-types";

/** Number of hours in {0, h, 2h, …} that fall before 24. */
export function stepsPerDay(hoursPerStep: number): number {
  return Math.ceil(HOURS_PER_DAY / hoursPerStep);
}

/** Total hours since ignition. */
export function elapsedHours(day: number, hour: number): number {
  return day * HOURS_PER_DAY + hour;
}

/**
 * Every time step of a run in emission order: days 0..totalDays inclusive,
 * hours 0, h, 2h, … below 24 within each day.
 */
export function timeSteps(config: Pick<SimulationConfig, "totalDays" | "hoursPerStep">): TimeStep[] {
  const steps: TimeStep[] = [];
  for (let day = 0; day <= config.totalDays; day++) {
    for (let hour = 0; hour < HOURS_PER_DAY; hour += config.hoursPerStep) {
      steps.push({ day, hour, elapsedHours: elapsedHours(day, hour) });
    }
  }
  return steps;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** SIMULATION_START + day days + hour hours, as YYYY-MM-DD HH:mm:ss. */
export function formatTimestamp(day: number, hour: number): string {
  const t = new Date(SIMULATION_START + elapsedHours(day, hour) * MS_PER_HOUR);
  const date = `${pad(t.getUTCFullYear(), 4)}-${pad(t.getUTCMonth() + 1)}-${pad(t.getUTCDate())}`;
  const time = `${pad(t.getUTCHours())}:${pad(t.getUTCMinutes())}:${pad(t.getUTCSeconds())}`;
  return `${date} ${time}`;
}

/** ISO 8601 duration for a whole number of hours, e.g. PT6H. */
export function hoursToIsoDuration(hours: number): string {
  return `PT${hours}H`;
}
