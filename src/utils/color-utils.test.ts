import {
  intensityToColor, intToHex, hexToInt, dayKeyedColorMap, elapsedColorMap, COLOR_MAPS,
} from "./color-utils";
import { createSimulationConfig } from "../simulation/config";

describe("intensityToColor", () => {
  it("runs from pale yellow to dark red", () => {
    expect(intensityToColor(0)).toBe(0xffffcc);
    expect(intensityToColor(1)).toBe(0x800026);
  });

  it("hits the orange stop at 0.5", () => {
    expect(intensityToColor(0.5)).toBe(0xfd8d3c);
  });

  it("interpolates between stops", () => {
    // halfway between #ffffcc and #ffeda0
    expect(intensityToColor(0.0625)).toBe(0xfff6b6);
  });

  it("clamps out-of-range intensities", () => {
    expect(intensityToColor(-1)).toBe(0xffffcc);
    expect(intensityToColor(2)).toBe(0x800026);
  });
});

describe("hex conversions", () => {
  it("pads CSS hex strings to six digits", () => {
    expect(intToHex(0x00ff00)).toBe("#00ff00");
    expect(intToHex(0xffffcc)).toBe("#ffffcc");
  });

  it("parses #rrggbb colors", () => {
    expect(hexToInt("#fd8d3c")).toBe(0xfd8d3c);
    expect(hexToInt("#D7301F")).toBe(0xd7301f);
  });

  it("rejects other color syntaxes", () => {
    expect(() => hexToInt("red")).toThrow('Expected a #rrggbb color, got "red"');
  });
});

describe("color maps", () => {
  const config = createSimulationConfig({ totalDays: 3 });

  it("keys the day-based map to the day only", () => {
    expect(dayKeyedColorMap({ day: 0, hour: 18, elapsedHours: 18 }, config)).toBe("#ffffcc");
    expect(dayKeyedColorMap({ day: 1, hour: 12, elapsedHours: 36 }, config)).toBe("#febf5a");
    expect(dayKeyedColorMap({ day: 3, hour: 0, elapsedHours: 72 }, config)).toBe("#800026");
  });

  it("follows elapsed hours in the continuous map", () => {
    expect(elapsedColorMap({ day: 1, hour: 12, elapsedHours: 36 }, config)).toBe("#fd8d3c");
  });

  it("selects a map per color mode", () => {
    expect(COLOR_MAPS.day).toBe(dayKeyedColorMap);
    expect(COLOR_MAPS.elapsed).toBe(elapsedColorMap);
  });
});
