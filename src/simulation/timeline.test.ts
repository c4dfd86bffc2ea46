import { groupFrames, findFirstContact, reachesProtectedZone } from "./timeline";
import { buildFeatures } from "./feature-builder";
import { createSimulationConfig, DANGER_ZONE_VARIANT } from "./config";
import { offsetKm } from "../utils/geo-utils";

describe("groupFrames", () => {
  it("groups each step's zones into one frame", () => {
    const { collection } = buildFeatures(createSimulationConfig({ ...DANGER_ZONE_VARIANT }));
    const frames = groupFrames(collection);
    expect(frames).toHaveLength(16);
    expect(frames.every(f => f.features.length === 3)).toBe(true);
    expect(frames[0].time).toBe("2023-05-01 00:00:00");
    expect(frames[1]).toMatchObject({ day: 0, hour: 6, time: "2023-05-01 06:00:00" });
    expect(frames[1].features.map(f => f.properties.zone)).toEqual([2, 1, 0]);
  });

  it("keeps one feature per frame in the unbounded variant", () => {
    const frames = groupFrames(buildFeatures(createSimulationConfig({ totalDays: 1, hoursPerStep: 12 })).collection);
    expect(frames.map(f => [f.day, f.hour])).toEqual([[0, 0], [0, 12], [1, 0], [1, 12]]);
    expect(frames.every(f => f.features.length === 1)).toBe(true);
  });

  it("returns no frames for an empty collection", () => {
    expect(groupFrames({ type: "FeatureCollection", features: [] })).toEqual([]);
  });
});

describe("findFirstContact", () => {
  const origin = { lat: 0, lon: 0 };
  const [lon, lat] = offsetKm(origin, 2, 0);
  const eastTarget = { lat, lon };
  // Calm air, hourly steps: radius = 0.2 km per hour
  const calm = createSimulationConfig({ origin, target: eastTarget, windSpeed: 0, totalDays: 1, hoursPerStep: 1 });
  const { collection } = buildFeatures(calm);

  it("finds the first step whose ring comes within the buffer", () => {
    // hour 9 -> 1.8 km, 0.2 km short of the target
    expect(findFirstContact(collection, eastTarget)).toMatchObject({ day: 0, hour: 9 });
  });

  it("reaches a wider buffer earlier", () => {
    // hour 8 -> 1.6 km, 0.4 km short of the target
    expect(findFirstContact(collection, eastTarget, 0.5)).toMatchObject({ day: 0, hour: 8 });
  });

  it("counts a target inside the ring as reached", () => {
    const atOrigin = buildFeatures(createSimulationConfig({ origin, target: origin })).collection;
    expect(reachesProtectedZone(atOrigin.features[0], origin, 0)).toBe(true);
    expect(findFirstContact(atOrigin, origin)).toMatchObject({ day: 0, hour: 0, time: "2023-05-01 00:00:00" });
  });

  it("returns null when the fire never gets there", () => {
    const farTarget = { lat: 1, lon: 0 };   // ~111 km north
    const far = buildFeatures(createSimulationConfig({ origin, target: farTarget, totalDays: 1 })).collection;
    expect(findFirstContact(far, farTarget)).toBeNull();
  });

  it("detects an edge crossing the buffer between two distant vertices", () => {
    // Day 1, hour 16 -> 40 h -> 8 km ring; vertices on it are ~1.4 km apart
    const config = createSimulationConfig({ origin, windSpeed: 0, totalDays: 1, hoursPerStep: 1 });
    const { collection: calm8km } = buildFeatures(config);
    const ring8km = calm8km.features.find(f => f.properties.day === 1 && f.properties.hour === 16);
    expect(ring8km?.properties.radiusKm).toBeCloseTo(8, 10);

    // 0.25 km beyond the midpoint of the 0°-10° edge; the nearest vertex is ~0.74 km away
    const bearing = 5 * Math.PI / 180;
    const distance = 8 * Math.cos(bearing) + 0.25;
    const [tLon, tLat] = offsetKm(origin, distance * Math.cos(bearing), distance * Math.sin(bearing));
    const target = { lat: tLat, lon: tLon };

    if (!ring8km) throw new Error("missing day 1, hour 16 feature");
    expect(reachesProtectedZone(ring8km, target, 0.3)).toBe(true);
    expect(reachesProtectedZone(ring8km, target, 0.2)).toBe(false);
    expect(findFirstContact(calm8km, target)).toMatchObject({ day: 1, hour: 16 });
  });

  it("reaches Palisades Village six hours in with the default wind", () => {
    const config = createSimulationConfig();
    expect(findFirstContact(buildFeatures(config).collection, config.target)).toMatchObject({ day: 0, hour: 6 });
  });
});
