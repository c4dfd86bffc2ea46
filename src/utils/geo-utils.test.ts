import { toRadians, offsetKm, planarKm, greatCircleKm, pointInRing, segmentDistanceKm } from "./geo-utils";

describe("offsetKm", () => {
  it("converts km to degrees at the equator", () => {
    const [lon, lat] = offsetKm({ lat: 0, lon: 0 }, 111.32, 0);
    expect(lon).toBeCloseTo(1, 12);
    expect(lat).toBeCloseTo(0, 12);
    expect(offsetKm({ lat: 0, lon: 0 }, 0, 111.32)[1]).toBeCloseTo(1, 12);
  });

  it("stretches longitude away from the equator", () => {
    const [lon] = offsetKm({ lat: 60, lon: 0 }, 111.32, 0);
    expect(lon).toBeCloseTo(2, 10);
  });

  it("is inverted by planarKm", () => {
    const origin = { lat: 34.0556, lon: -118.5334 };
    const [dx, dy] = planarKm(origin, offsetKm(origin, -1.25, 3.5));
    expect(dx).toBeCloseTo(-1.25, 10);
    expect(dy).toBeCloseTo(3.5, 10);
  });
});

describe("toRadians", () => {
  it("converts degrees", () => {
    expect(toRadians(180)).toBeCloseTo(Math.PI, 12);
  });
});

describe("greatCircleKm", () => {
  it("measures one degree of latitude", () => {
    expect(greatCircleKm({ lat: 0, lon: 0 }, { lat: 1, lon: 0 })).toBeCloseTo(111.195, 2);
  });

  it("is symmetric", () => {
    const a = { lat: 34.0556, lon: -118.5334 };
    const b = { lat: 34.0453, lon: -118.5265 };
    expect(greatCircleKm(a, b)).toBeCloseTo(greatCircleKm(b, a), 12);
  });
});

describe("segmentDistanceKm", () => {
  const point = { lat: 0, lon: 0 };

  it("measures to the foot of the perpendicular inside the segment", () => {
    expect(segmentDistanceKm(point, offsetKm(point, -1, 0.5), offsetKm(point, 1, 0.5))).toBeCloseTo(0.5, 10);
  });

  it("measures to the nearer endpoint past the segment's end", () => {
    expect(segmentDistanceKm(point, offsetKm(point, 1, 0), offsetKm(point, 3, 0))).toBeCloseTo(1, 10);
  });

  it("handles a zero-length segment", () => {
    const a = offsetKm(point, 0, 2);
    expect(segmentDistanceKm(point, a, a)).toBeCloseTo(2, 10);
  });
});

describe("pointInRing", () => {
  const square = [[0, 0], [2, 0], [2, 2], [0, 2], [0, 0]];

  it("finds points inside", () => {
    expect(pointInRing(1, 1, square)).toBe(true);
  });

  it("rejects points outside", () => {
    expect(pointInRing(3, 1, square)).toBe(false);
    expect(pointInRing(1, -0.5, square)).toBe(false);
  });
});
