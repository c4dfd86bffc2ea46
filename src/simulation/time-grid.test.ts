import { stepsPerDay, elapsedHours, timeSteps, formatTimestamp, hoursToIsoDuration } from "./time-grid";

describe("stepsPerDay", () => {
  it("counts the hours 0, h, 2h, ... below 24", () => {
    expect(stepsPerDay(1)).toBe(24);
    expect(stepsPerDay(5)).toBe(5);   // 0, 5, 10, 15, 20
    expect(stepsPerDay(6)).toBe(4);
    expect(stepsPerDay(7)).toBe(4);   // 0, 7, 14, 21
    expect(stepsPerDay(11)).toBe(3);  // 0, 11, 22
    expect(stepsPerDay(12)).toBe(2);
  });

  it("matches the number of hours the grid emits per day", () => {
    for (let h = 1; h <= 12; h++) {
      const steps = timeSteps({ totalDays: 1, hoursPerStep: h });
      expect(steps.filter(s => s.day === 0)).toHaveLength(stepsPerDay(h));
    }
  });
});

describe("elapsedHours", () => {
  it("adds whole days to the hour of day", () => {
    expect(elapsedHours(0, 0)).toBe(0);
    expect(elapsedHours(2, 6)).toBe(54);
  });
});

describe("timeSteps", () => {
  it("lists days 0..totalDays inclusive in (day, hour) order", () => {
    expect(timeSteps({ totalDays: 1, hoursPerStep: 12 })).toEqual([
      { day: 0, hour: 0, elapsedHours: 0 },
      { day: 0, hour: 12, elapsedHours: 12 },
      { day: 1, hour: 0, elapsedHours: 24 },
      { day: 1, hour: 12, elapsedHours: 36 },
    ]);
  });

  it("produces (totalDays + 1) * stepsPerDay steps", () => {
    expect(timeSteps({ totalDays: 3, hoursPerStep: 6 })).toHaveLength(16);
    expect(timeSteps({ totalDays: 7, hoursPerStep: 5 })).toHaveLength(40);
  });
});

describe("formatTimestamp", () => {
  it("formats the start instant", () => {
    expect(formatTimestamp(0, 0)).toBe("2023-05-01 00:00:00");
  });

  it("offsets by days and hours", () => {
    expect(formatTimestamp(1, 23)).toBe("2023-05-02 23:00:00");
    expect(formatTimestamp(3, 18)).toBe("2023-05-04 18:00:00");
  });

  it("rolls over month boundaries", () => {
    expect(formatTimestamp(31, 0)).toBe("2023-06-01 00:00:00");
  });
});

describe("hoursToIsoDuration", () => {
  it("writes an ISO 8601 hour duration", () => {
    expect(hoursToIsoDuration(6)).toBe("PT6H");
    expect(hoursToIsoDuration(1)).toBe("PT1H");
  });
});
