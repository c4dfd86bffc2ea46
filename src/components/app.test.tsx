import React from "react";
import { render, screen, fireEvent } from "@testing-library/react";
import { App } from "./app";

// Mock the SimulationCanvas since PixiJS requires a real canvas context
jest.mock("./simulation-canvas", () => ({
  SimulationCanvas: ({ frames }: { frames: unknown[] }) => (
    <div data-testid="simulation-canvas">{frames.length} frames</div>
  ),
}));

describe("App component", () => {
  it("renders controls, canvas and fire information", () => {
    render(<App />);
    expect(screen.getByText("Simulation Days: 3")).toBeDefined();
    expect(screen.getByText("Hours per Step: 6")).toBeDefined();
    expect(screen.getByText(/Wind Direction: 225/)).toBeDefined();
    expect(screen.getByText("Wind Speed: 15 mph")).toBeDefined();
    expect(screen.getByTestId("simulation-canvas").textContent).toBe("16 frames");
    expect(screen.getByText("Distance from fire origin to target: 1.31 km")).toBeDefined();
    expect(screen.getByText("Estimated time to reach target: 2.6 hours at current conditions")).toBeDefined();
    expect(screen.getByText("Current Risk Assessment: High")).toBeDefined();
    expect(screen.getByText("Protected zone reached on Day 0, Hour 6")).toBeDefined();
  });

  it("starts playback at the ignition frame", () => {
    render(<App />);
    expect(screen.getByText("Day 0, Hour 0 (2023-05-01 00:00:00)")).toBeDefined();
    expect(screen.getByText("Pause")).toBeDefined();
  });

  it("lists the protection strategies", () => {
    render(<App />);
    expect(screen.getByLabelText("Deploy fire breaks 0.5km north of property")).toBeDefined();
    expect(screen.getByLabelText("Set up early warning sensors in fire path")).toBeDefined();
  });

  it("reclassifies risk when the wind changes", () => {
    render(<App />);
    fireEvent.change(screen.getByLabelText(/Wind Direction/), { target: { value: "90" } });
    expect(screen.getByText("Current Risk Assessment: Low")).toBeDefined();

    fireEvent.change(screen.getByLabelText(/Wind Speed/), { target: { value: "25" } });
    expect(screen.getByText("Current Risk Assessment: Moderate")).toBeDefined();
  });

  it("rebuilds the timeline when the step changes", () => {
    render(<App />);
    fireEvent.change(screen.getByLabelText(/Hours per Step/), { target: { value: "12" } });
    // 4 days x 2 steps
    expect(screen.getByTestId("simulation-canvas").textContent).toBe("8 frames");
  });

  it("loops playback only for danger zones", () => {
    render(<App />);
    expect(screen.queryByText("Looping")).toBeNull();
    fireEvent.change(screen.getByLabelText(/Model/), { target: { value: "danger-zones" } });
    expect(screen.getByText("Looping")).toBeDefined();
    expect(screen.getByTestId("simulation-canvas").textContent).toBe("16 frames");
  });

  it("seeks with the time slider", () => {
    render(<App />);
    fireEvent.change(screen.getByLabelText("Time"), { target: { value: "5" } });
    expect(screen.getByText("Day 1, Hour 6 (2023-05-02 06:00:00)")).toBeDefined();
  });
});
