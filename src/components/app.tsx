import React, { useState, useEffect, useMemo, useRef, useCallback } from "react";
import { SimulationCanvas } from "./simulation-canvas";
import { InfoPanel } from "./info-panel";
import { createSimulationConfig, VARIANTS, VariantName } from "../simulation/config";
import { buildFeatures } from "../simulation/feature-builder";
import { groupFrames, findFirstContact } from "../simulation/timeline";
import { FireSimulationError } from "../simulation/errors";
import type { ColorMode, FireSimulationResult } from "../types/fire-types";
import {
  DEFAULT_FRAMES_PER_SECOND, DEFAULT_HOURS_PER_STEP, DEFAULT_TOTAL_DAYS, DEFAULT_WIND_DIRECTION_DEG,
  DEFAULT_WIND_SPEED, MAX_HOURS_PER_STEP, MAX_TOTAL_DAYS, MAX_WIND_SPEED,
} from "../constants";

type BuildOutcome =
  | { ok: true; result: FireSimulationResult }
  | { ok: false; message: string };

/** Playback rates offered in the speed selector, in frames per second. */
const SPEED_OPTIONS = [1, 2, 4, 8];

const SIDEBAR_WIDTH = 320;

export const App = () => {
  const [totalDays, setTotalDays] = useState(DEFAULT_TOTAL_DAYS);
  const [hoursPerStep, setHoursPerStep] = useState(DEFAULT_HOURS_PER_STEP);
  const [windDirectionDeg, setWindDirectionDeg] = useState(DEFAULT_WIND_DIRECTION_DEG);
  const [windSpeed, setWindSpeed] = useState(DEFAULT_WIND_SPEED);
  const [variant, setVariant] = useState<VariantName>("unbounded");
  const [circularCone, setCircularCone] = useState(false);
  const [colorMode, setColorMode] = useState<ColorMode>("day");
  const [showProtectedZone, setShowProtectedZone] = useState(true);
  const [framesPerSecond, setFramesPerSecond] = useState(DEFAULT_FRAMES_PER_SECOND);
  const [frameIndex, setFrameIndex] = useState(0);
  const [playing, setPlaying] = useState(true);

  const controlsRef = useRef<HTMLDivElement>(null);
  const [canvasSize, setCanvasSize] = useState({ width: 800, height: 600 });

  const updateCanvasSize = useCallback(() => {
    const controlsHeight = controlsRef.current?.offsetHeight ?? 0;
    setCanvasSize({
      width: Math.max(window.innerWidth - SIDEBAR_WIDTH, 200),
      height: Math.max(window.innerHeight - controlsHeight, 200),
    });
  }, []);

  useEffect(() => {
    updateCanvasSize();
    window.addEventListener("resize", updateCanvasSize);
    return () => window.removeEventListener("resize", updateCanvasSize);
  }, [updateCanvasSize]);

  // Full rebuild on every parameter change
  const outcome = useMemo((): BuildOutcome => {
    try {
      const config = createSimulationConfig({
        ...VARIANTS[variant],
        totalDays,
        hoursPerStep,
        windDirectionDeg,
        windSpeed,
        windConeMode: circularCone ? "circular" : "legacy",
        colorMode,
      });
      return { ok: true, result: buildFeatures(config) };
    } catch (err) {
      if (err instanceof FireSimulationError) {
        return { ok: false, message: err.message };
      }
      throw err;
    }
  }, [variant, totalDays, hoursPerStep, windDirectionDeg, windSpeed, circularCone, colorMode]);

  const result = outcome.ok ? outcome.result : null;
  const frames = useMemo(() => (result ? groupFrames(result.collection) : []), [result]);
  const firstContact = useMemo(
    () => (result ? findFirstContact(result.collection, result.config.target) : null), [result]);

  // A new run restarts playback from the ignition frame
  useEffect(() => {
    setFrameIndex(0);
    setPlaying(result?.playback.autoPlay ?? false);
  }, [result]);

  const currentFrame = frames[Math.min(frameIndex, frames.length - 1)];

  return (
    <div className="app">
      <div className="controls" ref={controlsRef}>
        <label>
          Simulation Days: {totalDays}
          <input type="range" min="1" max={MAX_TOTAL_DAYS} step="1" value={totalDays}
            onChange={e => setTotalDays(Number(e.target.value))} />
        </label>
        <label>
          Hours per Step: {hoursPerStep}
          <input type="range" min="1" max={MAX_HOURS_PER_STEP} step="1" value={hoursPerStep}
            onChange={e => setHoursPerStep(Number(e.target.value))} />
        </label>
        <label>
          Wind Direction: {windDirectionDeg}&deg;
          <input type="range" min="0" max="359" step="1" value={windDirectionDeg}
            onChange={e => setWindDirectionDeg(Number(e.target.value))} />
        </label>
        <label>
          Wind Speed: {windSpeed} mph
          <input type="range" min="0" max={MAX_WIND_SPEED} step="1" value={windSpeed}
            onChange={e => setWindSpeed(Number(e.target.value))} />
        </label>
        <label>
          Model:
          <select value={variant} onChange={e => setVariant(e.target.value === "danger-zones" ? "danger-zones" : "unbounded")}>
            <option value="unbounded">Unbounded spread</option>
            <option value="danger-zones">Danger zones</option>
          </select>
        </label>
        <label>
          Color by:
          <select value={colorMode} onChange={e => setColorMode(e.target.value === "elapsed" ? "elapsed" : "day")}>
            <option value="day">Day</option>
            <option value="elapsed">Elapsed hours</option>
          </select>
        </label>
        <label>
          <input type="checkbox" checked={circularCone}
            onChange={e => setCircularCone(e.target.checked)} />
          Circular wind cone
        </label>
        <label>
          <input type="checkbox" checked={showProtectedZone}
            onChange={e => setShowProtectedZone(e.target.checked)} />
          Show protected zone
        </label>
      </div>
      {outcome.ok ? null : <div className="error" role="alert">{outcome.message}</div>}
      {result && currentFrame && (
        <div className="workspace">
          <div className="canvas-container">
            <SimulationCanvas
              width={canvasSize.width}
              height={canvasSize.height}
              result={result}
              frames={frames}
              frameIndex={frameIndex}
              playing={playing}
              framesPerSecond={framesPerSecond}
              showProtectedZone={showProtectedZone}
              onFrameIndexChange={setFrameIndex}
              onPlaybackEnd={() => setPlaying(false)}
            />
            <div className="timeline">
              <button
                onClick={() => {
                  // Playing from the last frame starts over
                  if (!playing && frameIndex >= frames.length - 1) setFrameIndex(0);
                  setPlaying(p => !p);
                }}
              >
                {playing ? "Pause" : "Play"}
              </button>
              <input type="range" aria-label="Time" min="0" max={frames.length - 1} step="1" value={frameIndex}
                onChange={e => setFrameIndex(Number(e.target.value))} />
              <span className="frame-label">
                Day {currentFrame.day}, Hour {currentFrame.hour} ({currentFrame.time})
              </span>
              <label>
                Speed:
                <select value={framesPerSecond} onChange={e => setFramesPerSecond(Number(e.target.value))}>
                  {SPEED_OPTIONS.map(s => <option key={s} value={s}>{s} frames/s</option>)}
                </select>
              </label>
              {result.playback.loop && <span className="loop-indicator">Looping</span>}
            </div>
          </div>
          <InfoPanel summary={result.summary} firstContact={firstContact} />
        </div>
      )}
    </div>
  );
};
