import React, { useRef, useEffect, useMemo } from "react";
import { createMapRenderer } from "../rendering/map-renderer";
import { fitProjection } from "../rendering/map-projection";
import type { Renderer, MapScene } from "../types/renderer-types";
import type { FireSimulationResult } from "../types/fire-types";
import type { PlaybackFrame } from "../simulation/timeline";
import { PlaybackStepper } from "../simulation/playback-stepper";
import { offsetKm } from "../utils/geo-utils";
import { MAP_PADDING, PROTECTED_ZONE_RADIUS_KM, TARGET_FPS } from "../constants";

interface Props {
  width: number;
  height: number;
  result: FireSimulationResult;
  frames: PlaybackFrame[];
  frameIndex: number;
  playing: boolean;
  framesPerSecond: number;
  showProtectedZone: boolean;
  onFrameIndexChange?: (index: number) => void;
  onPlaybackEnd?: () => void;
}

export const SimulationCanvas: React.FC<Props> = ({
  width, height, result, frames, frameIndex, playing, framesPerSecond, showProtectedZone,
  onFrameIndexChange, onPlaybackEnd,
}) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const rendererRef = useRef<Renderer | null>(null);
  const stepperRef = useRef(new PlaybackStepper(frames.length));

  const projection = useMemo(() => {
    const { origin, target } = result.config;
    const positions = result.collection.features.flatMap(f => f.geometry.coordinates[0]);
    // Keep the whole protected zone in view
    positions.push(
      offsetKm(target, PROTECTED_ZONE_RADIUS_KM, PROTECTED_ZONE_RADIUS_KM),
      offsetKm(target, -PROTECTED_ZONE_RADIUS_KM, -PROTECTED_ZONE_RADIUS_KM),
    );
    return fitProjection(origin, positions, width, height, MAP_PADDING);
  }, [result, width, height]);

  const scene: MapScene = {
    frame: frames[frameIndex] ?? null,
    origin: result.config.origin,
    target: result.config.target,
    protectedZoneKm: PROTECTED_ZONE_RADIUS_KM,
    projection,
  };
  const sceneRef = useRef(scene);
  sceneRef.current = scene;
  const playingRef = useRef(playing);
  playingRef.current = playing;
  const framesPerSecondRef = useRef(framesPerSecond);
  framesPerSecondRef.current = framesPerSecond;
  const loopRef = useRef(result.playback.loop);
  loopRef.current = result.playback.loop;
  const showProtectedZoneRef = useRef(showProtectedZone);
  showProtectedZoneRef.current = showProtectedZone;
  const sizeRef = useRef({ width, height });
  sizeRef.current = { width, height };
  const onFrameIndexChangeRef = useRef(onFrameIndexChange);
  onFrameIndexChangeRef.current = onFrameIndexChange;
  const onPlaybackEndRef = useRef(onPlaybackEnd);
  onPlaybackEndRef.current = onPlaybackEnd;

  // Increments on every React render; the rAF loop skips redundant draws.
  const renderVersionRef = useRef(0);
  renderVersionRef.current += 1;

  // Keep the stepper in sync with the timeline and with seeks from the slider.
  useEffect(() => {
    stepperRef.current.reset(frames.length);
  }, [frames]);

  useEffect(() => {
    if (stepperRef.current.frameIndex !== frameIndex) {
      stepperRef.current.seek(frameIndex);
    }
  }, [frameIndex]);

  // Create the renderer once; destroy on unmount.
  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    let destroyed = false;
    let rafId = 0;
    const stepper = stepperRef.current;

    function startRafLoop(renderer: Renderer): void {
      // Subtract 1ms tolerance so rAF timestamp jitter doesn't skip frames.
      const minFrameInterval = 1000 / TARGET_FPS - 1;
      let lastFrameTime = -1;
      let lastRenderedVersion = -1;

      function tick(timestamp: number): void {
        if (destroyed) return;

        if (lastFrameTime < 0) {
          lastFrameTime = timestamp;
        }

        const elapsed = timestamp - lastFrameTime;
        if (elapsed < minFrameInterval) {
          rafId = requestAnimationFrame(tick);
          return;
        }
        lastFrameTime = timestamp;

        stepper.paused = !playingRef.current;
        stepper.loop = loopRef.current;
        stepper.framesPerSecond = framesPerSecondRef.current;
        if (stepper.advance(elapsed)) {
          onFrameIndexChangeRef.current?.(stepper.frameIndex);
        }
        if (playingRef.current && stepper.paused) {
          onPlaybackEndRef.current?.();
        }

        // Nothing changed since the last draw
        if (renderVersionRef.current === lastRenderedVersion) {
          rafId = requestAnimationFrame(tick);
          return;
        }

        renderer.update(sceneRef.current, { showProtectedZone: showProtectedZoneRef.current });
        lastRenderedVersion = renderVersionRef.current;

        rafId = requestAnimationFrame(tick);
      }

      rafId = requestAnimationFrame(tick);
    }

    (async () => {
      const canvas = document.createElement("canvas");
      container.appendChild(canvas);
      const renderer = await createMapRenderer(canvas, sizeRef.current.width, sizeRef.current.height);

      if (destroyed) {
        renderer.destroy();
        return;
      }

      rendererRef.current = renderer;
      startRafLoop(renderer);
    })().catch((err) => {
      console.error("Failed to initialize renderer:", err);
    });

    return () => {
      destroyed = true;
      cancelAnimationFrame(rafId);
      rendererRef.current?.destroy();
      rendererRef.current = null;

      while (container.firstChild) {
        container.removeChild(container.firstChild);
      }
    };
  }, []);

  // Resize the renderer when dimensions change (no destroy/recreate)
  useEffect(() => {
    rendererRef.current?.resize(width, height);
  }, [width, height]);

  return <div ref={containerRef} className="map-canvas" />;
};
