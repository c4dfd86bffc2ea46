import type { LatLon } from "./fire-types";
import type { PlaybackFrame } from "../simulation/timeline";
import type { MapProjection } from "../rendering/map-projection";

/** What the map shows for one playback frame. */
export interface MapScene {
  frame: PlaybackFrame | null;
  origin: LatLon;
  target: LatLon;
  protectedZoneKm: number;
  projection: MapProjection;
}

export interface RendererOptions {
  showProtectedZone: boolean;
}

export interface Renderer {
  update(scene: MapScene, opts: RendererOptions): void;
  resize(width: number, height: number): void;
  destroy(): void;
  readonly canvas: HTMLCanvasElement;
}
