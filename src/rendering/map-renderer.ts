import { Application, Container, Graphics } from "pixi.js";
import { MAP_BACKGROUND, ORIGIN_MARKER_COLOR, TARGET_MARKER_COLOR } from "../constants";
import { hexToInt } from "../utils/color-utils";
import type { MapScene, Renderer, RendererOptions } from "../types/renderer-types";

/** Marker radius in pixels. */
const MARKER_RADIUS = 6;

/** Flattens a ring into [x0, y0, x1, y1, …] screen coordinates. */
function ringToPoints(ring: readonly (readonly number[])[], scene: MapScene): number[] {
  const points: number[] = [];
  // The last position repeats the first; Pixi closes the polygon itself.
  for (let i = 0; i < ring.length - 1; i++) {
    const [x, y] = scene.projection.project(ring[i]);
    points.push(x, y);
  }
  return points;
}

export async function createMapRenderer(canvas: HTMLCanvasElement, width: number, height: number):
    Promise<Renderer> {
  const app = new Application();
  await app.init({ canvas, width, height, background: MAP_BACKGROUND, antialias: true });
  app.ticker.stop();

  const zoneContainer = new Container();
  const fireContainer = new Container();
  const markerContainer = new Container();
  app.stage.addChild(zoneContainer, fireContainer, markerContainer);

  const protectedZone = new Graphics();
  zoneContainer.addChild(protectedZone);

  // Perimeters are redrawn into a pool that grows to the largest frame seen.
  const perimeters: Graphics[] = [];
  const markers = new Graphics();
  markerContainer.addChild(markers);

  function update(scene: MapScene, opts: RendererOptions): void {
    const { projection, origin, target } = scene;

    // Protected zone around the target
    protectedZone.clear();
    if (opts.showProtectedZone) {
      const [tx, ty] = projection.project([target.lon, target.lat]);
      protectedZone
        .circle(tx, ty, scene.protectedZoneKm * projection.scale)
        .fill({ color: TARGET_MARKER_COLOR, alpha: 0.1 })
        .stroke({ width: 1, color: TARGET_MARKER_COLOR });
    }

    // Fire perimeters in emission order so inner rings paint last
    const features = scene.frame?.features ?? [];
    while (perimeters.length < features.length) {
      const g = new Graphics();
      fireContainer.addChild(g);
      perimeters.push(g);
    }
    perimeters.forEach((g, i) => {
      g.clear();
      const feature = features[i];
      if (!feature) {
        g.visible = false;
        return;
      }
      const { style } = feature.properties;
      g.poly(ringToPoints(feature.geometry.coordinates[0], scene), true)
        .fill({ color: hexToInt(style.fillColor), alpha: style.fillOpacity })
        .stroke({ width: style.weight, color: hexToInt(style.color) });
      g.visible = true;
    });

    // Origin and target markers
    markers.clear();
    const [ox, oy] = projection.project([origin.lon, origin.lat]);
    const [tx, ty] = projection.project([target.lon, target.lat]);
    markers.circle(ox, oy, MARKER_RADIUS).fill({ color: ORIGIN_MARKER_COLOR });
    markers.circle(tx, ty, MARKER_RADIUS).fill({ color: TARGET_MARKER_COLOR });

    app.render();
  }

  return {
    canvas,
    update,
    resize(w: number, h: number) {
      app.renderer.resize(w, h);
    },
    destroy() {
      app.destroy();
    },
  };
}
