import type { Model } from "mol-mesh";
import type { Camera } from "./camera.js";
import { colorize } from "./colorizer.js";
import { packGlyphs } from "./glyphs.js";
import { DEFAULT_GRADIENT, type GradientName } from "./gradients.js";
import { projectModel } from "./projector.js";
import { rasterize } from "./rasterizer.js";
import type { CellSampling, ColorSource, GlyphFrame, Viewport } from "./types.js";

export interface RenderSettings {
  gradient?: GradientName;
  colorSource?: ColorSource;
  sampling?: CellSampling;
  fov?: number;
  near?: number;
  wireframe?: boolean;
}

/** Projector → Rasterizer → Colorizer → Glyph Packer. Same inputs give the same frame. */
export function renderFrame(model: Model, camera: Camera, viewport: Viewport, settings: RenderSettings = {}): GlyphFrame {
  const { gradient = DEFAULT_GRADIENT, colorSource = "attribute", sampling = "average", fov, near, wireframe } = settings;
  const projected = projectModel(model, camera, viewport, { fov, near });
  const buffer = rasterize(model, projected, viewport, { wireframe });
  const colors = colorize(buffer, viewport, gradient, { source: colorSource, sampling });
  return packGlyphs(buffer, colors, viewport);
}
