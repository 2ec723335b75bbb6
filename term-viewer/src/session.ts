import { modelBounds, type Model } from "mol-mesh";
import {
  createCamera,
  createViewport,
  DEFAULT_GRADIENT,
  type Camera,
  type CellSampling,
  type ColorSource,
  type GlyphMode,
  type GradientName,
  type Viewport,
} from "glyph-renderer";
import type { ViewerConfig } from "./config.js";

export interface FrameStats {
  frames: number;
  dropped: number;
  fps: number;
}

/** Everything the loop mutates between frames. The Model itself is never part of it. */
export interface RenderSession {
  label: string;
  camera: Camera;
  initialCamera: Camera;
  diagonal: number;
  // Near plane for this model; stays in front of the closest allowed camera position.
  near: number;
  autoRotate: boolean;
  gradient: GradientName;
  glyphMode: GlyphMode;
  colorSource: ColorSource;
  sampling: CellSampling;
  wireframe: boolean;
  viewport: Viewport;
  dragging: boolean;
  panning: boolean;
  lastPointer: { x: number; y: number } | null;
  needsFullRedraw: boolean;
  quit: boolean;
  stats: FrameStats;
}

export interface SessionOverrides {
  label?: string;
  gradient?: GradientName;
  glyphMode?: GlyphMode;
  colorSource?: ColorSource;
  sampling?: CellSampling;
  wireframe?: boolean;
  cols?: number;
  rows?: number;
}

export function createSession(model: Model, config: ViewerConfig, overrides: SessionOverrides = {}): RenderSession {
  const {
    label = model.metadata?.source ?? "model",
    gradient = DEFAULT_GRADIENT,
    glyphMode = "braille",
    colorSource = "attribute",
    sampling = "average",
    wireframe = false,
    cols = 80,
    rows = 23,
  } = overrides;
  const bounds = modelBounds(model);
  // An empty or single-point model still needs a usable zoom range.
  const diagonal = bounds.diagonal > 0 ? bounds.diagonal : 1;
  const camera = createCamera({
    target: bounds.center,
    yaw: config.initialYaw,
    pitch: config.initialPitch,
    distance: bounds.diagonal > 0 ? diagonal * config.distanceFactor : 1,
    minDistance: diagonal * config.minZoom,
    maxDistance: diagonal * config.maxZoom,
  });
  return {
    label,
    camera,
    initialCamera: camera,
    diagonal,
    near: Math.min(config.near, camera.minDistance / 2),
    autoRotate: true,
    gradient,
    glyphMode,
    colorSource,
    sampling,
    wireframe,
    viewport: createViewport(cols, rows, glyphMode),
    dragging: false,
    panning: false,
    lastPointer: null,
    needsFullRedraw: true,
    quit: false,
    stats: { frames: 0, dropped: 0, fps: 0 },
  };
}
