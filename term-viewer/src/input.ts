import {
  createViewport,
  GLYPH_MODES,
  nextGradient,
  orbit,
  panBy,
  resetCamera,
  zoomBy,
  type GlyphMode,
} from "glyph-renderer";
import type { ViewerConfig } from "./config.js";
import type { RenderSession } from "./session.js";

/** Pointer positions are 0-based character cells. */
export type InputEvent =
  | { type: "press"; x: number; y: number; shift: boolean }
  | { type: "drag"; x: number; y: number; shift: boolean }
  | { type: "release" }
  | { type: "scroll"; direction: "up" | "down" }
  | { type: "key"; name: string }
  | { type: "resize"; cols: number; rows: number }
  | { type: "interrupt" };

const QUIT_KEYS = new Set(["q", "Q", "CTRL_C", "ESCAPE"]);

export function nextGlyphMode(mode: GlyphMode): GlyphMode {
  return GLYPH_MODES[(GLYPH_MODES.indexOf(mode) + 1) % GLYPH_MODES.length];
}

function applyKey(session: RenderSession, name: string, config: ViewerConfig): void {
  if (QUIT_KEYS.has(name)) {
    session.quit = true;
    return;
  }
  const step = session.diagonal * config.panStep;
  switch (name) {
    case "r":
      session.autoRotate = !session.autoRotate;
      return;
    case "c":
      session.gradient = nextGradient(session.gradient);
      return;
    case "m":
      session.glyphMode = nextGlyphMode(session.glyphMode);
      session.viewport = createViewport(session.viewport.cols, session.viewport.rows, session.glyphMode);
      session.needsFullRedraw = true;
      return;
    case "0":
      session.camera = resetCamera(session.initialCamera);
      session.autoRotate = true;
      return;
    case "LEFT":
      session.camera = panBy(session.camera, step, 0);
      return;
    case "RIGHT":
      session.camera = panBy(session.camera, -step, 0);
      return;
    case "UP":
      session.camera = panBy(session.camera, 0, -step);
      return;
    case "DOWN":
      session.camera = panBy(session.camera, 0, step);
      return;
    case "+":
    case "=":
      session.camera = zoomBy(session.camera, -session.diagonal * config.scrollStep);
      return;
    case "-":
      session.camera = zoomBy(session.camera, session.diagonal * config.scrollStep);
      return;
  }
}

/**
 * Applies one input event to the session. Camera changes go through the camera's own
 * clamping, so no event can leave it out of range.
 */
export function applyInput(session: RenderSession, event: InputEvent, config: ViewerConfig): void {
  switch (event.type) {
    case "press":
      session.dragging = true;
      session.panning = event.shift;
      session.lastPointer = { x: event.x, y: event.y };
      return;
    case "drag": {
      const last = session.lastPointer ?? { x: event.x, y: event.y };
      const width = Math.max(1, session.viewport.width);
      const dx = ((event.x - last.x) / width) * config.mouseSpeed;
      const dy = ((event.y - last.y) / width) * config.mouseSpeed;
      session.dragging = true;
      session.panning = event.shift;
      session.lastPointer = { x: event.x, y: event.y };
      if (event.shift) {
        const scale = session.diagonal * config.panStep;
        session.camera = panBy(session.camera, -dx * scale, dy * scale);
      } else {
        session.autoRotate = false;
        session.camera = orbit(session.camera, -dx, dy);
      }
      return;
    }
    case "release":
      session.dragging = false;
      session.panning = false;
      session.lastPointer = null;
      return;
    case "scroll": {
      const delta = session.diagonal * config.scrollStep;
      session.camera = zoomBy(session.camera, event.direction === "down" ? delta : -delta);
      return;
    }
    case "key":
      applyKey(session, event.name, config);
      return;
    case "resize":
      session.viewport = createViewport(event.cols, Math.max(0, event.rows - 1), session.glyphMode);
      session.needsFullRedraw = true;
      return;
    case "interrupt":
      session.quit = true;
      return;
  }
}

export function advanceFrame(session: RenderSession, config: ViewerConfig): void {
  if (session.autoRotate && !session.dragging) {
    session.camera = orbit(session.camera, config.autoRotateSpeed, 0);
  }
}
