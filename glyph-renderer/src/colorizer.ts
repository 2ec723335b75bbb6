import type { SubcellBuffer } from "./rasterizer.js";
import { gradientColor, type GradientName } from "./gradients.js";
import type { CellSampling, ColorSource, RGB, Viewport } from "./types.js";

export interface ColorizeOptions {
  source?: ColorSource;
  sampling?: CellSampling;
}

export interface DepthRange {
  min: number;
  max: number;
}

/** Depth range over covered sub-cells, or null when nothing was drawn. */
export function coveredDepthRange(buf: SubcellBuffer): DepthRange | null {
  let min = Infinity;
  let max = -Infinity;
  for (let i = 0; i < buf.owner.length; i++) {
    if (buf.owner[i] < 0) continue;
    const d = buf.depth[i];
    if (d < min) min = d;
    if (d > max) max = d;
  }
  return Number.isFinite(min) ? { min, max } : null;
}

/** Scalar in [0, 1] used to look up a sub-cell's color. Near depth maps to 0. */
export function colorParameter(buf: SubcellBuffer, i: number, source: ColorSource, range: DepthRange): number {
  const span = range.max - range.min;
  const depthT = span > 0 ? (buf.depth[i] - range.min) / span : 0;
  if (source === "depth" || !buf.hasAttribute) return depthT;
  if (source === "attribute") return buf.attribute[i];
  return (buf.attribute[i] + depthT) / 2;
}

/**
 * One color per character cell (row-major), null for empty cells. `average` takes the
 * integer mean of the covered sub-cells' colors; `nearest` the color of the closest one.
 */
export function colorize(buf: SubcellBuffer, viewport: Viewport, gradient: GradientName, opts: ColorizeOptions = {}): (RGB | null)[] {
  const { source = "attribute", sampling = "average" } = opts;
  const { cols, rows, cellW, cellH } = viewport;
  const out = Array.from({ length: cols * rows }, (): RGB | null => null);
  const range = coveredDepthRange(buf);
  if (!range) return out;

  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      let r = 0, g = 0, b = 0, n = 0;
      let nearest = -1;
      for (let sy = 0; sy < cellH; sy++) {
        for (let sx = 0; sx < cellW; sx++) {
          const i = (row * cellH + sy) * buf.width + col * cellW + sx;
          if (buf.owner[i] < 0) continue;
          if (sampling === "nearest") {
            if (nearest < 0 || buf.depth[i] < buf.depth[nearest]) nearest = i;
            continue;
          }
          const [cr, cg, cb] = gradientColor(gradient, colorParameter(buf, i, source, range));
          r += cr; g += cg; b += cb; n++;
        }
      }
      const cell = row * cols + col;
      if (sampling === "nearest") {
        if (nearest >= 0) out[cell] = gradientColor(gradient, colorParameter(buf, nearest, source, range));
      } else if (n > 0) {
        out[cell] = [Math.floor(r / n), Math.floor(g / n), Math.floor(b / n)];
      }
    }
  }
  return out;
}
