export type GlyphMode = "braille" | "block" | "quadrant";

export const GLYPH_MODES: readonly GlyphMode[] = ["braille", "block", "quadrant"];

export type RGB = [number, number, number];

/** Character grid plus the sub-cell grid it packs; each character covers cellW × cellH sub-cells. */
export interface Viewport {
  cols: number;
  rows: number;
  mode: GlyphMode;
  cellW: number;
  cellH: number;
  width: number; // cols * cellW
  height: number; // rows * cellH
}

export type ColorSource = "attribute" | "depth" | "blend";

export const COLOR_SOURCES: readonly ColorSource[] = ["attribute", "depth", "blend"];

export type CellSampling = "average" | "nearest";

export interface GlyphCell {
  glyph: string;
  color: RGB | null;
}

export interface GlyphFrame {
  cols: number;
  rows: number;
  cells: GlyphCell[]; // row-major, length cols * rows
}

export interface CellUpdate {
  row: number;
  col: number;
  glyph: string;
  color: RGB | null;
}
