import type { SubcellBuffer } from "./rasterizer.js";
import type { CellUpdate, GlyphCell, GlyphFrame, RGB, Viewport } from "./types.js";

// [row][col] → dot bit within U+2800..U+28FF
const BRAILLE_BITS = [
  [0x01, 0x08],
  [0x02, 0x10],
  [0x04, 0x20],
  [0x40, 0x80],
];

const BLOCK_DENSITY = [" ", "░", "▒", "▓", "█"];

// Indexed by TL | TR << 1 | BL << 2 | BR << 3
const QUADRANTS = [" ", "▘", "▝", "▀", "▖", "▌", "▞", "▛", "▗", "▚", "▐", "▜", "▄", "▙", "▟", "█"];

export function brailleGlyph(bits: number): string {
  return bits === 0 ? " " : String.fromCodePoint(0x2800 | bits);
}

function cellGlyph(buf: SubcellBuffer, viewport: Viewport, row: number, col: number): string {
  const { cellW, cellH, mode } = viewport;
  let bits = 0;
  let count = 0;
  for (let sy = 0; sy < cellH; sy++) {
    for (let sx = 0; sx < cellW; sx++) {
      if (buf.owner[(row * cellH + sy) * buf.width + col * cellW + sx] < 0) continue;
      count++;
      if (mode === "braille") bits |= BRAILLE_BITS[sy][sx];
      else bits |= 1 << (sy * 2 + sx);
    }
  }
  switch (mode) {
    case "braille":
      return brailleGlyph(bits);
    case "block":
      return BLOCK_DENSITY[count];
    case "quadrant":
      return QUADRANTS[bits];
  }
}

export function emptyFrame(cols: number, rows: number): GlyphFrame {
  return { cols, rows, cells: Array.from({ length: cols * rows }, (): GlyphCell => ({ glyph: " ", color: null })) };
}

export function packGlyphs(buf: SubcellBuffer, colors: readonly (RGB | null)[], viewport: Viewport): GlyphFrame {
  const frame = emptyFrame(viewport.cols, viewport.rows);
  for (let row = 0; row < viewport.rows; row++) {
    for (let col = 0; col < viewport.cols; col++) {
      const glyph = cellGlyph(buf, viewport, row, col);
      if (glyph === " ") continue;
      const i = row * viewport.cols + col;
      frame.cells[i] = { glyph, color: colors[i] ?? null };
    }
  }
  return frame;
}

export function occupiedCells(frame: GlyphFrame): number {
  return frame.cells.reduce((n, c) => (c.glyph === " " ? n : n + 1), 0);
}

function sameColor(a: RGB | null, b: RGB | null): boolean {
  if (a === null || b === null) return a === b;
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

/** Changed cells in row-major order; every cell when there is no comparable previous frame. */
export function diffFrames(prev: GlyphFrame | null, next: GlyphFrame): CellUpdate[] {
  const full = !prev || prev.cols !== next.cols || prev.rows !== next.rows;
  const updates: CellUpdate[] = [];
  for (let i = 0; i < next.cells.length; i++) {
    const cell = next.cells[i];
    if (!full && prev) {
      const old = prev.cells[i];
      if (old.glyph === cell.glyph && sameColor(old.color, cell.color)) continue;
    }
    updates.push({ row: Math.floor(i / next.cols), col: i % next.cols, glyph: cell.glyph, color: cell.color });
  }
  return updates;
}

const fg = (c: RGB) => `\x1b[38;2;${c[0]};${c[1]};${c[2]}m`;

export function centerText(text: string, width: number): string {
  const len = [...text].length;
  return " ".repeat(width > len ? Math.floor((width - len) / 2) : 0) + text;
}

/**
 * Whole frame as one write: home, reset, rows terminated by erase-to-end-of-line, then the
 * centered status line. Foreground color is only re-emitted when it changes.
 */
export function encodeFrame(frame: GlyphFrame, status: string): string {
  let out = "\x1b[H\x1b[0m";
  let current: RGB | null = null;
  for (let row = 0; row < frame.rows; row++) {
    for (let col = 0; col < frame.cols; col++) {
      const { glyph, color } = frame.cells[row * frame.cols + col];
      if (glyph !== " " && color && !sameColor(current, color)) {
        out += fg(color);
        current = color;
      }
      out += glyph;
    }
    out += "\x1b[K\r\n";
  }
  out += "\x1b[0m" + centerText(status, frame.cols) + "\x1b[K";
  return out;
}

/** Cursor-addressed updates (1-based positions); empty when nothing changed. */
export function encodeUpdates(updates: readonly CellUpdate[]): string {
  let out = "";
  let current: RGB | null = null;
  let cursor: { row: number; col: number } | null = null;
  for (const u of updates) {
    if (!cursor || cursor.row !== u.row || cursor.col !== u.col) out += `\x1b[${u.row + 1};${u.col + 1}H`;
    if (u.glyph !== " " && u.color && !sameColor(current, u.color)) {
      out += fg(u.color);
      current = u.color;
    }
    out += u.glyph;
    cursor = { row: u.row, col: u.col + 1 };
  }
  return out;
}
