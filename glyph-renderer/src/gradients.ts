import palettes from "./palettes.json" with { type: "json" };
import type { RGB } from "./types.js";

export const GRADIENTS = [
  "rainbow",
  "blues",
  "greens",
  "reds",
  "oranges",
  "purples",
  "viridis",
  "plasma",
  "magma",
  "inferno",
  "coolwarm",
  "spectral",
  "white",
] as const;

export type GradientName = (typeof GRADIENTS)[number];

export const DEFAULT_GRADIENT: GradientName = "coolwarm";

type PaletteName = Exclude<GradientName, "rainbow" | "white">;

const PALETTES: Record<PaletteName, RGB[]> = {
  blues: toStops(palettes.blues),
  greens: toStops(palettes.greens),
  reds: toStops(palettes.reds),
  oranges: toStops(palettes.oranges),
  purples: toStops(palettes.purples),
  viridis: toStops(palettes.viridis),
  plasma: toStops(palettes.plasma),
  magma: toStops(palettes.magma),
  inferno: toStops(palettes.inferno),
  coolwarm: toStops(palettes.coolwarm),
  spectral: toStops(palettes.spectral),
};

function toStops(rows: number[][]): RGB[] {
  return rows.map((r) => [r[0], r[1], r[2]]);
}

function rainbow(t: number): RGB {
  if (t < 0.25) return [0, Math.trunc((t / 0.25) * 255), 255];
  if (t < 0.5) return [0, 255, Math.trunc(255 * (1 - (t - 0.25) / 0.25))];
  if (t < 0.75) return [Math.trunc(((t - 0.5) / 0.25) * 255), 255, 0];
  return [255, Math.trunc(255 * (1 - (t - 0.75) / 0.25)), 0];
}

export function interpolatePalette(stops: readonly RGB[], t: number): RGB {
  const n = stops.length;
  const idx = t * (n - 1);
  const i = Math.min(Math.floor(idx), n - 2);
  const frac = idx - i;
  const [r1, g1, b1] = stops[i];
  const [r2, g2, b2] = stops[i + 1];
  return [
    Math.trunc(r1 + frac * (r2 - r1)),
    Math.trunc(g1 + frac * (g2 - g1)),
    Math.trunc(b1 + frac * (b2 - b1)),
  ];
}

/** Color at `t`, clamped to [0, 1]. */
export function gradientColor(name: GradientName, t: number): RGB {
  const c = Number.isNaN(t) ? 0 : Math.min(1, Math.max(0, t));
  switch (name) {
    case "rainbow":
      return rainbow(c);
    case "white":
      return [255, 255, 255];
    default:
      return interpolatePalette(PALETTES[name], c);
  }
}

export function nextGradient(name: GradientName): GradientName {
  return GRADIENTS[(GRADIENTS.indexOf(name) + 1) % GRADIENTS.length];
}

export function isGradientName(text: string): text is GradientName {
  return GRADIENTS.some((g) => g === text);
}

export function parseGradientName(text: string): GradientName | null {
  const lower = text.trim().toLowerCase();
  return isGradientName(lower) ? lower : null;
}
