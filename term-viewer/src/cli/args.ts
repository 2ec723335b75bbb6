import { COLOR_SOURCES, GLYPH_MODES, GRADIENTS, DEFAULT_GRADIENT, parseGradientName } from "glyph-renderer";
import type { ColorSource, GlyphMode, GradientName } from "glyph-renderer";

export interface ViewOptions {
  gradient: GradientName;
  chain?: string;
  glyphMode: GlyphMode;
  colorSource: ColorSource;
  wireframe: boolean;
  verbose: boolean;
}

export type CliCommand =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "view"; input: string; options: ViewOptions }
  | { kind: "search"; query: string; verbose: boolean }
  | { kind: "cache"; action: "info" | "clear" };

export type ParseResult = { ok: true; command: CliCommand } | { ok: false; error: string };

const USAGE_HINT = "Use --help for usage.";

function fail(error: string): ParseResult {
  return { ok: false, error };
}

function pick<T extends string>(value: string, choices: readonly T[]): T | undefined {
  return choices.find((c) => c === value.trim().toLowerCase());
}

/**
 * Parses argv (without the node and script entries). Options may appear anywhere;
 * the first positional selects `search` or `cache`, otherwise it is the input to view.
 */
export function parseArgs(args: readonly string[]): ParseResult {
  const options: ViewOptions = {
    gradient: DEFAULT_GRADIENT,
    glyphMode: "braille",
    colorSource: "attribute",
    wireframe: false,
    verbose: false,
  };
  let help = false;
  let version = false;
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = (): string | undefined => {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("-")) return undefined;
      i++;
      return next;
    };

    switch (arg) {
      case "--help":
      case "-h":
        help = true;
        break;
      case "--version":
      case "-V":
        version = true;
        break;
      case "--verbose":
      case "-v":
        options.verbose = true;
        break;
      case "--wireframe":
      case "-w":
        options.wireframe = true;
        break;
      case "--color":
      case "-c": {
        const v = value();
        if (v === undefined) return fail(`${arg} requires a color scheme. ${USAGE_HINT}`);
        const gradient = parseGradientName(v);
        if (!gradient) return fail(`Unknown color scheme: ${v}. Choose one of: ${GRADIENTS.join(", ")}`);
        options.gradient = gradient;
        break;
      }
      case "--chain":
      case "-n": {
        const v = value();
        if (v === undefined) return fail(`${arg} requires a chain ID (e.g., A, B).`);
        options.chain = v.toUpperCase();
        break;
      }
      case "--mode":
      case "-m": {
        const v = value();
        if (v === undefined) return fail(`${arg} requires a glyph mode. ${USAGE_HINT}`);
        const mode = pick(v, GLYPH_MODES);
        if (!mode) return fail(`Unknown glyph mode: ${v}. Choose one of: ${GLYPH_MODES.join(", ")}`);
        options.glyphMode = mode;
        break;
      }
      case "--by":
      case "-b": {
        const v = value();
        if (v === undefined) return fail(`${arg} requires a color source. ${USAGE_HINT}`);
        const source = pick(v, COLOR_SOURCES);
        if (!source) return fail(`Unknown color source: ${v}. Choose one of: ${COLOR_SOURCES.join(", ")}`);
        options.colorSource = source;
        break;
      }
      default:
        if (arg.startsWith("-") && arg !== "-") return fail(`Unknown option: ${arg}. ${USAGE_HINT}`);
        positionals.push(arg);
    }
  }

  if (help) return { ok: true, command: { kind: "help" } };
  if (version) return { ok: true, command: { kind: "version" } };
  if (positionals.length === 0) return { ok: true, command: { kind: "help" } };

  const [first, ...rest] = positionals;
  if (first === "search") {
    const query = rest.join(" ").trim();
    if (!query) return fail("Usage: termol search <query>");
    return { ok: true, command: { kind: "search", query, verbose: options.verbose } };
  }
  if (first === "cache") {
    if (rest.length === 0) return { ok: true, command: { kind: "cache", action: "info" } };
    if (rest.length === 1 && rest[0] === "clear") return { ok: true, command: { kind: "cache", action: "clear" } };
    return fail(`Unknown cache command: ${rest.join(" ")}. Use 'termol cache' or 'termol cache clear'.`);
  }
  if (rest.length > 0) return fail(`Too many inputs: termol views one model at a time. ${USAGE_HINT}`);
  return { ok: true, command: { kind: "view", input: first, options } };
}
