import { basename } from "node:path";
import {
  cacheClear,
  cacheInfo,
  loadModel,
  primitiveCount,
  searchPdb,
  type CacheInfo,
  type LoadOptions,
  type Model,
  type SearchOutcome,
} from "mol-mesh";
import { defaultViewerConfig, type ViewerConfig } from "../config.js";
import { runRenderLoop, withTerminal, type SignalSource } from "../loop.js";
import { createSession } from "../session.js";
import { createKitTerminal, type TerminalPort } from "../terminal.js";
import { parseArgs, type ViewOptions } from "./args.js";
import { helpText, versionText } from "./help.js";

/** Everything the CLI touches outside its own process. Tests replace each part. */
export interface CliDeps {
  out: (text: string) => void;
  err: (text: string) => void;
  loadModel: (input: string, options: LoadOptions) => Promise<Model>;
  searchPdb: (query: string) => Promise<SearchOutcome>;
  cacheInfo: () => Promise<CacheInfo>;
  cacheClear: () => Promise<number>;
  createTerminal: () => TerminalPort;
  config: ViewerConfig;
  signals?: SignalSource;
}

const defaultDeps: CliDeps = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  loadModel,
  searchPdb: (query) => searchPdb(query),
  cacheInfo: () => cacheInfo(),
  cacheClear: () => cacheClear(),
  createTerminal: () => createKitTerminal(),
  config: defaultViewerConfig,
};

const TITLE_WIDTH = 60;

function shortTitle(title: string): string {
  return title.length > TITLE_WIDTH ? `${title.slice(0, TITLE_WIDTH - 3)}...` : title;
}

async function runSearch(query: string, deps: CliDeps): Promise<number> {
  deps.err(`Searching RCSB PDB for '${query}'...`);
  const outcome = await deps.searchPdb(query);
  if (!outcome.ok) {
    deps.err(outcome.error);
    return 1;
  }
  if (outcome.results.length === 0) {
    deps.out(`No results found for '${query}'`);
    return 0;
  }
  deps.out("\n\x1b[1mSearch Results:\x1b[0m\n");
  for (const { pdbId, title } of outcome.results) {
    deps.out(`  \x1b[1;36m${pdbId}\x1b[0m  ${shortTitle(title)}`);
  }
  deps.out("\nUse: termol <PDB_ID> to view a structure");
  return 0;
}

async function runCache(action: "info" | "clear", deps: CliDeps): Promise<number> {
  if (action === "clear") {
    const removed = await deps.cacheClear();
    deps.out(`Cleared ${removed} cached files.`);
    return 0;
  }
  const info = await deps.cacheInfo();
  deps.out(`Cache directory: ${info.dir}`);
  deps.out(`Files: ${info.files}`);
  deps.out(`Total size: ${(info.bytes / 1024 / 1024).toFixed(2)} MB`);
  deps.out("\nUse 'termol cache clear' to remove cached files.");
  return 0;
}

async function runView(input: string, options: ViewOptions, deps: CliDeps): Promise<number> {
  const model = await deps.loadModel(input, { chain: options.chain, log: deps.err });
  if (options.verbose) {
    const warnings = model.metadata?.warnings ?? [];
    deps.err(`${model.vertices.count} vertices, ${primitiveCount(model)} primitives`);
    deps.err(`${warnings.length} warnings`);
    for (const w of warnings) deps.err(`  ${w}`);
  }

  const port = deps.createTerminal();
  const size = port.size();
  const session = createSession(model, deps.config, {
    label: basename(input),
    gradient: options.gradient,
    glyphMode: options.glyphMode,
    colorSource: options.colorSource,
    wireframe: options.wireframe,
    cols: size.cols,
    rows: Math.max(0, size.rows - 1),
  });
  const stats = await withTerminal(port, () => runRenderLoop(session, model, port, deps.config), {
    signals: deps.signals,
  });
  if (options.verbose) deps.err(`${stats.frames} frames drawn, ${stats.dropped} dropped`);
  return 0;
}

/** Runs one CLI invocation and returns the exit code. Errors are reported on stderr, never thrown. */
export async function runCli(argv: readonly string[], overrides: Partial<CliDeps> = {}): Promise<number> {
  const deps: CliDeps = { ...defaultDeps, ...overrides };
  const parsed = parseArgs(argv);
  if (!parsed.ok) {
    deps.err(parsed.error);
    return 1;
  }

  const { command } = parsed;
  try {
    switch (command.kind) {
      case "help":
        deps.out(helpText());
        return 0;
      case "version":
        deps.out(versionText());
        return 0;
      case "search":
        return await runSearch(command.query, deps);
      case "cache":
        return await runCache(command.action, deps);
      case "view":
        return await runView(command.input, command.options, deps);
    }
  } catch (err) {
    deps.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
