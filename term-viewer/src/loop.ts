import type { Model } from "mol-mesh";
import { centerText, diffFrames, encodeFrame, encodeUpdates, renderFrame, type GlyphFrame } from "glyph-renderer";
import type { ViewerConfig } from "./config.js";
import { advanceFrame, applyInput, type InputEvent } from "./input.js";
import type { RenderSession } from "./session.js";
import { formatStatus } from "./status.js";
import type { TerminalPort, TerminalSize } from "./terminal.js";

export interface Clock {
  now(): number;
}

const systemClock: Clock = { now: () => performance.now() };

// Quitting should not wait out the frame budget.
function isUrgent(event: InputEvent): boolean {
  return event.type === "interrupt" || (event.type === "key" && (event.name === "CTRL_C" || event.name === "q"));
}

/** Buffers input between frames; `poll` waits out the rest of the frame budget, then drains. */
export class InputQueue {
  private events: InputEvent[] = [];
  private readonly unsubscribe: () => void;
  private wake: (() => void) | null = null;

  constructor(port: TerminalPort) {
    this.unsubscribe = port.onInput((event) => {
      this.events.push(event);
      if (isUrgent(event)) this.wake?.();
    });
  }

  poll(waitMs: number): Promise<InputEvent[]> {
    if (this.events.some(isUrgent)) return Promise.resolve(this.drain());
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve(this.drain());
      };
      const timer = setTimeout(done, Math.max(0, waitMs));
      this.wake = done;
    });
  }

  drain(): InputEvent[] {
    const out = this.events;
    this.events = [];
    return out;
  }

  close(): void {
    this.unsubscribe();
    this.wake?.();
  }
}

function sameSize(a: TerminalSize, cols: number, rows: number): boolean {
  return a.cols === cols && a.rows === rows + 1;
}

/**
 * Poll → update → render → present until the session quits. A frame rendered for a size the
 * terminal no longer has is dropped. Write failures reject.
 */
export async function runRenderLoop(
  session: RenderSession,
  model: Model,
  port: TerminalPort,
  config: ViewerConfig,
  clock: Clock = systemClock,
): Promise<RenderSession["stats"]> {
  const queue = new InputQueue(port);
  let previous: GlyphFrame | null = null;
  let lastFrameAt: number | null = null;
  try {
    while (!session.quit) {
      const waitMs = lastFrameAt === null ? 0 : config.frameMs - (clock.now() - lastFrameAt);
      for (const event of await queue.poll(waitMs)) applyInput(session, event, config);
      if (session.quit) break;
      advanceFrame(session, config);

      const frameStart = clock.now();
      const { cols, rows } = session.viewport;
      const frame = renderFrame(model, session.camera, session.viewport, {
        gradient: session.gradient,
        colorSource: session.colorSource,
        sampling: session.sampling,
        wireframe: session.wireframe,
        fov: config.fov,
        near: session.near,
      });
      if (!sameSize(port.size(), cols, rows)) {
        const size = port.size();
        applyInput(session, { type: "resize", cols: size.cols, rows: size.rows }, config);
        session.stats.dropped++;
        lastFrameAt = frameStart;
        continue;
      }

      if (lastFrameAt !== null) {
        const elapsed = frameStart - lastFrameAt;
        if (elapsed > 0) session.stats.fps = 1000 / elapsed;
      }
      const status = formatStatus(
        { label: session.label, gradient: session.gradient, autoRotate: session.autoRotate, fps: session.stats.fps },
        cols,
      );
      const full = previous === null || session.needsFullRedraw;
      const output = full
        ? "\x1b[2J" + encodeFrame(frame, status)
        : encodeUpdates(diffFrames(previous, frame)) + `\x1b[${rows + 1};1H\x1b[0m${centerText(status, cols)}\x1b[K`;
      await port.write(output);

      previous = frame;
      session.needsFullRedraw = false;
      session.stats.frames++;
      lastFrameAt = frameStart;
    }
  } finally {
    queue.close();
  }
  return session.stats;
}

export interface SignalSource {
  on(signal: NodeJS.Signals, handler: () => void): unknown;
  off(signal: NodeJS.Signals, handler: () => void): unknown;
}

export interface WithTerminalOptions {
  signals?: SignalSource;
  // Runs after the terminal is released; re-raises the signal by default.
  onSignal?: (signal: NodeJS.Signals) => void;
}

const HANDLED_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/** Acquires the terminal for `fn` and releases it however `fn` ends. */
export async function withTerminal<T>(port: TerminalPort, fn: () => Promise<T>, opts: WithTerminalOptions = {}): Promise<T> {
  const { signals = process, onSignal = (signal: NodeJS.Signals) => process.kill(process.pid, signal) } = opts;
  const handlers = HANDLED_SIGNALS.map((signal) => {
    const handler = () => {
      detach();
      port.release();
      onSignal(signal);
    };
    return { signal, handler };
  });
  const detach = () => {
    for (const { signal, handler } of handlers) signals.off(signal, handler);
  };
  for (const { signal, handler } of handlers) signals.on(signal, handler);

  try {
    port.acquire();
    return await fn();
  } finally {
    detach();
    port.release();
  }
}
