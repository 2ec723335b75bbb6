import tkexport from "terminal-kit";
import type { InputEvent } from "./input.js";

export interface TerminalSize {
  cols: number;
  rows: number;
}

/** What the render loop needs from a terminal. Tests provide an in-memory implementation. */
export interface TerminalPort {
  size(): TerminalSize;
  write(data: string): Promise<void>;
  onInput(listener: (event: InputEvent) => void): () => void;
  acquire(): void;
  release(): void;
}

interface MouseData {
  x: number;
  y: number;
  shift?: boolean;
}

export function mouseEvent(name: string, data: MouseData): InputEvent | null {
  const x = data.x - 1;
  const y = data.y - 1;
  const shift = Boolean(data.shift);
  switch (name) {
    case "MOUSE_LEFT_BUTTON_PRESSED":
      return { type: "press", x, y, shift };
    case "MOUSE_DRAG":
      return { type: "drag", x, y, shift };
    case "MOUSE_LEFT_BUTTON_RELEASED":
      return { type: "release" };
    case "MOUSE_WHEEL_UP":
      return { type: "scroll", direction: "up" };
    case "MOUSE_WHEEL_DOWN":
      return { type: "scroll", direction: "down" };
    default:
      return null;
  }
}

/** terminal-kit for input and screen modes; frames go straight to stdout. */
export function createKitTerminal(out: NodeJS.WriteStream = process.stdout): TerminalPort {
  // terminal-kit attaches to the TTY when `terminal` is first read.
  const { terminal } = tkexport;
  const listeners = new Set<(event: InputEvent) => void>();
  let acquired = false;
  const emit = (event: InputEvent) => {
    if (!acquired) return;
    for (const l of listeners) l(event);
  };

  terminal.on("key", (name: string) => emit({ type: "key", name }));
  terminal.on("mouse", (name: string, data: MouseData) => {
    const event = mouseEvent(name, data);
    if (event) emit(event);
  });
  terminal.on("resize", (width: number, height: number) => emit({ type: "resize", cols: width, rows: height }));

  return {
    size: () => ({ cols: terminal.width, rows: terminal.height }),
    write: (data) =>
      new Promise<void>((resolve, reject) => {
        out.write(data, (err) => (err ? reject(err) : resolve()));
      }),
    onInput(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    acquire() {
      if (acquired) return;
      acquired = true;
      terminal.fullscreen(true);
      terminal.hideCursor();
      terminal.grabInput({ mouse: "drag" });
    },
    release() {
      if (!acquired) return;
      acquired = false;
      terminal.grabInput(false);
      terminal.hideCursor(false);
      terminal.styleReset();
      terminal.fullscreen(false);
    },
  };
}
