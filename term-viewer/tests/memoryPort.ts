import type { InputEvent, SignalSource, TerminalPort, TerminalSize } from "../src/index.js";

export interface MemoryPort {
  port: TerminalPort;
  writes: string[];
  listenerCount(): number;
  emit(event: InputEvent): void;
  setSize(size: TerminalSize): void;
  acquired: number;
  released: number;
}

/** In-memory terminal. `onWrite` runs after each frame is recorded and may throw to fail the write. */
export function memoryPort(size: TerminalSize, onWrite: (mem: MemoryPort) => void = () => {}): MemoryPort {
  const listeners = new Set<(event: InputEvent) => void>();
  let current = size;
  let holding = false;
  const mem: MemoryPort = {
    writes: [],
    acquired: 0,
    released: 0,
    listenerCount: () => listeners.size,
    emit(event) {
      for (const l of listeners) l(event);
    },
    setSize(next) {
      current = next;
    },
    port: {
      size: () => current,
      write: async (data) => {
        mem.writes.push(data);
        onWrite(mem);
      },
      onInput(listener) {
        listeners.add(listener);
        return () => {
          listeners.delete(listener);
        };
      },
      acquire() {
        if (holding) return;
        holding = true;
        mem.acquired++;
      },
      release() {
        if (!holding) return;
        holding = false;
        mem.released++;
      },
    },
  };
  return mem;
}

export interface FakeSignals extends SignalSource {
  fire(signal: NodeJS.Signals): void;
  handlerCount(): number;
}

export function fakeSignals(): FakeSignals {
  const handlers = new Map<NodeJS.Signals, Set<() => void>>();
  return {
    on(signal, handler) {
      const set = handlers.get(signal) ?? new Set<() => void>();
      set.add(handler);
      handlers.set(signal, set);
    },
    off(signal, handler) {
      handlers.get(signal)?.delete(handler);
    },
    fire(signal) {
      for (const h of [...(handlers.get(signal) ?? [])]) h();
    },
    handlerCount: () => [...handlers.values()].reduce((n, set) => n + set.size, 0),
  };
}
