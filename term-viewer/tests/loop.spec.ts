import { describe, it, expect, vi } from "vitest";
import { createModel } from "mol-mesh";
import { createSession, runRenderLoop, viewerConfig, withTerminal, type RenderSession } from "../src/index.js";
import { fakeSignals, memoryPort } from "./memoryPort.js";

const config = viewerConfig({ frameMs: 0 });
const model = createModel({ positions: [0, 0, 0, 4, 3, 0], lines: [0, 1] });

// Terminal is 20×6: five viewport rows plus the status line.
function session(): RenderSession {
  return createSession(model, config, { label: "test", cols: 20, rows: 5 });
}

describe("runRenderLoop", () => {
  it("draws a full frame first, then diffs, until q", async () => {
    const mem = memoryPort({ cols: 20, rows: 6 }, (m) => {
      if (m.writes.length === 3) m.emit({ type: "key", name: "q" });
    });
    const s = session();
    const stats = await runRenderLoop(s, model, mem.port, config);
    expect(stats.frames).toBe(3);
    expect(stats.dropped).toBe(0);
    expect(mem.writes).toHaveLength(3);
    expect(mem.writes[0].startsWith("\x1b[2J\x1b[H\x1b[0m")).toBe(true);
    expect(mem.writes[1].startsWith("\x1b[2J")).toBe(false);
    expect(mem.writes[1]).toContain("\x1b[6;1H\x1b[0m");
    expect(s.needsFullRedraw).toBe(false);
    expect(mem.listenerCount()).toBe(0);
  });

  it("drops a frame rendered for a stale size and redraws in full", async () => {
    const mem = memoryPort({ cols: 20, rows: 6 }, (m) => {
      if (m.writes.length === 1) m.setSize({ cols: 30, rows: 9 });
      if (m.writes.length === 2) m.emit({ type: "interrupt" });
    });
    const s = session();
    const stats = await runRenderLoop(s, model, mem.port, config);
    expect(stats.dropped).toBe(1);
    expect(stats.frames).toBe(2);
    expect(s.viewport).toMatchObject({ cols: 30, rows: 8 });
    expect(mem.writes[1].startsWith("\x1b[2J")).toBe(true);
  });

  it("stops before drawing when interrupted at once", async () => {
    const mem = memoryPort({ cols: 20, rows: 6 });
    const done = runRenderLoop(session(), model, mem.port, config);
    mem.emit({ type: "interrupt" });
    const stats = await done;
    expect(stats.frames).toBe(0);
    expect(mem.writes).toEqual([]);
  });

  it("rejects when the terminal write fails", async () => {
    const mem = memoryPort({ cols: 20, rows: 6 }, () => {
      throw new Error("EPIPE");
    });
    await expect(runRenderLoop(session(), model, mem.port, config)).rejects.toThrow("EPIPE");
    expect(mem.listenerCount()).toBe(0);
  });
});

describe("withTerminal", () => {
  it("acquires and releases around the callback", async () => {
    const mem = memoryPort({ cols: 20, rows: 6 });
    const signals = fakeSignals();
    const result = await withTerminal(
      mem.port,
      async () => {
        expect(mem.acquired).toBe(1);
        expect(signals.handlerCount()).toBe(2);
        return 42;
      },
      { signals },
    );
    expect(result).toBe(42);
    expect(mem.released).toBe(1);
    expect(signals.handlerCount()).toBe(0);
  });

  it("releases when the callback rejects", async () => {
    const mem = memoryPort({ cols: 20, rows: 6 });
    const signals = fakeSignals();
    await expect(
      withTerminal(mem.port, async () => Promise.reject(new Error("boom")), { signals }),
    ).rejects.toThrow("boom");
    expect(mem.released).toBe(1);
    expect(signals.handlerCount()).toBe(0);
  });

  it("detaches its signal handlers when acquiring the terminal fails", async () => {
    const mem = memoryPort({ cols: 20, rows: 6 });
    const signals = fakeSignals();
    const fn = vi.fn(async () => 1);
    const port = {
      ...mem.port,
      acquire() {
        throw new Error("not a TTY");
      },
    };
    await expect(withTerminal(port, fn, { signals })).rejects.toThrow("not a TTY");
    expect(fn).not.toHaveBeenCalled();
    expect(signals.handlerCount()).toBe(0);
  });

  it("releases before handing a signal on", async () => {
    const mem = memoryPort({ cols: 20, rows: 6 });
    const signals = fakeSignals();
    const onSignal = vi.fn(() => {
      expect(mem.released).toBe(1);
    });
    await withTerminal(
      mem.port,
      async () => {
        signals.fire("SIGTERM");
      },
      { signals, onSignal },
    );
    expect(onSignal).toHaveBeenCalledWith("SIGTERM");
    expect(mem.released).toBe(1);
    expect(signals.handlerCount()).toBe(0);
  });
});
