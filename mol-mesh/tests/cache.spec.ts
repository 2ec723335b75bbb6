import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile, readdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { cacheClear, cacheDir, cacheInfo } from "../src/index.js";

describe("cacheDir", () => {
  it("prefers TERMOL_CACHE_DIR", () => {
    expect(cacheDir({ TERMOL_CACHE_DIR: "/tmp/custom", XDG_CACHE_HOME: "/xdg" })).toBe("/tmp/custom");
  });

  it("falls back to XDG_CACHE_HOME, then HOME", () => {
    expect(cacheDir({ XDG_CACHE_HOME: "/xdg" })).toBe("/xdg/termol");
    expect(cacheDir({ HOME: "/home/tester" })).toBe("/home/tester/.cache/termol");
  });
});

describe("cacheInfo / cacheClear", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "termol-cache-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("counts files and bytes", async () => {
    await writeFile(join(dir, "1ABC.obj"), "abc");
    await writeFile(join(dir, "1ABC.pdb"), "hello");
    await mkdir(join(dir, "nested"));
    expect(await cacheInfo(dir)).toEqual({ dir, files: 2, bytes: 8 });
  });

  it("removes only regular files", async () => {
    await writeFile(join(dir, "a.obj"), "x");
    await writeFile(join(dir, "b.obj"), "y");
    await mkdir(join(dir, "nested"));
    expect(await cacheClear(dir)).toBe(2);
    expect(await readdir(dir)).toEqual(["nested"]);
  });

  it("creates a missing directory", async () => {
    const missing = join(dir, "does", "not", "exist");
    expect(await cacheInfo(missing)).toEqual({ dir: missing, files: 0, bytes: 0 });
  });
});
