import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, realpath, rm, writeFile, access } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  buildPymolScript,
  cartoonFileName,
  checkPymol,
  exportCartoon,
  CommandError,
  type CommandRunner,
} from "../src/index.js";

type Call = [string, readonly string[]];

/** Stand-in for the PyMOL binary: reads the script and writes a tiny OBJ to its `save` path. */
function fakePymol(calls: Call[], opts: { writeObj?: boolean; stderr?: string } = {}): CommandRunner {
  const { writeObj = true, stderr } = opts;
  return async (command, args) => {
    calls.push([command, args]);
    if (command === "which") return { stdout: Buffer.from("/usr/bin/pymol\n"), stderr: Buffer.alloc(0), code: 0 };
    if (stderr) throw new CommandError(command, args, 1, Buffer.from(stderr));
    const script = await readFile(args[1] ?? "", "utf8");
    const save = script.split("\n").find((l) => l.startsWith("save "));
    if (writeObj && save) await writeFile(save.slice(5), "v 0 0 0\nv 1 0 0\nl 1 2\n");
    return { stdout: Buffer.alloc(0), stderr: Buffer.alloc(0), code: 0 };
  };
}

describe("buildPymolScript", () => {
  it("fetches an ID and selects a chain", () => {
    const script = buildPymolScript({ kind: "remote", pdbId: "1crn" }, "/c/1CRN_A.obj", { chain: "a", fetchDir: "/c" });
    expect(script).toBe(
      "set fetch_path, /c\nfetch 1CRN, async=0\nselect sel, chain A\nhide everything\nshow cartoon, sel\n" +
        "set cartoon_sampling, 3\nsave /c/1CRN_A.obj\nquit\n",
    );
  });

  it("loads a local file and shows every chain", () => {
    const script = buildPymolScript({ kind: "file", path: "/data/prot.pdb" }, "/c/local_prot.obj");
    expect(script).toBe("load /data/prot.pdb\nhide everything\nshow cartoon\nset cartoon_sampling, 3\nsave /c/local_prot.obj\nquit\n");
  });
});

describe("cartoonFileName", () => {
  it("names remote and local exports", () => {
    expect(cartoonFileName({ kind: "remote", pdbId: "4hhb" })).toBe("4HHB.obj");
    expect(cartoonFileName({ kind: "remote", pdbId: "4hhb" }, "b")).toBe("4HHB_B.obj");
    expect(cartoonFileName({ kind: "file", path: "/data/my.protein.pdb" })).toBe("local_my.protein.obj");
    expect(cartoonFileName({ kind: "file", path: "x.cif" }, "c")).toBe("local_x_C.obj");
  });
});

describe("checkPymol", () => {
  it("reports a missing executable", async () => {
    const runner: CommandRunner = async (command, args) => {
      throw new CommandError(command, args, 1, Buffer.alloc(0));
    };
    expect(await checkPymol(runner, "pymol")).toEqual({
      ok: false,
      error: "PyMOL not found (pymol). Install PyMOL or set TERMOL_PYMOL",
    });
  });

  it("accepts an executable on the path", async () => {
    expect(await checkPymol(fakePymol([]), "pymol")).toEqual({ ok: true });
  });
});

describe("exportCartoon", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "termol-pymol-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("runs PyMOL once and reuses the cached OBJ", async () => {
    const calls: Call[] = [];
    const runner = fakePymol(calls);
    const path = await exportCartoon({ kind: "remote", pdbId: "1crn" }, { cacheDir: dir, runner, pymol: "pymol" });
    expect(path).toBe(join(dir, "1CRN.obj"));
    expect(calls).toEqual([
      ["which", ["pymol"]],
      ["pymol", ["-cq", join(dir, "pymol_script.pml")]],
    ]);
    await expect(access(join(dir, "pymol_script.pml"))).rejects.toThrow();

    const again = await exportCartoon({ kind: "remote", pdbId: "1CRN" }, { cacheDir: dir, runner, pymol: "pymol" });
    expect(again).toBe(path);
    expect(calls).toHaveLength(2);
  });

  it("loads local files by absolute path", async () => {
    const file = join(dir, "prot.pdb");
    await writeFile(file, "END\n");
    const calls: Call[] = [];
    let script = "";
    const runner: CommandRunner = async (command, args) => {
      if (command !== "which") script = await readFile(args[1] ?? "", "utf8");
      return fakePymol(calls)(command, args);
    };
    const path = await exportCartoon({ kind: "file", path: file }, { chain: "a", cacheDir: dir, runner, pymol: "pymol" });
    expect(path).toBe(join(dir, "local_prot_A.obj"));
    expect(script.split("\n")[0]).toBe(`load ${await realpath(file)}`);
  });

  it("surfaces PyMOL's stderr", async () => {
    const runner = fakePymol([], { stderr: "boom\n" });
    await expect(exportCartoon({ kind: "remote", pdbId: "1crn" }, { cacheDir: dir, runner, pymol: "pymol" })).rejects.toThrow(
      "PyMOL failed: boom",
    );
  });

  it("fails when no OBJ is produced", async () => {
    const runner = fakePymol([], { writeObj: false });
    await expect(exportCartoon({ kind: "remote", pdbId: "0xxx" }, { cacheDir: dir, runner, pymol: "pymol" })).rejects.toThrow(
      "PyMOL did not create OBJ file. Check PDB ID.",
    );
  });
});
