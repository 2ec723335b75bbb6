#!/usr/bin/env tsx

/**
 * termol: view protein structures and OBJ meshes in the terminal.
 *
 * Usage:
 *   termol <PDB_ID | file.pdb | file.cif | file.obj> [options]
 *   termol search <query>
 *   termol cache [clear]
 *   termol --help
 */

import { runCli } from "../src/cli/main.js";

async function main(): Promise<void> {
  process.exit(await runCli(process.argv.slice(2)));
}

await main();
