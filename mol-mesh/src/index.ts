export * from "./types/model.js";
export { createModel, emptyModel, isEmptyModel, primitiveCount, forEachPrimitive, modelBounds, type ModelInput } from "./model/createModel.js";
export { parseObjToModel, type ObjParseOptions } from "./obj/parse.js";
export { parsePdbToModel, type PdbParseOptions } from "./pdb/parse.js";
export { subsetModelByChains } from "./utils/subset.js";
export { MeshParseError, ModelUnavailableError } from "./utils/errors.js";
export { WarningCollector } from "./utils/warnings.js";
export { runCommand, CommandError, type CommandRunner, type RunCommandResult } from "./cartoon/exec.js";
export {
  buildPymolScript,
  cartoonFileName,
  checkPymol,
  exportCartoon,
  pymolExecutable,
  type CartoonExportOptions,
  type CartoonSource,
  type ToolCheck,
} from "./cartoon/pymol.js";
export { cacheDir, cacheInfo, cacheClear, ensureCacheDir, fileExists, type CacheInfo } from "./cache/cache.js";
export { isPdbId, type Fetcher } from "./rcsb/client.js";
export { searchPdb, fetchEntryTitle, type PdbSearchResult, type SearchOptions, type SearchOutcome } from "./rcsb/search.js";
export { downloadPdb, type DownloadOptions } from "./rcsb/download.js";
export { loadModel, classifyInput, type InputKind, type LoadOptions } from "./load.js";
