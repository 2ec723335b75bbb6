/**
 * Version constant read from package.json at module load time
 */
import pkg from "../package.json" with { type: "json" };

export const VERSION: string = pkg.version;
