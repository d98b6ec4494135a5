/**
 * CHANGE: Centralized re-exports of Node built-ins used by SHELL modules
 * WHY: walkers, injector, scanner and exec helpers share the same import block
 *
 * Invariant: re-export compatible objects/functions, avoiding `export *` for modules with `export =`.
 */
import * as fsNS from "node:fs";
import * as osNS from "node:os";
import * as pathNS from "node:path";

export { execFile } from "node:child_process";
export { createInterface } from "node:readline";
export { promisify } from "node:util";

// CHANGE: Re-export through constants instead of `export *`
// WHY: node:path (and often node:fs) use `export =`, incompatible with `export *`
// REF: TypeScript limitation for `export =`
export const fs = fsNS;
export const fsPromises = fsNS.promises;
export const os = osNS;
export const path = pathNS;
