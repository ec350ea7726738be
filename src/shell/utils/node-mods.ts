/**
 * CHANGE: Centralized re-exports of the Node built-ins SHELL touches
 * WHY: One import block for fs/path/url/crypto keeps SHELL modules uniform and easy to fake in tests
 *
 * Invariant: re-export compatible objects/functions, avoiding `export *` for modules using `export =`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export { createHash } from "node:crypto";
export { fileURLToPath, pathToFileURL } from "node:url";

// CHANGE: Re-export through constants instead of `export *`
// WHY: node:path (and often node:fs) use `export =`, which is incompatible with `export *`
export const fs = fsNS;
export const path = pathNS;
