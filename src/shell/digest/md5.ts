// CHANGE: Default code digest used for hash annotations and taint comparison
// WHY: Recording services hash taint ranges as MD5 of the code with whitespace removed; equal inputs must give equal hashes
// PURITY: SHELL (node:crypto), deterministic
// INVARIANT: ∀x: md5WithoutWhitespace(x) = md5WithoutWhitespace(x); whitespace-only differences hash equal
// COMPLEXITY: O(n) where n = |code|

import type { CodeDigest } from "../../core/locations/context.js";
import { createHash } from "../utils/node-mods.js";

// ASCII whitespace only; non-breaking and other Unicode spaces are part of the code
const WHITESPACE = /[ \t\n\v\f\r]/gu;

/**
 * Lowercase hex MD5 of the code with ASCII whitespace removed.
 *
 * @example
 * ```ts
 * md5WithoutWhitespace(""); // "d41d8cd98f00b204e9800998ecf8427e"
 * ```
 */
export const md5WithoutWhitespace: CodeDigest = (code) =>
	createHash("md5").update(code.replace(WHITESPACE, ""), "utf8").digest("hex");
