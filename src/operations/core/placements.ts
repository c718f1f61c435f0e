/**
 * Parser for synthetic placement tokens
 *
 * Simulated sequences record each embedded motif as
 * `pos-<start>_<motif>-<label>`, e.g. `pos-10_TAL1-AAAA`. The label is the
 * embedded nucleotide string; its length gives the placement span. Motif
 * names may contain `_` (`GATA1_known2`), in which case only the part before
 * the first `_` names the placement.
 *
 * Malformed tokens throw {@link PlacementParseError}.
 *
 * @module placements
 * @since v0.1.0
 */

import { PlacementParseError } from "../../errors";
import type { Placement } from "../../types";

const TOKEN_PREFIX = "pos-";
const TOKEN_SEPARATOR = ",";
const PLACEMENT_PATTERN = /^pos-(\d+)_([^-]+)-([^-]+)$/;

/**
 * Parse one placement token
 *
 * @throws {PlacementParseError} When the token does not match
 *   `pos-<start>_<motif>-<label>`
 *
 * @example
 * ```typescript
 * parsePlacement("pos-10_TAL1-AAAA");
 * // { start: 10, end: 14, name: "TAL1", label: "AAAA", token: "pos-10_TAL1-AAAA" }
 * ```
 */
export function parsePlacement(token: string, row?: number): Placement {
  if (!token.startsWith(TOKEN_PREFIX)) {
    throw new PlacementParseError(`Placement must start with '${TOKEN_PREFIX}'`, token, row);
  }

  const match = PLACEMENT_PATTERN.exec(token);
  if (match === null) {
    throw new PlacementParseError("Malformed placement", token, row);
  }

  const [, startText = "", motif = "", label = ""] = match;
  const start = Number.parseInt(startText, 10);
  if (!Number.isSafeInteger(start)) {
    throw new PlacementParseError("Placement start out of range", token, row);
  }

  const underscore = motif.indexOf("_");
  const name = underscore === -1 ? motif : motif.slice(0, underscore);
  if (name === "") {
    throw new PlacementParseError("Placement has an empty motif name", token, row);
  }

  return { start, end: start + label.length, name, label, token };
}

/**
 * Split and parse a comma-separated placement field
 *
 * Surrounding whitespace on each token is ignored; empty tokens are rejected.
 */
export function parsePlacements(field: string, row?: number): Placement[] {
  return field.split(TOKEN_SEPARATOR).map((raw) => {
    const token = raw.trim();
    if (token === "") {
      throw new PlacementParseError("Empty placement token", raw, row);
    }
    return parsePlacement(token, row);
  });
}

/**
 * Format a placement back into its token form
 */
export function formatPlacement(start: number, motif: string, label: string): string {
  return `${TOKEN_PREFIX}${start}_${motif}-${label}`;
}
