/**
 * One-hot nucleotide encoding for model input
 *
 * Column order is A, C, G, T. `N`/`n` leaves its row all-zero; any other
 * character is rejected.
 *
 * @module one-hot
 * @since v0.1.0
 *
 * @example
 * ```typescript
 * const matrix = encodeOneHot("ACGTN");
 * oneHotRows(matrix);
 * // [[1,0,0,0],[0,1,0,0],[0,0,1,0],[0,0,0,1],[0,0,0,0]]
 * ```
 */

import { ShapeMismatchError, UnsupportedCharacterError } from "../../errors";
import type { OneHotMatrix, SequenceWindow } from "../../types";

/** Number of columns per row (A, C, G, T) */
export const ALPHABET_SIZE = 4;

const NO_COLUMN = -1;
const INVALID = -2;

// Char code -> column; NO_COLUMN for N, INVALID for everything else
const COLUMN_LOOKUP: Int8Array = (() => {
  const lookup = new Int8Array(128).fill(INVALID);
  const columns: Record<string, number> = { A: 0, C: 1, G: 2, T: 3, N: NO_COLUMN };
  for (const [base, column] of Object.entries(columns)) {
    lookup[base.charCodeAt(0)] = column;
    lookup[base.toLowerCase().charCodeAt(0)] = column;
  }
  return lookup;
})();

/**
 * Column for a single nucleotide, or -1 for `N`
 *
 * @throws {UnsupportedCharacterError} For characters outside A, C, G, T, N
 */
export function nucleotideColumn(character: string, position = 0): number {
  const code = character.charCodeAt(0);
  const column = code < COLUMN_LOOKUP.length ? (COLUMN_LOOKUP[code] ?? INVALID) : INVALID;
  if (column === INVALID || character.length !== 1) {
    throw new UnsupportedCharacterError(character, position);
  }
  return column;
}

/**
 * Encode a nucleotide sequence as a `length × 4` one-hot matrix
 *
 * The returned wrapper is frozen. `data` stays writable since typed arrays
 * cannot be frozen.
 *
 * @throws {UnsupportedCharacterError} On the first unsupported character
 *
 * 🔥 NATIVE CANDIDATE: table lookup per base
 */
export function encodeOneHot(sequence: string): OneHotMatrix {
  const data = new Float32Array(sequence.length * ALPHABET_SIZE);

  for (let position = 0; position < sequence.length; position++) {
    const code = sequence.charCodeAt(position);
    const column = code < COLUMN_LOOKUP.length ? (COLUMN_LOOKUP[code] ?? INVALID) : INVALID;

    if (column === INVALID) {
      // Report the full code point so surrogate pairs are not split
      const character = String.fromCodePoint(sequence.codePointAt(position) ?? code);
      throw new UnsupportedCharacterError(character, position);
    }
    if (column !== NO_COLUMN) {
      data[position * ALPHABET_SIZE + column] = 1;
    }
  }

  return Object.freeze({ length: sequence.length, data });
}

/**
 * Matrix rows as plain arrays
 */
export function oneHotRows(matrix: OneHotMatrix): number[][] {
  const rows: number[][] = [];
  for (let row = 0; row < matrix.length; row++) {
    const offset = row * ALPHABET_SIZE;
    rows.push(Array.from(matrix.data.subarray(offset, offset + ALPHABET_SIZE)));
  }
  return rows;
}

/**
 * Decode a matrix back into nucleotides (all-zero rows become `N`)
 */
export function decodeOneHot(matrix: OneHotMatrix): string {
  const bases = "ACGT";
  let sequence = "";
  for (let row = 0; row < matrix.length; row++) {
    const offset = row * ALPHABET_SIZE;
    let base = "N";
    for (let column = 0; column < ALPHABET_SIZE; column++) {
      if (matrix.data[offset + column] === 1) {
        base = bases.charAt(column);
        break;
      }
    }
    sequence += base;
  }
  return sequence;
}

/**
 * Stack windows into one `count × length × 4` tensor
 *
 * @returns The flat tensor data and its shape
 * @throws {ShapeMismatchError} If windows differ in length
 */
export function stackWindows(windows: readonly SequenceWindow[]): {
  data: Float32Array;
  shape: [number, number, number];
} {
  const first = windows[0];
  const length = first === undefined ? 0 : first.encoded.length;
  const stride = length * ALPHABET_SIZE;
  const data = new Float32Array(windows.length * stride);

  windows.forEach((window, index) => {
    if (window.encoded.length !== length) {
      throw new ShapeMismatchError(
        `Window ${window.index} has a different length than the first window`,
        length,
        window.encoded.length
      );
    }
    data.set(window.encoded.data, index * stride);
  });

  return { data, shape: [windows.length, length, ALPHABET_SIZE] };
}
