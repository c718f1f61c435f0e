/**
 * CSV State Machine Module
 *
 * RFC 4180 row splitting: quoted fields, doubled quotes, and detection of
 * rows that continue on the next line.
 */

import { DSVParseError } from "../../errors";

/**
 * Parser state for the row state machine
 */
enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * Count unescaped quotes in a line (doubled quotes are escapes)
 */
export function countUnescapedQuotes(line: string, quote: string): number {
  let count = 0;
  for (let i = 0; i < line.length; i++) {
    if (line[i] === quote) {
      if (line[i + 1] === quote) {
        i++; // Skip the escaped quote
      } else {
        count++;
      }
    }
  }
  return count;
}

/**
 * Check if quotes are balanced, i.e. the row is complete
 */
export function hasBalancedQuotes(line: string, quote: string): boolean {
  return countUnescapedQuotes(line, quote) % 2 === 0;
}

/**
 * Parse one row into fields
 *
 * @throws {DSVParseError} On an unclosed quoted field
 *
 * @example
 * ```typescript
 * parseCSVRow('seq1,"pos-10_TAL1-AAAA,pos-30_GATA1-CCCC"', ",");
 * // ["seq1", "pos-10_TAL1-AAAA,pos-30_GATA1-CCCC"]
 * ```
 */
export function parseCSVRow(line: string, delimiter = ",", quote = '"', lineNumber?: number): string[] {
  const fields: string[] = [];
  let currentField = "";
  let state = CSVParseState.FIELD_START;

  for (let i = 0; i < line.length; i++) {
    const char = line.charAt(i);

    switch (state) {
      case CSVParseState.FIELD_START:
        if (char === quote) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote) {
          if (line.charAt(i + 1) === quote) {
            // Escaped quote (doubled)
            currentField += quote;
            i++;
          } else {
            state = CSVParseState.QUOTE_IN_QUOTED;
          }
        } else {
          currentField += char;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          // Characters after closing quote: be lenient and keep them
          currentField += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        break;
    }
  }

  if (state === CSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in field", lineNumber, fields.length + 1);
  }
  if (state === CSVParseState.FIELD_START) {
    // Empty line or trailing delimiter: final field is empty
    fields.push("");
  } else {
    fields.push(currentField);
  }

  return fields;
}
