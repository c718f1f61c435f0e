/**
 * @module formats/dsv
 * @description Delimiter-separated table reading (simulation and label tables)
 */

export { COMMENT_PREFIXES, DEFAULT_DELIMITERS, DEFAULT_NULL_VALUES, DEFAULT_QUOTE } from "./constants";
export { DSVParser, parseTable, readTable, rowValues } from "./parser";
export type { DSVParserOptions } from "./parser";
export { countUnescapedQuotes, hasBalancedQuotes, parseCSVRow } from "./state-machine";
