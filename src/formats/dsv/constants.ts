/**
 * DSV Format Constants
 */

/**
 * Default delimiter for different formats
 */
export const DEFAULT_DELIMITERS = {
  csv: ",",
  tsv: "\t",
} as const;

/**
 * Default quote character (RFC 4180 compliant)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Cell values read as missing, matching what table tools write for NA
 */
export const DEFAULT_NULL_VALUES = [
  "",
  "NA",
  "N/A",
  "NaN",
  "nan",
  "null",
  "NULL",
  "None",
] as const;

/**
 * Comment prefixes skipped before the header
 */
export const COMMENT_PREFIXES = ["#"] as const;
