/**
 * DSV Format Constants
 *
 * Separators, chunk sizes and defaults for the DSV module.
 */

import { EOL } from "node:os";

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * Default delimiter for different formats
 */
export const DEFAULT_DELIMITERS = {
  csv: ",",
  tsv: "\t",
} as const;

/**
 * The only quote character; inside quoted fields it is escaped by doubling
 */
export const QUOTE = '"';

/**
 * Sentinel asking for row separator discovery
 */
export const AUTO_ROW_SEP = "auto";

/**
 * Row separator used when discovery finds no line ending at all
 */
export const DEFAULT_ROW_SEP = EOL;

/**
 * Characters read per step while looking for a line ending
 */
export const ROW_SEP_DISCOVERY_CHUNK = 1024;

/**
 * Line-ending pattern, `\r\n` preferred over a lone `\r` at the same position
 */
export const LINE_ENDING_PATTERN = /\r\n?|\n/;
