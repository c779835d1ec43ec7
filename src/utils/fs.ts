/**
 * File System Utilities
 * Reading the term lists and tables that feed an extraction
 */

import * as fsPromises from "node:fs/promises";
import { ConfigError, ErrorCode } from "../core/errors.js";
import { type DelimitedRow, delimiterFor, parseDelimited } from "./delimited.js";

/**
 * Read a file with automatic encoding detection
 * Defaults to UTF-8
 */
export async function readFileWithEncoding(
  filePath: string,
  encoding: BufferEncoding = "utf-8"
): Promise<string> {
  try {
    return await fsPromises.readFile(filePath, { encoding });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read ${filePath}: ${reason}`, ErrorCode.CONFIG_FILE_INVALID, {
      filePath,
    });
  }
}

/**
 * Lines of a term list: one identifier or label per line. Blank lines and
 * `#` comment lines are skipped, trailing ` # ...` comments stripped.
 */
export function parseTermLines(text: string): string[] {
  const terms: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line === "" || line.startsWith("#")) continue;
    const comment = line.indexOf(" #");
    const term = (comment === -1 ? line : line.slice(0, comment)).trim();
    if (term !== "") terms.push(term);
  }
  return terms;
}

export async function readTermsFile(filePath: string): Promise<string[]> {
  return parseTermLines(await readFileWithEncoding(filePath));
}

/**
 * Header-keyed rows of a TSV file, or of a CSV file when the name ends in .csv
 */
export async function readDelimitedFile(filePath: string): Promise<DelimitedRow[]> {
  return parseDelimited(await readFileWithEncoding(filePath), delimiterFor(filePath));
}
