/**
 * Reads export files from disk
 */

import { existsSync, readFileSync } from "fs";
import { basename } from "path";
import type { ParsedExportDocument } from "./types.js";
import { parseExportDocument } from "./parser.js";
import { InputReadError, describeError } from "./errors.js";

const BYTE_ORDER_MARK = "\uFEFF";

/**
 * Reads and parses the JSON content of an export file
 *
 * @param path - Path to the export file
 * @returns The parsed JSON value
 * @throws InputReadError if the file is missing, unreadable or not JSON
 */
export function readExportDocument(path: string): unknown {
  if (!existsSync(path)) {
    throw new InputReadError(
      path,
      `Missing ${basename(path)}. Put it in the directory you run from.`,
    );
  }

  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    throw new InputReadError(
      path,
      `Could not read ${path}: ${describeError(error)}`,
      error,
    );
  }

  if (text.startsWith(BYTE_ORDER_MARK)) {
    text = text.slice(BYTE_ORDER_MARK.length);
  }

  try {
    const document: unknown = JSON.parse(text);
    return document;
  } catch (error) {
    throw new InputReadError(
      path,
      `${path} is not valid JSON: ${describeError(error)}`,
      error,
    );
  }
}

/**
 * Loads one export file and normalizes its usernames
 *
 * @param path - Path to followers.json or following.json
 * @returns Canonical usernames and parse bookkeeping
 * @throws InputReadError if the file cannot be read or parsed
 */
export function loadExportFile(path: string): ParsedExportDocument {
  return parseExportDocument(readExportDocument(path));
}
