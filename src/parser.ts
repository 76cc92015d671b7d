/**
 * Parser for follower / following export documents
 */

import { KNOWN_LIST_KEYS } from "./types.js";
import type {
  DocumentShape,
  EntryExtractor,
  JsonObject,
  ParsedExportDocument,
} from "./types.js";
import { isJsonObject, isNonBlankString } from "./utils.js";

/**
 * Field holding the nested `[{ value, href, timestamp }]` records in
 * current exports
 */
export const STRING_LIST_FIELD = "string_list_data";

/**
 * Locates the entries array of an export document
 *
 * Rules, in priority order:
 * 1. The document itself is an array
 * 2. The document is an object with an array under one of KNOWN_LIST_KEYS
 * 3. The document is an object with any array-valued property (first one wins)
 * 4. Otherwise there are no entries
 *
 * @param document - Parsed JSON value of one export file
 * @returns Tagged shape carrying the entries it found
 */
export function detectDocumentShape(document: unknown): DocumentShape {
  if (Array.isArray(document)) {
    return { kind: "top-level-list", entries: document };
  }

  if (!isJsonObject(document)) {
    return { kind: "empty" };
  }

  for (const key of KNOWN_LIST_KEYS) {
    const value = document[key];
    if (Array.isArray(value)) {
      return { kind: "keyed-list", key, entries: value };
    }
  }

  for (const [key, value] of Object.entries(document)) {
    if (Array.isArray(value)) {
      return { kind: "first-list-value", key, entries: value };
    }
  }

  return { kind: "empty" };
}

/**
 * Reads `string_list_data[0].value`
 */
export const stringListDataExtractor: EntryExtractor = {
  name: STRING_LIST_FIELD,
  extract(entry: JsonObject): string | null {
    const list = entry[STRING_LIST_FIELD];
    if (!Array.isArray(list) || list.length === 0) {
      return null;
    }

    const first: unknown = list[0];
    if (!isJsonObject(first)) {
      return null;
    }

    const value = first.value;
    return isNonBlankString(value) ? value : null;
  },
};

function directFieldExtractor(field: string): EntryExtractor {
  return {
    name: field,
    extract(entry: JsonObject): string | null {
      const value = entry[field];
      return isNonBlankString(value) ? value : null;
    },
  };
}

/** Reads a top-level `username` field */
export const usernameFieldExtractor = directFieldExtractor("username");

/** Reads a top-level `value` field */
export const valueFieldExtractor = directFieldExtractor("value");

/**
 * Extraction strategies in priority order; the first non-null result wins
 */
export const ENTRY_EXTRACTORS: readonly EntryExtractor[] = [
  stringListDataExtractor,
  usernameFieldExtractor,
  valueFieldExtractor,
];

/**
 * Resolves the raw username of a single entry
 *
 * @param entry - One element of the entries array
 * @param extractors - Strategies to try (default: ENTRY_EXTRACTORS)
 * @returns The raw username, or null if the entry is not an object or no strategy applies
 */
export function resolveEntryUsername(
  entry: unknown,
  extractors: readonly EntryExtractor[] = ENTRY_EXTRACTORS,
): string | null {
  if (!isJsonObject(entry)) {
    return null;
  }

  for (const extractor of extractors) {
    const value = extractor.extract(entry);
    if (value !== null) {
      return value;
    }
  }

  return null;
}

const UNPAIRED_SURROGATE =
  /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Normalizes a username for comparison: trims whitespace, drops one
 * leading '@' and lowercases
 *
 * Unpaired surrogates become U+FFFD, which is what the UTF-8 store turns
 * them into, so in-memory sets and the database agree on identity.
 *
 * @param username - The raw username
 * @returns Canonical username (may be empty)
 */
export function normalizeUsername(username: string): string {
  const trimmed = username.replace(UNPAIRED_SURROGATE, "\uFFFD").trim();
  const withoutAt = trimmed.startsWith("@") ? trimmed.slice(1) : trimmed;
  return withoutAt.toLowerCase();
}

/**
 * Parses an export document into a set of canonical usernames
 *
 * Entries that are not objects or that no extractor understands are
 * skipped and counted. A username that normalizes to an empty string (a
 * lone '@') is kept.
 *
 * @param document - Parsed JSON value of one export file
 * @returns Usernames plus bookkeeping about what was found
 */
export function parseExportDocument(document: unknown): ParsedExportDocument {
  const shape = detectDocumentShape(document);
  const entries = shape.kind === "empty" ? [] : shape.entries;

  const usernames = new Set<string>();
  let skippedEntries = 0;

  for (const entry of entries) {
    const raw = resolveEntryUsername(entry);
    if (raw === null) {
      skippedEntries++;
      continue;
    }

    usernames.add(normalizeUsername(raw));
  }

  return {
    usernames,
    shape: shape.kind,
    totalEntries: entries.length,
    skippedEntries,
  };
}
