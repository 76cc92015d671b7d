/**
 * Unit tests for export document parsing and username normalization
 */

import { describe, it, expect } from "vitest";
import {
  detectDocumentShape,
  normalizeUsername,
  parseExportDocument,
  resolveEntryUsername,
  stringListDataExtractor,
  usernameFieldExtractor,
  valueFieldExtractor,
  ENTRY_EXTRACTORS,
} from "../src/parser.js";
import {
  createFollowersExport,
  createFollowingExport,
  createListExport,
  createStringListEntry,
} from "./test-utils.js";

describe("normalizeUsername", () => {
  it("should fold case, strip '@' and trim to the same identifier", () => {
    expect(normalizeUsername("@Foo")).toBe("foo");
    expect(normalizeUsername("foo")).toBe("foo");
    expect(normalizeUsername(" foo ")).toBe("foo");
  });

  it("should strip only one leading '@'", () => {
    expect(normalizeUsername("@@foo")).toBe("@foo");
  });

  it("should trim before stripping '@'", () => {
    expect(normalizeUsername("  @Bob.Smith  ")).toBe("bob.smith");
  });

  it("should keep an '@' that is not leading", () => {
    expect(normalizeUsername("foo@bar")).toBe("foo@bar");
  });

  it("should return an empty string for a lone '@'", () => {
    expect(normalizeUsername("@")).toBe("");
  });

  it("should replace unpaired surrogates with U+FFFD", () => {
    expect(normalizeUsername("x\ud800")).toBe("x\ufffd");
    expect(normalizeUsername("\udfffY")).toBe("\ufffdy");
  });

  it("should keep valid surrogate pairs", () => {
    expect(normalizeUsername("star\ud83c\udf1f")).toBe("star\ud83c\udf1f");
  });
});

describe("detectDocumentShape", () => {
  it("should use a top-level array directly", () => {
    const shape = detectDocumentShape([1, 2]);
    expect(shape).toEqual({ kind: "top-level-list", entries: [1, 2] });
  });

  it("should find entries under relationships_following", () => {
    const shape = detectDocumentShape({ relationships_following: ["a"] });
    expect(shape).toEqual({
      kind: "keyed-list",
      key: "relationships_following",
      entries: ["a"],
    });
  });

  it("should probe known keys in priority order", () => {
    const shape = detectDocumentShape({
      followers: ["from-followers"],
      following: ["from-following"],
      relationships_followers: ["from-relationships"],
    });
    expect(shape).toEqual({
      kind: "keyed-list",
      key: "relationships_followers",
      entries: ["from-relationships"],
    });
  });

  it("should skip a known key whose value is not an array", () => {
    const shape = detectDocumentShape({
      relationships_following: { nested: true },
      following: ["x"],
    });
    expect(shape).toEqual({
      kind: "keyed-list",
      key: "following",
      entries: ["x"],
    });
  });

  it("should fall back to the first array-valued property", () => {
    const shape = detectDocumentShape({
      version: 2,
      accounts: ["first"],
      more: ["second"],
    });
    expect(shape).toEqual({
      kind: "first-list-value",
      key: "accounts",
      entries: ["first"],
    });
  });

  it("should report empty for an object without arrays", () => {
    expect(detectDocumentShape({ a: 1, b: "two" })).toEqual({ kind: "empty" });
  });

  it("should report empty for scalars and null", () => {
    expect(detectDocumentShape(null)).toEqual({ kind: "empty" });
    expect(detectDocumentShape(42)).toEqual({ kind: "empty" });
    expect(detectDocumentShape("followers")).toEqual({ kind: "empty" });
  });
});

describe("entry extractors", () => {
  it("should list extractors in priority order", () => {
    expect(ENTRY_EXTRACTORS.map((extractor) => extractor.name)).toEqual([
      "string_list_data",
      "username",
      "value",
    ]);
  });

  describe("stringListDataExtractor", () => {
    it("should read the first record's value", () => {
      const entry = {
        string_list_data: [{ value: "first" }, { value: "second" }],
      };
      expect(stringListDataExtractor.extract(entry)).toBe("first");
    });

    it("should not apply to an empty list", () => {
      expect(stringListDataExtractor.extract({ string_list_data: [] })).toBe(
        null,
      );
    });

    it("should not apply when the first record is not an object", () => {
      expect(
        stringListDataExtractor.extract({ string_list_data: ["alice"] }),
      ).toBe(null);
    });

    it("should not apply to a non-string value", () => {
      expect(
        stringListDataExtractor.extract({ string_list_data: [{ value: 7 }] }),
      ).toBe(null);
    });

    it("should not apply to a blank value", () => {
      expect(
        stringListDataExtractor.extract({ string_list_data: [{ value: "  " }] }),
      ).toBe(null);
    });
  });

  it("usernameFieldExtractor should read a direct username", () => {
    expect(usernameFieldExtractor.extract({ username: "Carol" })).toBe(
      "Carol",
    );
    expect(usernameFieldExtractor.extract({ username: 12 })).toBe(null);
  });

  it("valueFieldExtractor should read a direct value", () => {
    expect(valueFieldExtractor.extract({ value: "@dave" })).toBe("@dave");
    expect(valueFieldExtractor.extract({ value: "" })).toBe(null);
  });
});

describe("resolveEntryUsername", () => {
  it("should prefer string_list_data over a different username field", () => {
    const entry = {
      username: "from_username",
      string_list_data: [{ value: "from_list" }],
    };
    expect(resolveEntryUsername(entry)).toBe("from_list");
  });

  it("should prefer username over value", () => {
    expect(resolveEntryUsername({ value: "v", username: "u" })).toBe("u");
  });

  it("should fall through a blank string_list_data value", () => {
    const entry = { string_list_data: [{ value: " " }], username: "erin" };
    expect(resolveEntryUsername(entry)).toBe("erin");
  });

  it("should fall through a blank username to value", () => {
    expect(resolveEntryUsername({ username: "", value: "frank" })).toBe(
      "frank",
    );
  });

  it("should return null for non-object entries", () => {
    expect(resolveEntryUsername(5)).toBe(null);
    expect(resolveEntryUsername("alice")).toBe(null);
    expect(resolveEntryUsername(null)).toBe(null);
    expect(resolveEntryUsername([{ username: "alice" }])).toBe(null);
  });

  it("should return null when nothing resolves", () => {
    expect(resolveEntryUsername({ title: "no usernames here" })).toBe(null);
  });

  it("should use a custom extractor list when given", () => {
    const entry = { username: "u", value: "v" };
    expect(resolveEntryUsername(entry, [valueFieldExtractor])).toBe("v");
  });
});

describe("parseExportDocument", () => {
  it("should normalize the following scenario", () => {
    const document = {
      relationships_following: [
        { string_list_data: [{ value: "Alice" }] },
        { string_list_data: [{ value: "@bob" }] },
      ],
    };

    const parsed = parseExportDocument(document);

    expect([...parsed.usernames]).toEqual(["alice", "bob"]);
    expect(parsed.shape).toBe("keyed-list");
    expect(parsed.totalEntries).toBe(2);
    expect(parsed.skippedEntries).toBe(0);
  });

  it("should give the same set for a keyed document and a bare list", () => {
    const values = ["Alice", "@bob", " carol "];
    const keyed = parseExportDocument(createFollowingExport(values));
    const bare = parseExportDocument(createListExport(values));

    expect(keyed.usernames).toEqual(bare.usernames);
    expect(keyed.shape).toBe("keyed-list");
    expect(bare.shape).toBe("top-level-list");
  });

  it("should skip non-object entries without failing", () => {
    const document = {
      relationships_followers: [
        42,
        "mallory",
        null,
        createStringListEntry("grace"),
        true,
      ],
    };

    const parsed = parseExportDocument(document);

    expect([...parsed.usernames]).toEqual(["grace"]);
    expect(parsed.totalEntries).toBe(5);
    expect(parsed.skippedEntries).toBe(4);
  });

  it("should collapse duplicates after normalization", () => {
    const parsed = parseExportDocument(
      createFollowersExport(["Heidi", "@heidi", " HEIDI "]),
    );

    expect([...parsed.usernames]).toEqual(["heidi"]);
    expect(parsed.skippedEntries).toBe(0);
  });

  it("should keep a username that normalizes to an empty string", () => {
    const parsed = parseExportDocument([{ username: "@" }, { username: "x" }]);

    expect([...parsed.usernames]).toEqual(["", "x"]);
    expect(parsed.usernames.size).toBe(2);
    expect(parsed.skippedEntries).toBe(0);
  });

  it("should merge usernames that differ only in unpaired surrogates", () => {
    const parsed = parseExportDocument([
      { username: "x\ud800" },
      { username: "x\udfff" },
    ]);

    expect([...parsed.usernames]).toEqual(["x\ufffd"]);
  });

  it("should return an empty set for an empty document", () => {
    const parsed = parseExportDocument({});

    expect(parsed.usernames.size).toBe(0);
    expect(parsed.shape).toBe("empty");
    expect(parsed.totalEntries).toBe(0);
  });

  it("should be idempotent and leave the input untouched", () => {
    const document = createFollowingExport(["Judy", "@Ken"]);
    const before = JSON.stringify(document);

    const first = parseExportDocument(document);
    const second = parseExportDocument(document);

    expect(first.usernames).toEqual(second.usernames);
    expect(JSON.stringify(document)).toBe(before);
  });
});
