import { describe, expect, it } from "vitest";
import {
  parseSearchCriteria,
  SearchSyntaxError,
} from "../src/utils/searchQuery.js";

describe("parseSearchCriteria", () => {
  it("should map ALL and empty criteria to all messages", () => {
    expect(parseSearchCriteria("ALL")).toEqual({ all: true });
    expect(parseSearchCriteria("(ALL)")).toEqual({ all: true });
    expect(parseSearchCriteria("")).toEqual({ all: true });
  });

  it("should map flag keys and their negations", () => {
    expect(parseSearchCriteria("(UNSEEN UNDELETED)")).toEqual({
      seen: false,
      deleted: false,
    });
    expect(parseSearchCriteria("flagged answered draft")).toEqual({
      flagged: true,
      answered: true,
      draft: true,
    });
  });

  it("should read quoted and atom string arguments", () => {
    expect(parseSearchCriteria('FROM "Smith" SUBJECT report')).toEqual({
      from: "Smith",
      subject: "report",
    });
  });

  it("should unescape quoted strings", () => {
    expect(parseSearchCriteria('SUBJECT "say \\"hi\\""')).toEqual({
      subject: 'say "hi"',
    });
  });

  it("should parse dates as UTC midnight", () => {
    const query = parseSearchCriteria("SINCE 1-Feb-1994 BEFORE 15-Mar-1994");
    expect(query.since).toEqual(new Date("1994-02-01T00:00:00.000Z"));
    expect(query.before).toEqual(new Date("1994-03-15T00:00:00.000Z"));
  });

  it("should parse size and keyword keys", () => {
    expect(
      parseSearchCriteria("LARGER 1000 SMALLER 5000 KEYWORD $Label1"),
    ).toEqual({ larger: 1000, smaller: 5000, keyword: "$Label1" });
  });

  it("should build NOT and OR terms", () => {
    expect(parseSearchCriteria('FLAGGED NOT FROM "Smith"')).toEqual({
      flagged: true,
      not: { from: "Smith" },
    });
    expect(parseSearchCriteria("OR SEEN (FLAGGED TO bob)")).toEqual({
      or: [{ seen: true }, { flagged: true, to: "bob" }],
    });
  });

  it("should merge HEADER keys", () => {
    expect(
      parseSearchCriteria('HEADER List-Id "dev" HEADER X-Priority 1'),
    ).toEqual({ header: { "List-Id": "dev", "X-Priority": "1" } });
  });

  it("should map UID and sequence sets", () => {
    expect(parseSearchCriteria("UID 5:12")).toEqual({ uid: "5:12" });
    expect(parseSearchCriteria("1:*")).toEqual({ seq: "1:*" });
  });

  it("should reject unknown keys", () => {
    expect(() => parseSearchCriteria("FOO")).toThrow(SearchSyntaxError);
    expect(() => parseSearchCriteria("FOO")).toThrow("Unknown search key 'FOO'");
  });

  it("should reject missing arguments", () => {
    expect(() => parseSearchCriteria("FROM")).toThrow(
      "Unexpected end of criteria, expected an argument to FROM",
    );
    expect(() => parseSearchCriteria("LARGER big")).toThrow(
      "LARGER needs a number, got 'big'",
    );
    expect(() => parseSearchCriteria("SINCE 1994-02-01")).toThrow(
      "SINCE needs a date like 1-Feb-1994, got '1994-02-01'",
    );
  });

  it("should reject unbalanced parentheses and quotes", () => {
    expect(() => parseSearchCriteria("(SEEN")).toThrow("Missing ')'");
    expect(() => parseSearchCriteria("SEEN)")).toThrow("Unbalanced ')'");
    expect(() => parseSearchCriteria('FROM "Smith')).toThrow(
      "Unterminated quoted string",
    );
  });

  it("should reject a repeated key outside OR", () => {
    expect(() => parseSearchCriteria("FROM a FROM b")).toThrow(
      "Search key FROM may appear only once outside OR and NOT",
    );
  });

  it("should keep the criteria on the error", () => {
    try {
      parseSearchCriteria("BOGUS");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SearchSyntaxError);
      if (error instanceof SearchSyntaxError) {
        expect(error.criteria).toBe("BOGUS");
      }
    }
  });
});
