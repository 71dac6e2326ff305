import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import type { SearchObject } from "imapflow";

dayjs.extend(customParseFormat);

/**
 * imapflow's search object plus the TEXT and NOT keys its compiler accepts.
 */
export interface SearchCriteria extends SearchObject {
  text?: string;
  not?: SearchCriteria;
  or?: SearchCriteria[];
}

export class SearchSyntaxError extends Error {
  constructor(
    message: string,
    public readonly criteria: string,
  ) {
    super(message);
    this.name = "SearchSyntaxError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SearchSyntaxError);
    }
  }
}

type Token =
  | { kind: "atom"; value: string }
  | { kind: "string"; value: string }
  | { kind: "open" }
  | { kind: "close" };

const DATE_FORMATS = ["D-MMM-YYYY", "DD-MMM-YYYY"];
const SEQUENCE_SET = /^[\d*][\d*:,]*$/;

const FLAG_KEYS = new Map<string, SearchCriteria>([
  ["ALL", { all: true }],
  ["ANSWERED", { answered: true }],
  ["UNANSWERED", { answered: false }],
  ["DELETED", { deleted: true }],
  ["UNDELETED", { deleted: false }],
  ["DRAFT", { draft: true }],
  ["UNDRAFT", { draft: false }],
  ["FLAGGED", { flagged: true }],
  ["UNFLAGGED", { flagged: false }],
  ["SEEN", { seen: true }],
  ["UNSEEN", { seen: false }],
  ["NEW", { new: true }],
  ["OLD", { old: true }],
  ["RECENT", { recent: true }],
]);

const STRING_KEYS = new Map<string, (value: string) => SearchCriteria>([
  ["BCC", (value) => ({ bcc: value })],
  ["BODY", (value) => ({ body: value })],
  ["CC", (value) => ({ cc: value })],
  ["FROM", (value) => ({ from: value })],
  ["SUBJECT", (value) => ({ subject: value })],
  ["TEXT", (value) => ({ text: value })],
  ["TO", (value) => ({ to: value })],
  ["KEYWORD", (value) => ({ keyword: value })],
  ["UNKEYWORD", (value) => ({ unKeyword: value })],
  ["UID", (value) => ({ uid: value })],
]);

const DATE_KEYS = new Map<string, (value: Date) => SearchCriteria>([
  ["BEFORE", (value) => ({ before: value })],
  ["ON", (value) => ({ on: value })],
  ["SINCE", (value) => ({ since: value })],
  ["SENTBEFORE", (value) => ({ sentBefore: value })],
  ["SENTON", (value) => ({ sentOn: value })],
  ["SENTSINCE", (value) => ({ sentSince: value })],
]);

const NUMBER_KEYS = new Map<string, (value: number) => SearchCriteria>([
  ["LARGER", (value) => ({ larger: value })],
  ["SMALLER", (value) => ({ smaller: value })],
]);

function tokenize(criteria: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < criteria.length) {
    const char = criteria[pos];

    if (/\s/.test(char)) {
      pos++;
    } else if (char === "(") {
      tokens.push({ kind: "open" });
      pos++;
    } else if (char === ")") {
      tokens.push({ kind: "close" });
      pos++;
    } else if (char === '"') {
      let value = "";
      pos++;
      while (pos < criteria.length && criteria[pos] !== '"') {
        if (criteria[pos] === "\\" && pos + 1 < criteria.length) {
          pos++;
        }
        value += criteria[pos];
        pos++;
      }
      if (pos >= criteria.length) {
        throw new SearchSyntaxError("Unterminated quoted string", criteria);
      }
      pos++;
      tokens.push({ kind: "string", value });
    } else {
      const start = pos;
      while (pos < criteria.length && !/[\s()"]/.test(criteria[pos])) {
        pos++;
      }
      tokens.push({ kind: "atom", value: criteria.slice(start, pos) });
    }
  }

  return tokens;
}

/**
 * Fold one search key into the conjunction built so far. imapflow's object
 * form holds each key once, so repeating a key outside OR/NOT is rejected.
 */
function merge(
  target: SearchCriteria,
  part: SearchCriteria,
  criteria: string,
): void {
  const { header, ...rest } = part;

  const clash = Object.keys(rest).find((key) => key !== "all" && key in target);
  if (clash) {
    throw new SearchSyntaxError(
      `Search key ${clash.toUpperCase()} may appear only once outside OR and NOT`,
      criteria,
    );
  }

  Object.assign(target, rest);
  if (header) {
    target.header = { ...target.header, ...header };
  }
}

class CriteriaParser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly criteria: string,
  ) {}

  parse(): SearchCriteria {
    const query = this.parseKeys(false);
    return Object.keys(query).length === 0 ? { all: true } : query;
  }

  private parseKeys(inGroup: boolean): SearchCriteria {
    const query: SearchCriteria = {};

    while (this.pos < this.tokens.length) {
      if (this.tokens[this.pos].kind === "close") {
        if (!inGroup) {
          throw this.error("Unbalanced ')'");
        }
        this.pos++;
        return query;
      }
      merge(query, this.parseKey(), this.criteria);
    }

    if (inGroup) {
      throw this.error("Missing ')'");
    }
    return query;
  }

  private parseKey(): SearchCriteria {
    const token = this.next("search key");

    if (token.kind === "open") {
      return this.parseKeys(true);
    }
    if (token.kind !== "atom") {
      throw this.error(`Expected a search key, got ${token.kind}`);
    }

    const key = token.value.toUpperCase();

    const flagKey = FLAG_KEYS.get(key);
    if (flagKey) return { ...flagKey };

    const stringKey = STRING_KEYS.get(key);
    if (stringKey) return stringKey(this.nextString(key));

    const dateKey = DATE_KEYS.get(key);
    if (dateKey) return dateKey(this.nextDate(key));

    const numberKey = NUMBER_KEYS.get(key);
    if (numberKey) return numberKey(this.nextNumber(key));

    switch (key) {
      case "HEADER": {
        const field = this.nextString(key);
        return { header: { [field]: this.nextString(key) } };
      }
      case "NOT":
        return { not: this.parseKey() };
      case "OR":
        return { or: [this.parseKey(), this.parseKey()] };
    }

    if (SEQUENCE_SET.test(token.value)) {
      return { seq: token.value };
    }

    throw this.error(`Unknown search key '${token.value}'`);
  }

  private next(expected: string): Token {
    const token = this.tokens[this.pos];
    if (token === undefined) {
      throw this.error(`Unexpected end of criteria, expected ${expected}`);
    }
    this.pos++;
    return token;
  }

  private nextString(key: string): string {
    const token = this.next(`an argument to ${key}`);
    if (token.kind === "atom" || token.kind === "string") {
      return token.value;
    }
    throw this.error(`${key} needs a string argument`);
  }

  private nextNumber(key: string): number {
    const value = this.nextString(key);
    if (!/^\d+$/.test(value)) {
      throw this.error(`${key} needs a number, got '${value}'`);
    }
    return Number.parseInt(value, 10);
  }

  private nextDate(key: string): Date {
    const value = this.nextString(key);
    const parsed = dayjs(value, DATE_FORMATS, true);
    if (!parsed.isValid()) {
      throw this.error(`${key} needs a date like 1-Feb-1994, got '${value}'`);
    }
    return new Date(Date.UTC(parsed.year(), parsed.month(), parsed.date()));
  }

  private error(message: string): SearchSyntaxError {
    return new SearchSyntaxError(message, this.criteria);
  }
}

/**
 * Translate IMAP search criteria (RFC 3501 section 6.4.4) into the object
 * form imapflow compiles back into a SEARCH command.
 *
 * @example
 *   parseSearchCriteria('(UNSEEN OR FROM "Smith" SUBJECT report)')
 *   // { seen: false, or: [{ from: "Smith" }, { subject: "report" }] }
 */
export function parseSearchCriteria(criteria: string): SearchCriteria {
  return new CriteriaParser(tokenize(criteria), criteria).parse();
}
