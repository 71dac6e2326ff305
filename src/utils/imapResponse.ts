import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat.js";
import utc from "dayjs/plugin/utc.js";
import { MalformedResponseError } from "../types/errors.js";
import type { ResponseRecord } from "../types/session.types.js";

dayjs.extend(customParseFormat);
dayjs.extend(utc);

const INTERNAL_DATE_FORMAT = "D-MMM-YYYY HH:mm:ss ZZ";

const FLAGS_PATTERN = /FLAGS \(([^)]*)\)/;
const SIZE_PATTERN = /RFC822\.SIZE (\d+)/;
const INTERNAL_DATE_PATTERN = /INTERNALDATE "([^"]+)"/;

/**
 * Parse the body of a SEARCH reply ("5 9 12") into UIDs.
 */
export function parseUidList(record: ResponseRecord | undefined): number[] {
  if (typeof record !== "string") {
    throw new MalformedResponseError(
      "Expected a textual UID list in search response",
      record,
    );
  }

  const tokens = record.trim().split(/\s+/).filter((token) => token !== "");
  return tokens.map((token) => {
    if (!/^\d+$/.test(token)) {
      throw new MalformedResponseError(
        `Unparsable UID '${token}' in search response`,
        record,
      );
    }
    return Number.parseInt(token, 10);
  });
}

export function parseFlags(line: string): Set<string> {
  const match = FLAGS_PATTERN.exec(line);
  if (!match) {
    throw new MalformedResponseError(
      "No FLAGS list found in fetch response",
      line,
    );
  }
  return new Set(splitFlags(match[1]));
}

/**
 * Parse a parenthesized flag list such as `(\Seen \Flagged)`.
 */
export function parseFlagList(flagString: string): string[] {
  const trimmed = flagString.trim();
  if (!trimmed.startsWith("(") || !trimmed.endsWith(")")) {
    throw new MalformedResponseError(
      `Flag list '${flagString}' is not parenthesized`,
      flagString,
    );
  }
  return splitFlags(trimmed.slice(1, -1));
}

function splitFlags(list: string): string[] {
  return list.split(/\s+/).filter((flag) => flag !== "");
}

export function parseSize(line: string): number {
  const match = SIZE_PATTERN.exec(line);
  if (!match) {
    throw new MalformedResponseError(
      "No RFC822.SIZE field found in fetch response",
      line,
    );
  }
  return Number.parseInt(match[1], 10);
}

export function parseInternalDate(line: string): Date {
  const match = INTERNAL_DATE_PATTERN.exec(line);
  if (!match) {
    throw new MalformedResponseError(
      "No INTERNALDATE field found in fetch response",
      line,
    );
  }

  return parseImapDateTime(match[1]);
}

/**
 * Parse an IMAP date-time, with or without surrounding quotes.
 */
export function parseImapDateTime(value: string): Date {
  // date-day-fixed may be space padded (" 7-Jul-1996 ...")
  const unquoted = value.trim().replace(/^"|"$/g, "").trim();
  const parsed = dayjs(unquoted, INTERNAL_DATE_FORMAT);
  if (!parsed.isValid()) {
    throw new MalformedResponseError(
      `Unparsable IMAP date-time '${value}'`,
      value,
    );
  }
  return parsed.toDate();
}

/**
 * Parenthesized flag list as APPEND and STORE expect it.
 */
export function formatFlagString(flags: Iterable<string>): string {
  return `(${Array.from(flags).join(" ")})`;
}

/**
 * Quoted IMAP date-time, always rendered in UTC.
 */
export function formatInternalDate(date: Date): string {
  return `"${dayjs(date).utc().format("DD-MMM-YYYY HH:mm:ss")} +0000"`;
}
