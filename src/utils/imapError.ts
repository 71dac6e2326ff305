import type { StatusCode } from "../types/session.types.js";

/**
 * Fields imapflow attaches to errors raised for a tagged NO or BAD reply.
 */
export interface ImapCommandErrorFields {
  responseStatus?: string;
  responseText?: string;
  serverResponseCode?: string;
  code?: string;
}

const MISSING_FOLDER_TEXT =
  /doesn'?t exist|does not exist|no such (mailbox|folder)|unknown mailbox|mailbox not found|not found/i;

function readField(error: object, field: keyof ImapCommandErrorFields): string | undefined {
  if (!(field in error)) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

export function getImapErrorFields(error: unknown): ImapCommandErrorFields {
  if (typeof error !== "object" || error === null) {
    return {};
  }
  return {
    responseStatus: readField(error, "responseStatus"),
    responseText: readField(error, "responseText"),
    serverResponseCode: readField(error, "serverResponseCode"),
    code: readField(error, "code"),
  };
}

/**
 * Status of the tagged reply behind a command failure, or undefined when the
 * error did not come from the server (socket closed, timeout).
 */
export function getCommandStatus(error: unknown): StatusCode | undefined {
  const { responseStatus } = getImapErrorFields(error);
  const status = responseStatus?.toUpperCase();
  if (status === "NO" || status === "BAD") {
    return status;
  }
  return undefined;
}

export function isMissingFolderError(error: unknown): boolean {
  const fields = getImapErrorFields(error);
  if (fields.serverResponseCode?.toUpperCase() === "NONEXISTENT") {
    return true;
  }
  if (getCommandStatus(error) !== "NO") {
    return false;
  }
  const text =
    fields.responseText ?? (error instanceof Error ? error.message : "");
  return MISSING_FOLDER_TEXT.test(text);
}

/** imapflow marks rejected LOGIN/AUTHENTICATE with `authenticationFailed`. */
export function isAuthenticationFailure(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    Reflect.get(error, "authenticationFailed") === true
  );
}
