/**
 * Narrow capability interface the mailbox layer needs from an IMAP session.
 * Responses keep the shape of raw IMAP replies: a status code and a list of
 * records whose content depends on the command.
 */

export type StatusCode = "OK" | "NO" | "BAD";

export type UidCommand = "SEARCH" | "FETCH" | "STORE" | "COPY";

/**
 * A fetched body section: the text preceding the literal
 * (e.g. `1 (UID 5 RFC822 {342}`) and the literal bytes themselves.
 */
export interface LiteralRecord {
  prelude: string;
  literal: Buffer;
}

/** `null` marks an absent payload (the UID did not match a message). */
export type ResponseRecord = string | LiteralRecord | null;

export interface SessionResponse {
  status: StatusCode;
  data: ResponseRecord[];
}

export interface SessionPort {
  /**
   * Make `folder` the selected folder.
   * Rejects with NoSuchFolderError when the folder does not exist.
   */
  select(folder: string): Promise<void>;
  create(folder: string): Promise<void>;

  /**
   * Issue a UID-addressed command.
   *
   * - `SEARCH [charset] (criteria)`
   * - `FETCH uid (items)`
   * - `STORE uid FLAGS|+FLAGS|-FLAGS (flags)`
   * - `COPY uid folder`
   */
  uid(command: UidCommand, ...args: string[]): Promise<SessionResponse>;

  /**
   * @param flagString parenthesized flag list, e.g. `(\Seen \Flagged)`
   * @param dateString quoted internal date, e.g. `"17-Jul-1996 02:44:25 -0700"`
   */
  append(
    folder: string,
    flagString: string,
    dateString: string,
    message: Buffer,
  ): Promise<SessionResponse>;

  /** Permanently remove every `\Deleted` message of the selected folder. */
  expunge(): Promise<SessionResponse>;

  close(): Promise<void>;
  logout(): Promise<void>;

  /** Drop the transport and open a fresh one; `login()` must follow. */
  reconnect(): Promise<void>;
  login(): Promise<void>;
}

export function isLiteralRecord(
  record: ResponseRecord | undefined,
): record is LiteralRecord {
  return (
    typeof record === "object" &&
    record !== null &&
    Buffer.isBuffer(record.literal)
  );
}
