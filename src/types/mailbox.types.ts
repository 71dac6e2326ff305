import type { ParsedMail } from "mailparser";
import type { SendMailOptions } from "nodemailer";

export type Uid = number;

export type FlagSet = Set<string>;

export const SystemFlag = {
  Seen: "\\Seen",
  Answered: "\\Answered",
  Flagged: "\\Flagged",
  Deleted: "\\Deleted",
  Draft: "\\Draft",
  Recent: "\\Recent",
} as const;

/**
 * A message materialized from the server. Flags, size and internal date are
 * a snapshot taken by the retrieval call that built this view.
 */
export interface MessageView {
  uid: Uid;
  /** Parsed header and body; only the header when `headerOnly` is set. */
  parsed: ParsedMail;
  /** Bytes `parsed` was built from. */
  source: Buffer;
  headerOnly: boolean;
  flags: FlagSet;
  internalDate: Date;
  size: number;
}

export type MessageFactory<T> = (view: MessageView) => T | Promise<T>;

/**
 * A message composed locally and serialized with nodemailer before append.
 */
export interface MessageDraft {
  mail: SendMailOptions;
  flags?: Iterable<string>;
  internalDate?: Date;
}

export type AddableMessage = MessageView | MessageDraft | Buffer | string;

/**
 * Anything that accepts messages through the generic
 * lock/add/flush/unlock lifecycle. A Mailbox on another session is one.
 */
export interface MessageSink {
  add(message: MessageView): Promise<unknown>;
  flush?(): Promise<void>;
  lock?(): Promise<void>;
  unlock?(): Promise<void>;
}

export interface SummaryLine {
  uid: Uid;
  /** Display name of the sender, or the address when there is none. */
  from: string;
  date?: Date;
  subject: string;
}

export function isMessageView(value: unknown): value is MessageView {
  return (
    typeof value === "object" &&
    value !== null &&
    "parsed" in value &&
    "source" in value &&
    "flags" in value &&
    Buffer.isBuffer(value.source) &&
    value.flags instanceof Set
  );
}

export function isMessageDraft(value: unknown): value is MessageDraft {
  return (
    typeof value === "object" &&
    value !== null &&
    !Buffer.isBuffer(value) &&
    "mail" in value &&
    typeof value.mail === "object" &&
    value.mail !== null
  );
}
