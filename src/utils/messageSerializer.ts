import * as nodemailer from "nodemailer";
import {
  MalformedResponseError,
  UnsupportedOperationError,
} from "../types/errors.js";
import {
  type AddableMessage,
  isMessageDraft,
  isMessageView,
  SystemFlag,
} from "../types/mailbox.types.js";

export interface SerializedMessage {
  raw: Buffer;
  flags: string[];
  internalDate: Date;
}

// APPEND may not set \Recent; the server assigns it.
function appendableFlags(flags: Iterable<string>): string[] {
  return Array.from(flags).filter((flag) => flag !== SystemFlag.Recent);
}

/**
 * Turn anything `Mailbox.add()` accepts into RFC 822 bytes plus the flags and
 * internal date the APPEND should carry.
 */
export async function serializeMessage(
  message: AddableMessage,
  now: Date = new Date(),
): Promise<SerializedMessage> {
  if (typeof message === "string") {
    return { raw: Buffer.from(message, "utf8"), flags: [], internalDate: now };
  }

  if (Buffer.isBuffer(message)) {
    return { raw: message, flags: [], internalDate: now };
  }

  if (isMessageView(message)) {
    if (message.headerOnly) {
      throw new UnsupportedOperationError(
        `Message ${message.uid} was fetched header-only and cannot be appended`,
        "add",
      );
    }
    return {
      raw: message.source,
      flags: appendableFlags(message.flags),
      internalDate: message.internalDate,
    };
  }

  if (isMessageDraft(message)) {
    return {
      raw: await composeDraft(message.mail),
      flags: appendableFlags(message.flags ?? []),
      internalDate: message.internalDate ?? now,
    };
  }

  throw new UnsupportedOperationError(
    "Message must be a MessageView, a MessageDraft, a Buffer or a string",
    "add",
  );
}

async function composeDraft(mail: nodemailer.SendMailOptions): Promise<Buffer> {
  const transport = nodemailer.createTransport({
    streamTransport: true,
    buffer: true,
    newline: "windows",
  });

  const info = await transport.sendMail(mail);
  if (!Buffer.isBuffer(info.message)) {
    throw new MalformedResponseError(
      "Message composer did not return a buffered message",
    );
  }
  return info.message;
}
