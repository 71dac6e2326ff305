import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import type { AddressObject } from "mailparser";
import type { SendMailOptions } from "nodemailer";
import type { Mailbox } from "../services/Mailbox.js";
import {
  type ErrorContext,
  toMailboxStoreError,
  ValidationError,
} from "../types/errors.js";
import type { AddableMessage, MessageView } from "../types/mailbox.types.js";
import {
  type AppendMessageInput,
  appendMessageSchema,
  emptySchema,
  getMessageSchema,
  searchMessagesSchema,
  summarizeMessagesSchema,
  switchFolderSchema,
  transferMessageSchema,
  uidOnlySchema,
  updateFlagsSchema,
  validateInput,
} from "../validation/schemas.js";

const uidProperty = {
  type: "number",
  description: "UID of the message in the current folder",
  minimum: 1,
};

const flagsProperty = {
  type: "array",
  items: { type: "string" },
  description: "IMAP flags such as \\Seen, \\Flagged or keywords like $Label1",
};

export function createMailboxTools(): Tool[] {
  return [
    {
      name: "search_messages",
      description:
        "Search the current folder with IMAP search criteria and return matching UIDs",
      inputSchema: {
        type: "object",
        properties: {
          criteria: {
            type: "string",
            description:
              'IMAP search criteria, e.g. UNSEEN FROM "alice" SINCE 1-Feb-2024 (default: ALL)',
            default: "ALL",
          },
          charset: {
            type: "string",
            description: "Charset of the criteria strings, e.g. UTF-8",
          },
          limit: {
            type: "number",
            description: "Maximum number of UIDs to list (default: 100)",
            default: 100,
            minimum: 1,
            maximum: 1000,
          },
        },
        additionalProperties: false,
      },
    },
    {
      name: "get_message",
      description: "Get a message by UID, with flags, size and body text",
      inputSchema: {
        type: "object",
        properties: {
          uid: uidProperty,
          headerOnly: {
            type: "boolean",
            description: "Fetch only the header (default: false)",
            default: false,
          },
          raw: {
            type: "boolean",
            description: "Return the raw RFC 822 source (default: false)",
            default: false,
          },
        },
        required: ["uid"],
        additionalProperties: false,
      },
    },
    {
      name: "summarize_messages",
      description:
        "One line per message (UID, sender, date, subject) for the given UIDs or search criteria",
      inputSchema: {
        type: "object",
        properties: {
          uids: {
            type: "array",
            items: { type: "number" },
            description: "UIDs to summarize; missing UIDs are skipped",
          },
          criteria: {
            type: "string",
            description: "Search criteria used when no UIDs are given (default: ALL)",
            default: "ALL",
          },
        },
        additionalProperties: false,
      },
    },
    {
      name: "get_flags",
      description: "Get the flags of a message",
      inputSchema: {
        type: "object",
        properties: { uid: uidProperty },
        required: ["uid"],
        additionalProperties: false,
      },
    },
    {
      name: "update_flags",
      description: "Add, remove or replace the flags of a message",
      inputSchema: {
        type: "object",
        properties: {
          uid: uidProperty,
          action: {
            type: "string",
            enum: ["add", "remove", "set"],
            description: "add and remove change single flags; set replaces all",
          },
          flags: flagsProperty,
        },
        required: ["uid", "action", "flags"],
        additionalProperties: false,
      },
    },
    {
      name: "copy_message",
      description: "Copy a message to another folder on the same server",
      inputSchema: {
        type: "object",
        properties: {
          uid: uidProperty,
          target: { type: "string", description: "Destination folder" },
        },
        required: ["uid", "target"],
        additionalProperties: false,
      },
    },
    {
      name: "move_message",
      description:
        "Move a message to another folder (copy, then flag \\Deleted in the source)",
      inputSchema: {
        type: "object",
        properties: {
          uid: uidProperty,
          target: { type: "string", description: "Destination folder" },
        },
        required: ["uid", "target"],
        additionalProperties: false,
      },
    },
    {
      name: "discard_message",
      description:
        "Move a message to the trash folder, or flag it \\Deleted when no trash is configured",
      inputSchema: {
        type: "object",
        properties: { uid: uidProperty },
        required: ["uid"],
        additionalProperties: false,
      },
    },
    {
      name: "remove_message",
      description: "Like discard_message, but fails when the UID does not exist",
      inputSchema: {
        type: "object",
        properties: { uid: uidProperty },
        required: ["uid"],
        additionalProperties: false,
      },
    },
    {
      name: "expunge",
      description:
        "Permanently remove all messages flagged \\Deleted in the current folder",
      inputSchema: {
        type: "object",
        properties: {},
        additionalProperties: false,
      },
    },
    {
      name: "mailbox_size",
      description: "Count the messages in the current folder",
      inputSchema: {
        type: "object",
        properties: {},
        additionalProperties: false,
      },
    },
    {
      name: "switch_folder",
      description: "Expunge the current folder and select another one",
      inputSchema: {
        type: "object",
        properties: {
          folder: { type: "string", description: "Folder to select" },
          create: {
            type: "boolean",
            description: "Create the folder if it does not exist (default: false)",
            default: false,
          },
        },
        required: ["folder"],
        additionalProperties: false,
      },
    },
    {
      name: "reconnect",
      description:
        "Open a fresh connection, log in again and re-select the current folder",
      inputSchema: {
        type: "object",
        properties: {},
        additionalProperties: false,
      },
    },
    {
      name: "append_message",
      description:
        "Append a message to the current folder, from raw RFC 822 source or a draft",
      inputSchema: {
        type: "object",
        properties: {
          raw: { type: "string", description: "Raw RFC 822 message" },
          draft: {
            type: "object",
            properties: {
              from: { type: "string" },
              to: { type: "array", items: { type: "string" } },
              cc: { type: "array", items: { type: "string" } },
              subject: { type: "string" },
              text: { type: "string" },
              html: { type: "string" },
            },
            required: ["from", "to", "subject"],
          },
          flags: flagsProperty,
          internalDate: {
            type: "string",
            format: "date-time",
            description: "Internal date (ISO 8601, default: now)",
          },
        },
        additionalProperties: false,
      },
    },
  ];
}

const MAILBOX_TOOLS = new Set(createMailboxTools().map((tool) => tool.name));

export function isMailboxTool(name: string): boolean {
  return MAILBOX_TOOLS.has(name);
}

function text(message: string): CallToolResult {
  return { content: [{ type: "text", text: message }] };
}

function formatAddresses(
  value: AddressObject | AddressObject[] | undefined,
): string {
  if (value === undefined) return "";
  return Array.isArray(value)
    ? value.map((address) => address.text).join(", ")
    : value.text;
}

function formatFlags(flags: Iterable<string>): string {
  const list = Array.from(flags).sort();
  return list.length > 0 ? list.join(" ") : "(none)";
}

function formatView(view: MessageView): string {
  const { parsed } = view;
  const lines = [
    `**${parsed.subject ?? "(no subject)"}**`,
    `From: ${formatAddresses(parsed.from)}`,
    `To: ${formatAddresses(parsed.to)}`,
  ];
  if (parsed.cc) {
    lines.push(`CC: ${formatAddresses(parsed.cc)}`);
  }
  lines.push(
    `Date: ${parsed.date ? parsed.date.toISOString() : "(unknown)"}`,
    `UID: ${view.uid}`,
    `Flags: ${formatFlags(view.flags)}`,
    `Size: ${view.size} bytes`,
  );

  if (view.headerOnly) {
    return lines.join("\n");
  }

  const attachments = parsed.attachments.map(
    (attachment) => attachment.filename ?? attachment.contentType,
  );
  if (attachments.length > 0) {
    lines.push(`Attachments: ${attachments.join(", ")}`);
  }

  return `${lines.join("\n")}\n\n${parsed.text ?? "(no text content)"}`;
}

// nodemailer passes a raw source through, normalizing line endings to CRLF
function toAddable(input: AppendMessageInput): AddableMessage {
  const mail: SendMailOptions = input.draft
    ? {
        from: input.draft.from,
        to: input.draft.to,
        cc: input.draft.cc,
        subject: input.draft.subject,
        text: input.draft.text,
        html: input.draft.html,
      }
    : { raw: input.raw };

  return {
    mail,
    flags: input.flags,
    internalDate: input.internalDate ? new Date(input.internalDate) : undefined,
  };
}

export async function handleMailboxTool(
  name: string,
  args: unknown,
  mailbox: Mailbox<MessageView>,
): Promise<CallToolResult> {
  try {
    switch (name) {
      case "search_messages": {
        const validatedArgs = validateInput(searchMessagesSchema, args);
        const uids = await mailbox.search(
          validatedArgs.criteria,
          validatedArgs.charset,
        );
        const shown = uids.slice(0, validatedArgs.limit);
        const more =
          uids.length > shown.length ? ` (showing first ${shown.length})` : "";

        return text(
          `Found ${uids.length} messages in ${mailbox.folder}${more}:\n${shown.join(", ")}`,
        );
      }

      case "get_message": {
        const validatedArgs = validateInput(getMessageSchema, args);
        if (validatedArgs.raw) {
          return text(await mailbox.getRawString(validatedArgs.uid));
        }
        const view = validatedArgs.headerOnly
          ? await mailbox.getHeader(validatedArgs.uid)
          : await mailbox.get(validatedArgs.uid);
        return text(formatView(view));
      }

      case "summarize_messages": {
        const validatedArgs = validateInput(summarizeMessagesSchema, args);
        const uids =
          validatedArgs.uids ?? (await mailbox.search(validatedArgs.criteria));
        const lines = await mailbox.summary(uids);
        if (lines.length === 0) {
          return text(`No messages in ${mailbox.folder}`);
        }

        return text(
          lines
            .map(
              (line) =>
                `UID ${line.uid} | ${line.from} | ${line.date ? line.date.toISOString() : "(unknown)"} | ${line.subject}`,
            )
            .join("\n"),
        );
      }

      case "get_flags": {
        const { uid } = validateInput(uidOnlySchema, args);
        return text(`Flags for UID ${uid}: ${formatFlags(await mailbox.getFlags(uid))}`);
      }

      case "update_flags": {
        const validatedArgs = validateInput(updateFlagsSchema, args);
        const { uid, flags } = validatedArgs;
        switch (validatedArgs.action) {
          case "add":
            await mailbox.addFlags(uid, ...flags);
            break;
          case "remove":
            await mailbox.removeFlags(uid, ...flags);
            break;
          case "set":
            await mailbox.setFlags(uid, flags);
            break;
        }
        return text(`Flags for UID ${uid}: ${formatFlags(await mailbox.getFlags(uid))}`);
      }

      case "copy_message": {
        const { uid, target } = validateInput(transferMessageSchema, args);
        await mailbox.copy(uid, target);
        return text(`Copied message ${uid} from ${mailbox.folder} to ${target}`);
      }

      case "move_message": {
        const { uid, target } = validateInput(transferMessageSchema, args);
        await mailbox.move(uid, target);
        return text(
          `Moved message ${uid} from ${mailbox.folder} to ${target}. The source copy is flagged \\Deleted until the next expunge.`,
        );
      }

      case "discard_message":
      case "remove_message": {
        const { uid } = validateInput(uidOnlySchema, args);
        if (name === "remove_message") {
          await mailbox.remove(uid);
        } else {
          await mailbox.discard(uid);
        }
        const trash = mailbox.trash;
        return text(
          typeof trash === "string"
            ? `Moved message ${uid} to ${trash}`
            : `Flagged message ${uid} \\Deleted; run expunge to remove it`,
        );
      }

      case "expunge": {
        validateInput(emptySchema, args ?? {});
        await mailbox.expunge();
        return text(`Expunged deleted messages in ${mailbox.folder}`);
      }

      case "mailbox_size": {
        validateInput(emptySchema, args ?? {});
        return text(`${mailbox.folder} contains ${await mailbox.size()} messages`);
      }

      case "switch_folder": {
        const { folder, create } = validateInput(switchFolderSchema, args);
        await mailbox.switchFolder(folder, create);
        return text(`Switched to folder ${folder}`);
      }

      case "reconnect": {
        validateInput(emptySchema, args ?? {});
        await mailbox.reconnect();
        return text(`Reconnected; ${mailbox.folder} selected`);
      }

      case "append_message": {
        const validatedArgs = validateInput(appendMessageSchema, args);
        const uid = await mailbox.add(toAddable(validatedArgs));
        return text(`Appended message to ${mailbox.folder} as UID ${uid}`);
      }

      default:
        throw new ValidationError(
          `Unknown mailbox tool: ${name}`,
          "tool_name",
          name,
        );
    }
  } catch (error) {
    const context: ErrorContext = {
      operation: name,
      service: "mailboxTools",
      folder: mailbox.folder,
      details: { args },
    };

    if (error instanceof ValidationError) {
      return {
        content: [
          {
            type: "text",
            text: `❌ Invalid input for ${name}: ${error.getUserMessage()}`,
          },
        ],
        isError: true,
      };
    }

    const mailboxError = toMailboxStoreError(
      error instanceof Error ? error : new Error(String(error)),
      context,
    );

    return {
      content: [
        {
          type: "text",
          text: `Error executing ${name}: ${mailboxError.getUserMessage()}${mailboxError.isRetryable ? " (This operation can be retried)" : ""}`,
        },
      ],
      isError: true,
    };
  }
}
