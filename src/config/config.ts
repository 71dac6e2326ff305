import * as v from "valibot";
import { ConfigurationError } from "../types/errors.js";

export interface ImapConnectionConfig {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
}

export interface MailboxConfig {
  folder: string;
  createFolder: boolean;
  trashFolder?: string;
}

export interface ServerConfig {
  imap: ImapConnectionConfig;
  mailbox: MailboxConfig;
  debug: boolean;
}

const portSchema = v.pipe(
  v.string(),
  v.transform(Number),
  v.number(),
  v.integer(),
  v.minValue(1),
  v.maxValue(65535),
);

const booleanFlagSchema = v.picklist(["true", "false"]);

// Environment variables validation schema
const EnvSchema = v.object({
  MAILBOX_IMAP_HOST: v.pipe(v.string(), v.minLength(1, "IMAP host is required")),
  MAILBOX_IMAP_PORT: v.optional(portSchema),
  MAILBOX_IMAP_SECURE: v.optional(booleanFlagSchema),

  MAILBOX_USER: v.pipe(v.string(), v.minLength(1, "User is required")),
  MAILBOX_PASSWORD: v.pipe(
    v.string(),
    v.minLength(1, "Password is required"),
    v.check((value) => value.trim().length > 0, "Password cannot be empty"),
  ),

  MAILBOX_FOLDER: v.optional(v.pipe(v.string(), v.minLength(1))),
  MAILBOX_CREATE_FOLDER: v.optional(booleanFlagSchema),
  MAILBOX_TRASH_FOLDER: v.optional(v.pipe(v.string(), v.minLength(1))),

  DEBUG: v.optional(booleanFlagSchema),
});

function formatValidationError(
  error: v.ValiError<
    | v.BaseSchema<unknown, unknown, v.BaseIssue<unknown>>
    | v.BaseSchemaAsync<unknown, unknown, v.BaseIssue<unknown>>
  >,
): string {
  const issues = v.flatten(error.issues);
  const messages: string[] = [];

  for (const [path, issue] of Object.entries(issues.nested || {})) {
    if (Array.isArray(issue)) {
      for (const i of issue) {
        messages.push(`${path}: ${i}`);
      }
    }
  }

  if (issues.root) {
    for (const issue of issues.root) {
      messages.push(`Configuration: ${issue}`);
    }
  }

  return messages.join(", ");
}

function firstIssueKey(
  error: v.ValiError<
    | v.BaseSchema<unknown, unknown, v.BaseIssue<unknown>>
    | v.BaseSchemaAsync<unknown, unknown, v.BaseIssue<unknown>>
  >,
): string | undefined {
  const key = error.issues[0]?.path?.[0]?.key;
  return typeof key === "string" ? key : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  try {
    const validatedEnv = v.parse(EnvSchema, env);

    const secure = validatedEnv.MAILBOX_IMAP_SECURE !== "false";
    if (!secure) {
      console.warn(
        "⚠️  Security Warning: IMAP connection without implicit TLS. Ensure the server upgrades with STARTTLS.",
      );
    }

    return {
      imap: {
        host: validatedEnv.MAILBOX_IMAP_HOST,
        port: validatedEnv.MAILBOX_IMAP_PORT ?? 993,
        secure,
        user: validatedEnv.MAILBOX_USER,
        password: validatedEnv.MAILBOX_PASSWORD,
      },
      mailbox: {
        folder: validatedEnv.MAILBOX_FOLDER ?? "INBOX",
        createFolder: validatedEnv.MAILBOX_CREATE_FOLDER === "true",
        trashFolder: validatedEnv.MAILBOX_TRASH_FOLDER,
      },
      debug: validatedEnv.DEBUG === "true",
    };
  } catch (error) {
    if (v.isValiError(error)) {
      throw new ConfigurationError(
        `Configuration validation failed: ${formatValidationError(error)}`,
        firstIssueKey(error),
      );
    }
    throw error;
  }
}
