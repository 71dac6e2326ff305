import * as v from "valibot";
import { ValidationError } from "../types/errors.js";

// =============================================================================
// SANITIZATION UTILITIES
// =============================================================================

export const sanitizeString = (str: string): string => {
  return str.trim().replace(/[\u0000-\u001F\u007F-\u009F]/g, ""); // Remove control characters
};

// =============================================================================
// BASE VALIDATION SCHEMAS
// =============================================================================

const uidSchema = v.pipe(
  v.number("UID must be a number"),
  v.integer("UID must be an integer"),
  v.minValue(1, "UID must be positive"),
);

// Hierarchy delimiters are allowed; IMAP list wildcards and quotes are not
const folderNameSchema = v.pipe(
  v.string("Folder name must be a string"),
  v.trim(),
  v.minLength(1, "Folder name cannot be empty"),
  v.maxLength(255, "Folder name too long"),
  v.regex(/^[^"*%\\\u0000-\u001F]+$/, "Invalid folder name characters"),
  v.transform(sanitizeString),
);

// System flags (\Seen) and keywords ($Label1, NonJunk)
const flagSchema = v.pipe(
  v.string("Flag must be a string"),
  v.trim(),
  v.regex(/^\\?[A-Za-z0-9$_.\-]+$/, "Invalid flag"),
);

const criteriaSchema = v.pipe(
  v.string("Search criteria must be a string"),
  v.maxLength(1000, "Search criteria too long"),
  v.transform(sanitizeString),
  v.check((value) => value.length > 0, "Search criteria cannot be empty"),
);

const addressSchema = v.pipe(
  v.string("Address must be a string"),
  v.trim(),
  v.email("Invalid email format"),
  v.maxLength(254, "Email address too long"),
);

// Date validation - ISO 8601
const dateSchema = v.pipe(
  v.string("Date must be a string"),
  v.trim(),
  v.isoTimestamp("Invalid date format - must be an ISO 8601 timestamp"),
);

const flagListSchema = v.pipe(
  v.array(flagSchema, "Flags must be an array"),
  v.maxLength(20, "Too many flags"),
);

// =============================================================================
// MAILBOX TOOL SCHEMAS
// =============================================================================

export const searchMessagesSchema = v.object({
  criteria: v.optional(criteriaSchema, "ALL"),
  charset: v.optional(
    v.pipe(v.string(), v.regex(/^[A-Za-z0-9_.:\-]+$/, "Invalid charset")),
  ),
  limit: v.optional(
    v.pipe(
      v.number("Limit must be a number"),
      v.integer(),
      v.minValue(1, "Limit must be at least 1"),
      v.maxValue(1000, "Limit cannot exceed 1000"),
    ),
    100,
  ),
});

export const getMessageSchema = v.object({
  uid: uidSchema,
  headerOnly: v.optional(v.boolean("headerOnly must be a boolean"), false),
  raw: v.optional(v.boolean("raw must be a boolean"), false),
});

export const summarizeMessagesSchema = v.object({
  uids: v.optional(
    v.pipe(
      v.array(uidSchema, "UIDs must be an array"),
      v.maxLength(500, "Too many UIDs"),
    ),
  ),
  criteria: v.optional(criteriaSchema, "ALL"),
});

export const uidOnlySchema = v.object({
  uid: uidSchema,
});

export const updateFlagsSchema = v.object({
  uid: uidSchema,
  action: v.picklist(
    ["add", "remove", "set"],
    "Action must be 'add', 'remove' or 'set'",
  ),
  flags: flagListSchema,
});

export const transferMessageSchema = v.object({
  uid: uidSchema,
  target: folderNameSchema,
});

export const emptySchema = v.object({});

export const switchFolderSchema = v.object({
  folder: folderNameSchema,
  create: v.optional(v.boolean("create must be a boolean"), false),
});

export const appendMessageSchema = v.pipe(
  v.object({
    raw: v.optional(
      v.pipe(
        v.string("Raw message must be a string"),
        v.minLength(1, "Raw message cannot be empty"),
        v.maxLength(10_000_000, "Raw message too long"),
      ),
    ),
    draft: v.optional(
      v.object({
        from: addressSchema,
        to: v.pipe(
          v.array(addressSchema, "Recipients must be an array"),
          v.minLength(1, "At least one recipient is required"),
          v.maxLength(100, "Too many recipients"),
        ),
        cc: v.optional(
          v.pipe(
            v.array(addressSchema, "CC recipients must be an array"),
            v.maxLength(100, "Too many CC recipients"),
          ),
        ),
        subject: v.pipe(
          v.string("Subject must be a string"),
          v.maxLength(998, "Subject line too long"),
          v.transform(sanitizeString),
        ),
        text: v.optional(v.string("Text content must be a string")),
        html: v.optional(v.string("HTML content must be a string")),
      }),
    ),
    flags: v.optional(flagListSchema, []),
    internalDate: v.optional(dateSchema),
  }),
  v.check(
    (data) => (data.raw === undefined) !== (data.draft === undefined),
    "Exactly one of raw or draft is required",
  ),
);

// =============================================================================
// TYPE EXPORTS
// =============================================================================

export type SearchMessagesInput = v.InferOutput<typeof searchMessagesSchema>;
export type GetMessageInput = v.InferOutput<typeof getMessageSchema>;
export type UpdateFlagsInput = v.InferOutput<typeof updateFlagsSchema>;
export type AppendMessageInput = v.InferOutput<typeof appendMessageSchema>;

// =============================================================================
// VALIDATION UTILITIES
// =============================================================================

export function validateInput<TSchema extends v.GenericSchema>(
  schema: TSchema,
  input: unknown,
): v.InferOutput<TSchema> {
  const result = v.safeParse(schema, input);
  if (result.success) {
    return result.output;
  }

  const messages = result.issues.map((issue) => issue.message);
  const field = v.getDotPath(result.issues[0]) ?? undefined;
  throw new ValidationError(messages.join("; "), field, input);
}
