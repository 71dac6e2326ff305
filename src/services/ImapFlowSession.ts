import { type FetchMessageObject, type FetchQueryObject, ImapFlow } from "imapflow";
import type { ImapConnectionConfig } from "../config/config.js";
import {
  ConnectionError,
  ErrorCode,
  type MailboxStoreError,
  MalformedResponseError,
  NoSuchFolderError,
  ProtocolError,
  toMailboxStoreError,
} from "../types/errors.js";
import type {
  ResponseRecord,
  SessionPort,
  SessionResponse,
  UidCommand,
} from "../types/session.types.js";
import {
  getCommandStatus,
  getImapErrorFields,
  isAuthenticationFailure,
  isMissingFolderError,
} from "../utils/imapError.js";
import {
  formatInternalDate,
  parseFlagList,
  parseImapDateTime,
} from "../utils/imapResponse.js";
import { parseSearchCriteria, SearchSyntaxError } from "../utils/searchQuery.js";
import { createLogger } from "./Logger.js";

export type ImapClientFactory = (config: ImapConnectionConfig) => ImapFlow;

const clientLogger = createLogger("ImapFlowClient");

export function createImapClient(config: ImapConnectionConfig): ImapFlow {
  const client = new ImapFlow({
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: {
      user: config.user,
      pass: config.password,
    },
    logger: false, // Logging goes through our own logger
  });

  client.on("error", (error: Error) => {
    clientLogger.error(
      "IMAP connection error",
      { operation: "connection", service: "ImapFlowSession" },
      { error: error.message },
    );
  });

  return client;
}

const BODY_PART = /^BODY\.PEEK\[([\d.]+)\]$/;

const OK_EMPTY: SessionResponse = { status: "OK", data: [] };

function unwrap(list: string): string {
  const trimmed = list.trim();
  return trimmed.startsWith("(") && trimmed.endsWith(")")
    ? trimmed.slice(1, -1).trim()
    : trimmed;
}

function prelude(message: FetchMessageObject): string {
  return `${message.seq} (UID ${message.uid}`;
}

function textRecord(message: FetchMessageObject, item: string): string {
  return `${prelude(message)} ${item})`;
}

function literalRecord(
  message: FetchMessageObject,
  label: string,
  literal: Buffer | undefined,
): ResponseRecord {
  if (literal === undefined) {
    return `${prelude(message)})`;
  }
  return { prelude: `${prelude(message)} ${label} {${literal.length}}`, literal };
}

/**
 * SessionPort over an imapflow client.
 *
 * imapflow speaks in objects; the mailbox layer expects raw reply records.
 * Each UID command is translated to the matching imapflow call and the
 * result rendered back into the textual record the core parses. A tagged
 * NO or BAD becomes a response status; transport failures are thrown as
 * ConnectionError.
 */
export class ImapFlowSession implements SessionPort {
  private client: ImapFlow;
  private logger = createLogger("ImapFlowSession");

  constructor(
    private readonly config: ImapConnectionConfig,
    private readonly createClient: ImapClientFactory = createImapClient,
  ) {
    this.client = this.createClient(config);
  }

  async login(): Promise<void> {
    try {
      await this.client.connect();
      this.logger.info("Connected", {
        operation: "login",
        service: "ImapFlowSession",
      }, { host: this.config.host, user: this.config.user });
    } catch (error) {
      if (isAuthenticationFailure(error)) {
        this.logger.error("Authentication failed", {
          operation: "login",
          service: "ImapFlowSession",
        }, { user: this.config.user });
        throw new ConnectionError(
          `Authentication failed for ${this.config.user}`,
          ErrorCode.CONNECTION_REFUSED,
          { operation: "login", service: "ImapFlowSession" },
        );
      }
      throw this.transportError(error, "login");
    }
  }

  async reconnect(): Promise<void> {
    this.client.close();
    this.client = this.createClient(this.config);
    this.logger.info("Transport replaced", {
      operation: "reconnect",
      service: "ImapFlowSession",
    });
  }

  async select(folder: string): Promise<void> {
    try {
      await this.client.mailboxOpen(folder);
    } catch (error) {
      if (isMissingFolderError(error)) {
        throw new NoSuchFolderError(`Folder ${folder} does not exist`, folder, {
          operation: "select",
          service: "ImapFlowSession",
        });
      }
      throw this.commandError(error, "SELECT", folder);
    }
  }

  async create(folder: string): Promise<void> {
    try {
      await this.client.mailboxCreate(folder);
    } catch (error) {
      throw this.commandError(error, "CREATE", folder);
    }
  }

  async uid(command: UidCommand, ...args: string[]): Promise<SessionResponse> {
    try {
      switch (command) {
        case "SEARCH":
          return await this.uidSearch(args);
        case "FETCH":
          return await this.uidFetch(args);
        case "STORE":
          return await this.uidStore(args);
        case "COPY":
          return await this.uidCopy(args);
      }
    } catch (error) {
      return this.commandFailure(error, `UID ${command}`);
    }
  }

  async append(
    folder: string,
    flagString: string,
    dateString: string,
    message: Buffer,
  ): Promise<SessionResponse> {
    try {
      const flags = parseFlagList(flagString);
      const internalDate = parseImapDateTime(dateString);
      const result = await this.client.append(folder, message, flags, internalDate);
      if (!result) {
        return { status: "NO", data: [] };
      }

      this.logger.debug("Message appended", {
        operation: "append",
        service: "ImapFlowSession",
        folder,
      }, { uid: result.uid, bytes: message.length });
      return OK_EMPTY;
    } catch (error) {
      return this.commandFailure(error, "APPEND");
    }
  }

  /**
   * imapflow has no bare EXPUNGE; deleting the \Deleted set by UID ends in
   * the same EXPUNGE (UID EXPUNGE where the server has UIDPLUS).
   */
  async expunge(): Promise<SessionResponse> {
    try {
      const deleted = await this.client.search({ deleted: true }, { uid: true });
      if (!deleted) {
        return this.searchRejected("EXPUNGE");
      }
      if (deleted.length === 0) {
        return OK_EMPTY;
      }

      const ok = await this.client.messageDelete(deleted.join(","), { uid: true });
      this.logger.debug("Expunged", {
        operation: "expunge",
        service: "ImapFlowSession",
      }, { uids: deleted });
      return { status: ok ? "OK" : "NO", data: [] };
    } catch (error) {
      return this.commandFailure(error, "EXPUNGE");
    }
  }

  async close(): Promise<void> {
    try {
      await this.client.mailboxClose();
    } catch (error) {
      throw this.commandError(error, "CLOSE");
    }
  }

  async logout(): Promise<void> {
    try {
      await this.client.logout();
    } catch (error) {
      throw this.transportError(error, "logout");
    }
  }

  // ---------------------------------------------------------------------------
  // UID commands
  // ---------------------------------------------------------------------------

  private async uidSearch(args: string[]): Promise<SessionResponse> {
    const criteria = args[args.length - 1] ?? "ALL";
    if (args.length > 1) {
      this.logger.debug("Charset left to imapflow", {
        operation: "search",
        service: "ImapFlowSession",
      }, { charset: args[0] });
    }

    const query = parseSearchCriteria(criteria);
    const uids = await this.client.search(query, { uid: true });
    if (!uids) {
      return this.searchRejected("SEARCH");
    }
    const sorted = [...uids].sort((a, b) => a - b);
    return { status: "OK", data: [sorted.join(" ")] };
  }

  private async uidFetch([uid, items]: string[]): Promise<SessionResponse> {
    if (uid === undefined || items === undefined) {
      return { status: "BAD", data: [] };
    }

    const item = unwrap(items).toUpperCase();
    const bodyPart = BODY_PART.exec(item);

    let query: FetchQueryObject;
    if (item === "FLAGS") {
      query = { uid: true, flags: true };
    } else if (item === "RFC822.SIZE") {
      query = { uid: true, size: true };
    } else if (item === "INTERNALDATE") {
      query = { uid: true, internalDate: true };
    } else if (item === "RFC822") {
      query = { uid: true, source: true };
    } else if (item === "BODY.PEEK[HEADER]") {
      query = { uid: true, headers: true };
    } else if (bodyPart) {
      query = { uid: true, bodyParts: [bodyPart[1]] };
    } else {
      return { status: "BAD", data: [] };
    }

    const message = await this.client.fetchOne(uid, query, { uid: true });
    if (!message) {
      return { status: "OK", data: [null] };
    }

    return { status: "OK", data: [this.renderFetch(message, item, bodyPart)] };
  }

  private renderFetch(
    message: FetchMessageObject,
    item: string,
    bodyPart: RegExpExecArray | null,
  ): ResponseRecord {
    switch (item) {
      case "FLAGS":
        return textRecord(
          message,
          `FLAGS (${Array.from(message.flags ?? []).join(" ")})`,
        );
      case "RFC822.SIZE":
        return message.size === undefined
          ? `${prelude(message)})`
          : textRecord(message, `RFC822.SIZE ${message.size}`);
      case "INTERNALDATE":
        return message.internalDate === undefined
          ? `${prelude(message)})`
          : textRecord(
              message,
              `INTERNALDATE ${formatInternalDate(new Date(message.internalDate))}`,
            );
      case "RFC822":
        return literalRecord(message, "RFC822", message.source);
      case "BODY.PEEK[HEADER]":
        return literalRecord(message, "BODY[HEADER]", message.headers);
    }

    const part = bodyPart ? bodyPart[1] : "";
    return literalRecord(message, `BODY[${part}]`, message.bodyParts?.get(part));
  }

  private async uidStore([uid, mode, flagString]: string[]): Promise<SessionResponse> {
    if (uid === undefined || mode === undefined || flagString === undefined) {
      return { status: "BAD", data: [] };
    }

    const flags = parseFlagList(flagString);
    let ok: boolean;
    switch (mode.toUpperCase()) {
      case "FLAGS":
        ok = await this.client.messageFlagsSet(uid, flags, { uid: true });
        break;
      case "+FLAGS":
        ok = await this.client.messageFlagsAdd(uid, flags, { uid: true });
        break;
      case "-FLAGS":
        ok = await this.client.messageFlagsRemove(uid, flags, { uid: true });
        break;
      default:
        return { status: "BAD", data: [] };
    }

    return { status: ok ? "OK" : "NO", data: [] };
  }

  private async uidCopy([uid, folder]: string[]): Promise<SessionResponse> {
    if (uid === undefined || folder === undefined) {
      return { status: "BAD", data: [] };
    }

    const result = await this.client.messageCopy(uid, folder, { uid: true });
    return { status: result ? "OK" : "NO", data: [] };
  }

  // ---------------------------------------------------------------------------
  // Error translation
  // ---------------------------------------------------------------------------

  /**
   * A rejected command becomes a status; anything else is a transport failure.
   */
  // imapflow resolves false instead of throwing when SEARCH is rejected or
  // no folder is selected
  private searchRejected(command: string): SessionResponse {
    this.logger.warning(`${command} rejected`, {
      operation: command,
      service: "ImapFlowSession",
    }, { reason: "search returned no result" });
    return { status: "NO", data: [] };
  }

  private commandFailure(error: unknown, command: string): SessionResponse {
    if (error instanceof SearchSyntaxError || error instanceof MalformedResponseError) {
      this.logger.warning(`Malformed ${command} arguments`, {
        operation: command,
        service: "ImapFlowSession",
      }, { error: error.message });
      return { status: "BAD", data: [] };
    }

    const status = getCommandStatus(error);
    if (status === undefined) {
      throw this.transportError(error, command);
    }

    this.logger.warning(`${command} rejected`, {
      operation: command,
      service: "ImapFlowSession",
    }, { status, response: getImapErrorFields(error).responseText });
    return { status, data: [] };
  }

  private commandError(
    error: unknown,
    command: string,
    folder?: string,
  ): MailboxStoreError {
    const status = getCommandStatus(error);
    if (status === undefined) {
      return this.transportError(error, command);
    }
    return new ProtocolError(
      `${status} in ${command}${folder ? ` ${folder}` : ""}`,
      status,
      command,
      { operation: command, service: "ImapFlowSession", folder },
    );
  }

  private transportError(error: unknown, operation: string): MailboxStoreError {
    const cause = error instanceof Error ? error : new Error(String(error));
    const context = { operation, service: "ImapFlowSession" };
    const { code } = getImapErrorFields(error);

    this.logger.error(`IMAP ${operation} failed`, context, {
      error: cause.message,
      code,
    });

    if (code === "NoConnection" || code === "EConnectionClosed") {
      return new ConnectionError(cause.message, ErrorCode.CONNECTION_LOST, context);
    }
    return toMailboxStoreError(cause, context);
  }
}
