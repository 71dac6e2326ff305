import { simpleParser } from "mailparser";
import {
  MalformedResponseError,
  NoSuchMessageError,
  ProtocolError,
} from "../types/errors.js";
import type {
  MessageFactory,
  MessageView,
  Uid,
} from "../types/mailbox.types.js";
import { isLiteralRecord, type SessionPort } from "../types/session.types.js";
import type { FlagController } from "./FlagController.js";
import type { MessageCache } from "./MessageCache.js";

/**
 * Assembles MessageViews from a raw fetch plus flags, internal date and size.
 * The raw fetch goes first so a missing UID fails before any attribute fetch.
 */
export class MessageRetriever<T = MessageView> {
  constructor(
    private readonly session: SessionPort,
    private readonly cache: MessageCache,
    private readonly flags: FlagController,
    private readonly factory: MessageFactory<T>,
    private readonly folder: () => string,
  ) {}

  async getFull(uid: Uid): Promise<T> {
    return this.factory(await this.getFullView(uid));
  }

  /**
   * Header-only reads skip the cache so they never evict a full body.
   */
  async getHeaderOnly(uid: Uid): Promise<T> {
    return this.factory(await this.getHeaderView(uid));
  }

  /** The view before the factory transform, as sinks and `add()` need it. */
  async getFullView(uid: Uid): Promise<MessageView> {
    const source = await this.cache.fetchRaw(uid);
    return this.assemble(uid, source, false);
  }

  async getHeaderView(uid: Uid): Promise<MessageView> {
    const source = await this.fetchSection(uid, "BODY.PEEK[HEADER]");
    return this.assemble(uid, source, true);
  }

  /**
   * First body section, usually the human-readable part. Does not set \Seen.
   */
  async getFirstTextPart(uid: Uid): Promise<string> {
    const section = await this.fetchSection(uid, "BODY.PEEK[1]");
    return section.toString("utf8");
  }

  private async assemble(
    uid: Uid,
    source: Buffer,
    headerOnly: boolean,
  ): Promise<MessageView> {
    const parsed = await simpleParser(source);
    const flags = await this.flags.getFlags(uid);
    const internalDate = await this.flags.getInternalDate(uid);
    const size = await this.flags.getSize(uid);

    return { uid, parsed, source, headerOnly, flags, internalDate, size };
  }

  private async fetchSection(uid: Uid, section: string): Promise<Buffer> {
    const response = await this.session.uid("FETCH", String(uid), `(${section})`);
    if (response.status !== "OK") {
      throw new ProtocolError(
        `${response.status} in fetch of ${section} for message ${uid}`,
        response.status,
        "FETCH",
        { operation: "fetchSection", folder: this.folder() },
      );
    }

    const record = response.data[0];
    if (record === null || record === undefined) {
      throw new NoSuchMessageError(
        `No message with UID ${uid}`,
        uid,
        this.folder(),
        { operation: "fetchSection" },
      );
    }
    if (!isLiteralRecord(record)) {
      throw new MalformedResponseError(
        `Fetch of ${section} for message ${uid} returned no literal`,
        record,
        { operation: "fetchSection", folder: this.folder() },
      );
    }
    return record.literal;
  }
}
