import { MalformedResponseError, NoSuchMessageError, ProtocolError } from "../types/errors.js";
import type { Uid } from "../types/mailbox.types.js";
import { isLiteralRecord, type SessionPort } from "../types/session.types.js";

/**
 * Single-slot cache of the last fully fetched message.
 *
 * A header fetch followed by a full fetch of the same UID is the common
 * access pattern; only that case is served from memory. Not safe to share
 * between concurrent callers.
 */
export class MessageCache {
  private cached: { uid: Uid; raw: Buffer } | null = null;

  constructor(
    private readonly session: SessionPort,
    private readonly folder: () => string,
  ) {}

  get cachedUid(): Uid | undefined {
    return this.cached?.uid;
  }

  async fetchRaw(uid: Uid): Promise<Buffer> {
    if (this.cached && this.cached.uid === uid) {
      return this.cached.raw;
    }

    const response = await this.session.uid("FETCH", String(uid), "(RFC822)");
    if (response.status !== "OK") {
      throw new ProtocolError(
        `${response.status} in fetch of message ${uid}`,
        response.status,
        "FETCH",
        { operation: "fetchRaw", folder: this.folder() },
      );
    }

    const record = response.data[0];
    if (record === null || record === undefined) {
      throw new NoSuchMessageError(
        `No message with UID ${uid}`,
        uid,
        this.folder(),
        { operation: "fetchRaw" },
      );
    }
    if (!isLiteralRecord(record)) {
      throw new MalformedResponseError(
        `Fetch of message ${uid} returned no message body`,
        record,
        { operation: "fetchRaw", folder: this.folder() },
      );
    }

    this.cached = { uid, raw: record.literal };
    return record.literal;
  }

  invalidate(): void {
    this.cached = null;
  }
}
