import {
  MalformedResponseError,
  NoSuchMessageError,
  ProtocolError,
} from "../types/errors.js";
import type { FlagSet, Uid } from "../types/mailbox.types.js";
import type { SessionPort, SessionResponse } from "../types/session.types.js";
import {
  formatFlagString,
  parseFlags,
  parseInternalDate,
  parseSize,
} from "../utils/imapResponse.js";

type StoreMode = "FLAGS" | "+FLAGS" | "-FLAGS";

/**
 * Per-message flag state plus the INTERNALDATE and RFC822.SIZE attributes.
 * Nothing here is cached: flags may change on the server at any time.
 */
export class FlagController {
  constructor(
    private readonly session: SessionPort,
    private readonly folder: () => string,
  ) {}

  async getFlags(uid: Uid): Promise<FlagSet> {
    return parseFlags(await this.fetchAttribute(uid, "FLAGS"));
  }

  async getSize(uid: Uid): Promise<number> {
    return parseSize(await this.fetchAttribute(uid, "RFC822.SIZE"));
  }

  async getInternalDate(uid: Uid): Promise<Date> {
    return parseInternalDate(await this.fetchAttribute(uid, "INTERNALDATE"));
  }

  /**
   * Replace the whole flag set in one STORE.
   */
  async setFlags(uid: Uid, flags: Iterable<string>): Promise<void> {
    const flagList = Array.from(flags);
    const response = await this.store(uid, "FLAGS", flagList);
    this.assertStored(response, uid, "setFlags", flagList.join(" "));
  }

  /**
   * One STORE per flag, in order. A failure leaves the earlier flags applied
   * and names the flag that failed.
   */
  async addFlags(uid: Uid, ...flags: string[]): Promise<void> {
    for (const flag of flags) {
      const response = await this.store(uid, "+FLAGS", [flag]);
      this.assertStored(response, uid, "addFlags", flag);
    }
  }

  async removeFlags(uid: Uid, ...flags: string[]): Promise<void> {
    for (const flag of flags) {
      const response = await this.store(uid, "-FLAGS", [flag]);
      this.assertStored(response, uid, "removeFlags", flag);
    }
  }

  private store(
    uid: Uid,
    mode: StoreMode,
    flags: string[],
  ): Promise<SessionResponse> {
    return this.session.uid("STORE", String(uid), mode, formatFlagString(flags));
  }

  private assertStored(
    response: SessionResponse,
    uid: Uid,
    operation: string,
    flag: string,
  ): void {
    if (response.status !== "OK") {
      throw new ProtocolError(
        `${response.status} in ${operation}(${uid}, ${flag})`,
        response.status,
        "STORE",
        { operation, folder: this.folder(), details: { uid, flag } },
      );
    }
  }

  private async fetchAttribute(uid: Uid, item: string): Promise<string> {
    const response = await this.session.uid("FETCH", String(uid), `(${item})`);
    if (response.status !== "OK") {
      throw new ProtocolError(
        `${response.status} in fetch of ${item} for message ${uid}`,
        response.status,
        "FETCH",
        { operation: `fetch ${item}`, folder: this.folder() },
      );
    }

    const record = response.data[0];
    if (record === null || record === undefined) {
      throw new NoSuchMessageError(
        `No message with UID ${uid}`,
        uid,
        this.folder(),
        { operation: `fetch ${item}` },
      );
    }
    if (typeof record !== "string") {
      throw new MalformedResponseError(
        `Unexpected literal in ${item} response for message ${uid}`,
        record.prelude,
        { operation: `fetch ${item}`, folder: this.folder() },
      );
    }
    return record;
  }
}
