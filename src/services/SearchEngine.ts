import { ProtocolError } from "../types/errors.js";
import type { Uid } from "../types/mailbox.types.js";
import type { SessionPort } from "../types/session.types.js";
import { parseUidList } from "../utils/imapResponse.js";

/**
 * UID search over the selected folder. Criteria strings use the IMAP search
 * grammar (RFC 3501 section 6.4.4) and are passed through unchanged; the
 * server is the only validator. Results are never cached.
 *
 * @example
 *   search('FLAGGED SINCE 1-Feb-1994 NOT FROM "Smith"')
 */
export class SearchEngine {
  constructor(private readonly session: SessionPort) {}

  async search(criteria = "ALL", charset?: string): Promise<Uid[]> {
    const args = charset ? [charset, `(${criteria})`] : [`(${criteria})`];
    const response = await this.session.uid("SEARCH", ...args);

    if (response.status !== "OK") {
      throw new ProtocolError(
        `${response.status} in search (${criteria})`,
        response.status,
        "SEARCH",
        { operation: "search", details: { criteria } },
      );
    }

    return parseUidList(response.data[0]);
  }

  unseenUndeleted(): Promise<Uid[]> {
    return this.search("UNSEEN UNDELETED");
  }

  allUndeleted(): Promise<Uid[]> {
    return this.search("UNDELETED");
  }
}
