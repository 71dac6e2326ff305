import { Readable } from "node:stream";
import {
  EmptyMailboxError,
  MalformedResponseError,
  NoSuchFolderError,
  NoSuchMessageError,
  ProtocolError,
  UnsupportedOperationError,
} from "../types/errors.js";
import type {
  AddableMessage,
  FlagSet,
  MessageFactory,
  MessageSink,
  MessageView,
  SummaryLine,
  Uid,
} from "../types/mailbox.types.js";
import type { SessionPort } from "../types/session.types.js";
import { formatFlagString, formatInternalDate } from "../utils/imapResponse.js";
import { serializeMessage } from "../utils/messageSerializer.js";
import { FlagController } from "./FlagController.js";
import { createLogger } from "./Logger.js";
import { MessageCache } from "./MessageCache.js";
import { MessageRetriever } from "./MessageRetriever.js";
import { SearchEngine } from "./SearchEngine.js";
import {
  type SessionBoundMailbox,
  type TransferTarget,
  TransferOrchestrator,
} from "./TransferOrchestrator.js";

export interface OpenMailboxOptions {
  /** Create the folder when it does not exist (default: false). */
  create?: boolean;
  trash?: TransferTarget;
}

function identity(view: MessageView): MessageView {
  return view;
}

/**
 * One folder on an IMAP server, presented as a collection of messages keyed
 * by UID.
 *
 * Every read goes to the server; `size()` and `contains()` run a full search.
 * Iteration snapshots the UID list once and resolves messages lazily, so it
 * reflects the folder at the time iteration started. One request is in
 * flight at a time; a Mailbox must not be shared by concurrent callers, and
 * two Mailboxes must not share a session.
 *
 * Lock and unlock are no-ops: IMAP has no mailbox locking.
 */
export class Mailbox<T = MessageView>
  implements AsyncIterable<T>, MessageSink, SessionBoundMailbox
{
  private currentFolder: string;
  private readonly cache: MessageCache;
  private readonly searchEngine: SearchEngine;
  private readonly flagController: FlagController;
  private readonly retriever: MessageRetriever<T>;
  private readonly transfer: TransferOrchestrator;
  private logger = createLogger("Mailbox");

  private constructor(
    readonly session: SessionPort,
    folder: string,
    factory: MessageFactory<T>,
    private readonly createMissing: boolean,
  ) {
    this.currentFolder = folder;
    const currentFolder = () => this.currentFolder;

    this.cache = new MessageCache(session, currentFolder);
    this.searchEngine = new SearchEngine(session);
    this.flagController = new FlagController(session, currentFolder);
    this.retriever = new MessageRetriever(
      session,
      this.cache,
      this.flagController,
      factory,
      currentFolder,
    );
    this.transfer = new TransferOrchestrator(
      session,
      this.searchEngine,
      this.flagController,
      this.retriever,
      currentFolder,
    );
  }

  /**
   * Select `folder` on `session` and wrap it. With a `factory`, every
   * retrieved message is passed through it.
   */
  static async open(
    session: SessionPort,
    folder: string,
    options?: OpenMailboxOptions,
  ): Promise<Mailbox<MessageView>>;
  static async open<T>(
    session: SessionPort,
    folder: string,
    options: OpenMailboxOptions & { factory: MessageFactory<T> },
  ): Promise<Mailbox<T>>;
  static async open<T>(
    session: SessionPort,
    folder: string,
    options: OpenMailboxOptions & { factory?: MessageFactory<T> } = {},
  ): Promise<Mailbox<T> | Mailbox<MessageView>> {
    const create = options.create ?? false;
    const mailbox = options.factory
      ? new Mailbox<T>(session, folder, options.factory, create)
      : new Mailbox<MessageView>(session, folder, identity, create);

    await mailbox.selectFolder(folder, create);
    mailbox.trash = options.trash;
    return mailbox;
  }

  get folder(): string {
    return this.currentFolder;
  }

  get trash(): TransferTarget | undefined {
    return this.transfer.trash;
  }

  set trash(target: TransferTarget | undefined) {
    this.transfer.trash = target;
  }

  /** UID currently held by the single-slot raw message cache. */
  get cachedUid(): Uid | undefined {
    return this.cache.cachedUid;
  }

  // ---------------------------------------------------------------------------
  // Search
  // ---------------------------------------------------------------------------

  search(criteria = "ALL", charset?: string): Promise<Uid[]> {
    return this.searchEngine.search(criteria, charset);
  }

  unseenUndeleted(): Promise<Uid[]> {
    return this.searchEngine.unseenUndeleted();
  }

  allUndeleted(): Promise<Uid[]> {
    return this.searchEngine.allUndeleted();
  }

  async contains(uid: Uid): Promise<boolean> {
    return (await this.search("ALL")).includes(uid);
  }

  async size(): Promise<number> {
    return (await this.search("ALL")).length;
  }

  // ---------------------------------------------------------------------------
  // Reading
  // ---------------------------------------------------------------------------

  get(uid: Uid): Promise<T> {
    return this.retriever.getFull(uid);
  }

  async getOrDefault<D>(uid: Uid, defaultValue: D): Promise<T | D> {
    try {
      return await this.get(uid);
    } catch (error) {
      if (error instanceof NoSuchMessageError) {
        return defaultValue;
      }
      throw error;
    }
  }

  getHeader(uid: Uid): Promise<T> {
    return this.retriever.getHeaderOnly(uid);
  }

  async getRawString(uid: Uid): Promise<string> {
    return (await this.cache.fetchRaw(uid)).toString("utf8");
  }

  async getRawStream(uid: Uid): Promise<Readable> {
    return Readable.from(await this.cache.fetchRaw(uid), { objectMode: false });
  }

  getFirstTextPart(uid: Uid): Promise<string> {
    return this.retriever.getFirstTextPart(uid);
  }

  /**
   * One line per message from its header. UIDs that no longer exist are
   * skipped.
   */
  async summary(uids: Iterable<Uid>): Promise<SummaryLine[]> {
    const lines: SummaryLine[] = [];

    for (const uid of uids) {
      let view: MessageView;
      try {
        view = await this.retriever.getHeaderView(uid);
      } catch (error) {
        if (error instanceof NoSuchMessageError) continue;
        throw error;
      }

      const sender = view.parsed.from?.value[0];
      lines.push({
        uid,
        from: sender?.name || sender?.address || "",
        date: view.parsed.date,
        subject: view.parsed.subject ?? "",
      });
    }

    return lines;
  }

  // ---------------------------------------------------------------------------
  // Iteration
  // ---------------------------------------------------------------------------

  keys(): Promise<Uid[]> {
    return this.search("ALL");
  }

  async *iterKeys(): AsyncGenerator<Uid> {
    yield* await this.keys();
  }

  async *iterValues(): AsyncGenerator<T> {
    for (const uid of await this.keys()) {
      yield await this.get(uid);
    }
  }

  async *iterItems(): AsyncGenerator<[Uid, T]> {
    for (const uid of await this.keys()) {
      yield [uid, await this.get(uid)];
    }
  }

  /** Downloads every message; expensive on large folders. */
  async values(): Promise<T[]> {
    const result: T[] = [];
    for await (const message of this.iterValues()) {
      result.push(message);
    }
    return result;
  }

  async items(): Promise<Array<[Uid, T]>> {
    const result: Array<[Uid, T]> = [];
    for await (const item of this.iterItems()) {
      result.push(item);
    }
    return result;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.iterValues();
  }

  // ---------------------------------------------------------------------------
  // Flags
  // ---------------------------------------------------------------------------

  getFlags(uid: Uid): Promise<FlagSet> {
    return this.flagController.getFlags(uid);
  }

  setFlags(uid: Uid, flags: Iterable<string>): Promise<void> {
    return this.flagController.setFlags(uid, flags);
  }

  addFlags(uid: Uid, ...flags: string[]): Promise<void> {
    return this.flagController.addFlags(uid, ...flags);
  }

  removeFlags(uid: Uid, ...flags: string[]): Promise<void> {
    return this.flagController.removeFlags(uid, ...flags);
  }

  getSize(uid: Uid): Promise<number> {
    return this.flagController.getSize(uid);
  }

  getInternalDate(uid: Uid): Promise<Date> {
    return this.flagController.getInternalDate(uid);
  }

  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  copy(uid: Uid, target: TransferTarget): Promise<void> {
    return this.transfer.copy(uid, target);
  }

  move(uid: Uid, target: TransferTarget): Promise<void> {
    return this.transfer.move(uid, target);
  }

  discard(uid: Uid): Promise<void> {
    return this.transfer.discard(uid);
  }

  remove(uid: Uid): Promise<void> {
    return this.transfer.remove(uid);
  }

  delete(uid: Uid): Promise<void> {
    return this.remove(uid);
  }

  expunge(): Promise<void> {
    return this.transfer.expunge();
  }

  flush(): Promise<void> {
    return this.expunge();
  }

  async lock(): Promise<void> {}

  async unlock(): Promise<void> {}

  clear(): Promise<void> {
    return this.transfer.clear();
  }

  /**
   * IMAP cannot replace a message in place. Delete and add instead, knowing
   * that the message gets a new UID and loses its flags.
   */
  async set(uid: Uid, _message: AddableMessage): Promise<never> {
    throw new UnsupportedOperationError(
      `Cannot replace message ${uid}: IMAP has no in-place replacement`,
      "set",
      { folder: this.currentFolder },
    );
  }

  async update(_entries: Iterable<[Uid, AddableMessage]>): Promise<never> {
    throw new UnsupportedOperationError(
      "Updating messages in place is not supported for IMAP mailboxes",
      "update",
      { folder: this.currentFolder },
    );
  }

  /**
   * Append the message and flush.
   *
   * Returns the highest UID in the folder afterwards. That is the new
   * message's UID unless another client appended concurrently; servers do not
   * all report the assigned UID, so nothing stronger is promised.
   */
  async add(message: AddableMessage): Promise<Uid> {
    const timer = this.logger.startTimer("add", { folder: this.currentFolder });
    const { raw, flags, internalDate } = await serializeMessage(message);

    const response = await this.session.append(
      this.currentFolder,
      formatFlagString(flags),
      formatInternalDate(internalDate),
      raw,
    );
    if (response.status !== "OK") {
      timer.end(false, "ProtocolError");
      throw new ProtocolError(
        `${response.status} in append to ${this.currentFolder}`,
        response.status,
        "APPEND",
        { operation: "add", folder: this.currentFolder },
      );
    }

    await this.flush();

    const uids = await this.search("ALL");
    if (uids.length === 0) {
      timer.end(false, "MalformedResponseError");
      throw new MalformedResponseError(
        `Appended message is not visible in ${this.currentFolder}`,
      );
    }

    timer.end(true);
    return uids.reduce((max, uid) => (uid > max ? uid : max));
  }

  async pop(uid: Uid): Promise<T>;
  async pop<D>(uid: Uid, defaultValue: D): Promise<T | D>;
  async pop<D>(uid: Uid, defaultValue?: D): Promise<T | D> {
    let message: T;
    try {
      message = await this.get(uid);
      await this.delete(uid);
    } catch (error) {
      if (error instanceof NoSuchMessageError && defaultValue !== undefined) {
        return defaultValue;
      }
      throw error;
    }
    await this.expunge();
    return message;
  }

  /**
   * Remove and return the message with the lowest UID.
   */
  async popItem(): Promise<[Uid, T]> {
    await this.expunge();

    const [uid] = await this.search("ALL");
    if (uid === undefined) {
      throw new EmptyMailboxError(`Mailbox ${this.currentFolder} is empty`, {
        operation: "popItem",
        folder: this.currentFolder,
      });
    }

    const message = await this.get(uid);
    await this.delete(uid);
    await this.expunge();
    return [uid, message];
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Flush the current folder, then select another one on the same session.
   */
  async switchFolder(name: string, create = false): Promise<void> {
    await this.flush();
    await this.selectFolder(name, create);
    this.currentFolder = name;
    this.cache.invalidate();

    this.logger.info("Switched folder", {
      operation: "switchFolder",
      folder: name,
    });
  }

  /**
   * Open a fresh connection, log in again and re-select the current folder.
   */
  async reconnect(): Promise<void> {
    this.cache.invalidate();
    await this.session.reconnect();
    await this.session.login();
    await this.selectFolder(this.currentFolder, this.createMissing);

    this.logger.info("Reconnected", {
      operation: "reconnect",
      folder: this.currentFolder,
    });
  }

  async close(): Promise<void> {
    await this.flush();
    this.cache.invalidate();
    await this.session.close();
    await this.session.logout();

    this.logger.info("Mailbox closed", {
      operation: "close",
      folder: this.currentFolder,
    });
  }

  /** Same session and same folder name. */
  equals(other: unknown): boolean {
    return (
      other instanceof Mailbox &&
      other.session === this.session &&
      other.folder === this.currentFolder
    );
  }

  private async selectFolder(name: string, create: boolean): Promise<void> {
    try {
      await this.session.select(name);
    } catch (error) {
      if (!(error instanceof NoSuchFolderError) || !create) {
        throw error;
      }
      await this.session.create(name);
      await this.session.select(name);
      this.logger.info("Created folder", {
        operation: "selectFolder",
        folder: name,
      });
    }
  }
}
