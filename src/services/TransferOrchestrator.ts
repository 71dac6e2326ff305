import {
  NoSuchMessageError,
  ProtocolError,
  UnsupportedTargetError,
} from "../types/errors.js";
import {
  type MessageSink,
  SystemFlag,
  type Uid,
} from "../types/mailbox.types.js";
import type { SessionPort } from "../types/session.types.js";
import type { FlagController } from "./FlagController.js";
import { createLogger } from "./Logger.js";
import type { MessageRetriever } from "./MessageRetriever.js";
import type { SearchEngine } from "./SearchEngine.js";

/**
 * A mailbox bound to a session. Targets on the same session are copied
 * server side.
 */
export interface SessionBoundMailbox {
  readonly session: SessionPort;
  readonly folder: string;
}

/**
 * Folder name on the source's server, a mailbox handle, or any message sink.
 */
export type TransferTarget = string | SessionBoundMailbox | MessageSink;

export type ResolvedTarget =
  | { kind: "sameServerFolder"; folder: string }
  | { kind: "foreignSink"; sink: MessageSink }
  | { kind: "invalid"; target: unknown };

function isSessionBoundMailbox(value: unknown): value is SessionBoundMailbox {
  return (
    typeof value === "object" &&
    value !== null &&
    "session" in value &&
    "folder" in value &&
    typeof value.folder === "string"
  );
}

function isMessageSink(value: unknown): value is MessageSink {
  return (
    typeof value === "object" &&
    value !== null &&
    "add" in value &&
    typeof value.add === "function"
  );
}

/**
 * Copy, move and delete choreography for one selected folder.
 *
 * Move is copy followed by a \Deleted flag on the source; the two steps are
 * not atomic and a failure between them leaves the message in both places.
 */
export class TransferOrchestrator {
  private logger = createLogger("TransferOrchestrator");

  /** Folder or mailbox that receives discarded messages. */
  trash?: TransferTarget;

  constructor(
    private readonly session: SessionPort,
    private readonly search: SearchEngine,
    private readonly flags: FlagController,
    private readonly retriever: MessageRetriever<unknown>,
    private readonly folder: () => string,
  ) {}

  resolveTarget(target: unknown): ResolvedTarget {
    if (typeof target === "string") {
      return { kind: "sameServerFolder", folder: target };
    }
    if (isSessionBoundMailbox(target) && target.session === this.session) {
      return { kind: "sameServerFolder", folder: target.folder };
    }
    if (isMessageSink(target)) {
      return { kind: "foreignSink", sink: target };
    }
    return { kind: "invalid", target };
  }

  /**
   * Same server: UID COPY without downloading, no-op when the target is the
   * source folder. Anything else: download and hand the message to the
   * target's lock/add/flush/unlock cycle.
   */
  async copy(uid: Uid, target: TransferTarget): Promise<void> {
    await this.copyResolved(uid, this.resolveTarget(target));
  }

  async move(uid: Uid, target: TransferTarget): Promise<void> {
    const resolved = this.resolveTarget(target);
    await this.copyResolved(uid, resolved);

    if (this.isSourceFolder(resolved)) {
      return;
    }

    const response = await this.session.uid(
      "STORE",
      String(uid),
      "+FLAGS",
      `(${SystemFlag.Deleted})`,
    );
    if (response.status !== "OK") {
      throw new ProtocolError(
        `${response.status} in move of message ${uid}`,
        response.status,
        "STORE",
        { operation: "move", folder: this.folder(), details: { uid } },
      );
    }

    this.logger.debug("Message moved", {
      operation: "move",
      folder: this.folder(),
      uid,
    });
  }

  /**
   * Move to the trash when one is configured, otherwise flag \Deleted in place.
   */
  async discard(uid: Uid): Promise<void> {
    if (this.trash === undefined) {
      await this.flags.addFlags(uid, SystemFlag.Deleted);
      return;
    }

    this.logger.debug("Moving message to trash", {
      operation: "discard",
      folder: this.folder(),
      uid,
    });
    await this.move(uid, this.trash);
  }

  async remove(uid: Uid): Promise<void> {
    await this.assertExists(uid, "remove");
    await this.discard(uid);
  }

  /**
   * Permanently removes every message flagged \Deleted. Irreversible.
   */
  async expunge(): Promise<void> {
    const response = await this.session.expunge();
    if (response.status !== "OK") {
      throw new ProtocolError(
        `${response.status} in expunge`,
        response.status,
        "EXPUNGE",
        { operation: "expunge", folder: this.folder() },
      );
    }
  }

  async clear(): Promise<void> {
    const uids = await this.search.allUndeleted();
    for (const uid of uids) {
      await this.discard(uid);
    }
    await this.expunge();

    this.logger.info("Mailbox cleared", {
      operation: "clear",
      folder: this.folder(),
      metadata: { discarded: uids.length },
    });
  }

  private async assertExists(uid: Uid, operation: string): Promise<void> {
    const uids = await this.search.search("ALL");
    if (!uids.includes(uid)) {
      throw new NoSuchMessageError(
        `No message with UID ${uid}`,
        uid,
        this.folder(),
        { operation },
      );
    }
  }

  private isSourceFolder(resolved: ResolvedTarget): boolean {
    return (
      resolved.kind === "sameServerFolder" && resolved.folder === this.folder()
    );
  }

  private async copyResolved(uid: Uid, resolved: ResolvedTarget): Promise<void> {
    switch (resolved.kind) {
      case "sameServerFolder": {
        if (this.isSourceFolder(resolved)) {
          return;
        }
        // UID COPY of an absent UID answers OK and copies nothing
        await this.assertExists(uid, "copy");
        const response = await this.session.uid(
          "COPY",
          String(uid),
          resolved.folder,
        );
        if (response.status !== "OK") {
          throw new ProtocolError(
            `${response.status} in copy of message ${uid} to ${resolved.folder}`,
            response.status,
            "COPY",
            {
              operation: "copy",
              folder: this.folder(),
              details: { uid, target: resolved.folder },
            },
          );
        }
        return;
      }

      case "foreignSink": {
        const view = await this.retriever.getFullView(uid);
        const { sink } = resolved;
        await sink.lock?.();
        try {
          await sink.add(view);
          await sink.flush?.();
        } finally {
          await sink.unlock?.();
        }
        return;
      }

      case "invalid":
        throw new UnsupportedTargetError(
          `Copy target of type ${typeof resolved.target} is neither a folder name nor a mailbox`,
          { operation: "copy", folder: this.folder() },
        );
    }
  }
}
