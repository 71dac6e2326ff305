import { beforeEach, describe, expect, it } from "vitest";
import { Mailbox } from "../src/services/Mailbox.js";
import {
  EmptyMailboxError,
  NoSuchFolderError,
  NoSuchMessageError,
  ProtocolError,
  UnsupportedOperationError,
} from "../src/types/errors.js";
import { InMemorySession, rfc822 } from "./support/InMemorySession.js";

describe("Mailbox", () => {
  let session: InMemorySession;
  let mailbox: Mailbox;

  beforeEach(async () => {
    session = new InMemorySession("INBOX", "Archive", "Trash");
    session.seed("INBOX", rfc822("First"), { uid: 5 });
    session.seed("INBOX", rfc822("Second", "Hello", "Carol <carol@example.org>"), {
      uid: 9,
      flags: ["\\Seen"],
    });
    session.seed("INBOX", rfc822("Third", "Hello", "dave@example.org"), {
      uid: 12,
    });
    mailbox = await Mailbox.open(session, "INBOX");
  });

  describe("open", () => {
    it("should select the folder", () => {
      expect(session.selected).toBe("INBOX");
      expect(mailbox.folder).toBe("INBOX");
    });

    it("should fail for a missing folder unless asked to create it", async () => {
      await expect(Mailbox.open(session, "Projects")).rejects.toThrow(
        NoSuchFolderError,
      );

      const projects = await Mailbox.open(session, "Projects", { create: true });
      expect(projects.folder).toBe("Projects");
      expect(session.count("CREATE")).toBe(1);
      expect(session.selected).toBe("Projects");
    });

    it("should apply the factory to retrieved messages", async () => {
      const subjects = await Mailbox.open(session, "INBOX", {
        factory: (view) => view.parsed.subject ?? "",
      });

      expect(await subjects.get(9)).toBe("Second");
      expect(await subjects.values()).toEqual(["First", "Second", "Third"]);
    });

    it("should take the trash from the options", async () => {
      const withTrash = await Mailbox.open(session, "INBOX", { trash: "Trash" });
      expect(withTrash.trash).toBe("Trash");
      expect(mailbox.trash).toBeUndefined();
    });
  });

  describe("membership", () => {
    it("should contain and read every UID the search returns", async () => {
      const uids = await mailbox.search("ALL");
      expect(uids).toEqual([5, 9, 12]);

      for (const uid of uids) {
        expect(await mailbox.contains(uid)).toBe(true);
        expect((await mailbox.get(uid)).uid).toBe(uid);
      }
      expect(await mailbox.contains(6)).toBe(false);
    });

    it("should report the size of the ALL search", async () => {
      expect(await mailbox.size()).toBe(3);
      await mailbox.addFlags(5, "\\Deleted");
      expect(await mailbox.size()).toBe(3);
      await mailbox.expunge();
      expect(await mailbox.size()).toBe(2);
    });

    it("should list unseen and undeleted messages", async () => {
      await mailbox.addFlags(12, "\\Deleted");
      expect(await mailbox.unseenUndeleted()).toEqual([5]);
      expect(await mailbox.allUndeleted()).toEqual([5, 9]);
    });
  });

  describe("reading", () => {
    it("should raise NoSuchMessageError for an absent UID", async () => {
      await expect(mailbox.get(6)).rejects.toThrow(NoSuchMessageError);
    });

    it("should return the default for an absent UID", async () => {
      expect(await mailbox.getOrDefault(6, null)).toBeNull();
      expect((await mailbox.getOrDefault(5, null))?.parsed.subject).toBe(
        "First",
      );
    });

    it("should return the raw message as text and as a stream", async () => {
      expect(await mailbox.getRawString(5)).toBe(rfc822("First"));

      const stream = await mailbox.getRawStream(5);
      expect(stream.readableObjectMode).toBe(false);

      const chunks: Buffer[] = [];
      for await (const chunk of stream) {
        chunks.push(Buffer.from(chunk));
      }
      expect(Buffer.concat(chunks).toString("utf8")).toBe(rfc822("First"));
      expect(session.count("FETCH", (args) => args[1] === "(RFC822)")).toBe(1);
    });

    it("should read the header alone", async () => {
      const header = await mailbox.getHeader(12);
      expect(header.headerOnly).toBe(true);
      expect(header.parsed.subject).toBe("Third");
    });

    it("should read the first text part", async () => {
      expect(await mailbox.getFirstTextPart(5)).toBe("Hello\r\n");
    });

    it("should summarize messages and skip missing ones", async () => {
      const lines = await mailbox.summary([9, 6, 12]);

      expect(lines).toEqual([
        {
          uid: 9,
          from: "Carol",
          date: new Date("2024-07-01T10:00:00Z"),
          subject: "Second",
        },
        {
          uid: 12,
          from: "dave@example.org",
          date: new Date("2024-07-01T10:00:00Z"),
          subject: "Third",
        },
      ]);
    });

    it("should read size and internal date", async () => {
      expect(await mailbox.getSize(5)).toBe(
        Buffer.byteLength(rfc822("First"), "utf8"),
      );
      expect((await mailbox.getInternalDate(5)).toISOString()).toBe(
        "2024-07-01T10:00:00.000Z",
      );
    });
  });

  describe("iteration", () => {
    it("should snapshot the keys at call time", async () => {
      const keys = mailbox.iterKeys();
      expect(await keys.next()).toEqual({ value: 5, done: false });

      session.seed("INBOX", rfc822("Late"), { uid: 20 });

      const rest: number[] = [];
      for await (const uid of keys) rest.push(uid);
      expect(rest).toEqual([9, 12]);
      expect(await mailbox.keys()).toEqual([5, 9, 12, 20]);
    });

    it("should yield values and items in UID order", async () => {
      const subjects: string[] = [];
      for await (const message of mailbox) {
        subjects.push(message.parsed.subject ?? "");
      }
      expect(subjects).toEqual(["First", "Second", "Third"]);

      const items = await mailbox.items();
      expect(items.map(([uid, message]) => [uid, message.parsed.subject])).toEqual([
        [5, "First"],
        [9, "Second"],
        [12, "Third"],
      ]);
    });

    it("should pair keys with values from iterItems", async () => {
      const uids: number[] = [];
      for await (const [uid, message] of mailbox.iterItems()) {
        expect(message.uid).toBe(uid);
        uids.push(uid);
      }
      expect(uids).toEqual([5, 9, 12]);
    });
  });

  describe("flags", () => {
    it("should add and remove a flag on an unflagged message", async () => {
      expect(await mailbox.getFlags(5)).toEqual(new Set());

      await mailbox.addFlags(5, "\\Flagged");
      expect(await mailbox.getFlags(5)).toEqual(new Set(["\\Flagged"]));

      await mailbox.removeFlags(5, "\\Flagged");
      expect(await mailbox.getFlags(5)).toEqual(new Set());
    });

    it("should replace the flag set", async () => {
      await mailbox.setFlags(9, ["\\Answered", "$Todo"]);
      expect(await mailbox.getFlags(9)).toEqual(new Set(["\\Answered", "$Todo"]));
    });
  });

  describe("add", () => {
    it("should append raw text and return the highest UID", async () => {
      const uid = await mailbox.add(rfc822("Appended"));

      expect(uid).toBe(13);
      expect(Math.max(...(await mailbox.search("ALL")))).toBe(uid);
      expect((await mailbox.get(uid)).parsed.subject).toBe("Appended");
      expect(session.count("EXPUNGE")).toBe(1);
    });

    it("should find the highest UID in a very large folder", async () => {
      const uids = Array.from({ length: 200_001 }, (_, i) => i + 1);
      session.inject(
        "SEARCH",
        { status: "OK", data: [uids.join(" ")] },
        (args) => args[args.length - 1] === "(ALL)",
      );

      expect(await mailbox.add(rfc822("Bulk"))).toBe(200_001);
    });

    it("should keep the flags and internal date of a message view", async () => {
      await mailbox.addFlags(9, "\\Flagged");
      const view = await mailbox.get(9);
      view.flags.add("\\Recent");

      const archive = new InMemorySession();
      const target = await Mailbox.open(archive, "INBOX");
      const uid = await target.add(view);

      const [stored] = archive.messages("INBOX");
      expect(uid).toBe(1);
      expect(stored.flags).toEqual(new Set(["\\Seen", "\\Flagged"]));
      expect(stored.internalDate).toEqual(view.internalDate);
      expect(stored.raw.equals(view.source)).toBe(true);
    });

    it("should compose a draft before appending", async () => {
      const uid = await mailbox.add({
        mail: {
          from: "alice@example.org",
          to: "bob@example.org",
          subject: "Draft reply",
          text: "Thanks",
        },
        flags: ["\\Draft"],
        internalDate: new Date("2024-08-01T12:00:00Z"),
      });

      const view = await mailbox.get(uid);
      expect(view.parsed.subject).toBe("Draft reply");
      expect(view.parsed.text?.trim()).toBe("Thanks");
      expect(view.flags).toEqual(new Set(["\\Draft"]));
      expect(view.internalDate.toISOString()).toBe("2024-08-01T12:00:00.000Z");
    });

    it("should refuse a header-only view", async () => {
      const header = await mailbox.getHeader(5);
      await expect(mailbox.add(header)).rejects.toThrow(
        UnsupportedOperationError,
      );
      expect(session.count("APPEND")).toBe(0);
    });

    it("should raise ProtocolError when the append is refused", async () => {
      session.fail("APPEND");
      await expect(mailbox.add(rfc822("Refused"))).rejects.toMatchObject({
        status: "NO",
        command: "APPEND",
      });
    });
  });

  describe("removal", () => {
    it("should remove a message once expunged", async () => {
      await mailbox.remove(9);
      expect(await mailbox.getFlags(9)).toEqual(new Set(["\\Seen", "\\Deleted"]));

      await mailbox.expunge();
      expect(await mailbox.search("ALL")).toEqual([5, 12]);
      expect(await mailbox.contains(9)).toBe(false);
      await expect(mailbox.remove(9)).rejects.toThrow(NoSuchMessageError);
    });

    it("should treat delete as remove", async () => {
      await mailbox.delete(5);
      await mailbox.flush();
      expect(await mailbox.keys()).toEqual([9, 12]);
    });

    it("should discard in place without a trash", async () => {
      await mailbox.discard(12);

      expect(await mailbox.contains(12)).toBe(true);
      expect(await mailbox.getFlags(12)).toEqual(new Set(["\\Deleted"]));
    });

    it("should discard into the trash folder", async () => {
      mailbox.trash = "Trash";
      await mailbox.discard(12);
      await mailbox.expunge();

      expect(await mailbox.contains(12)).toBe(false);
      expect(session.messages("Trash").map((m) => m.raw.toString("utf8"))).toEqual(
        [rfc822("Third", "Hello", "dave@example.org")],
      );
    });

    it("should clear the folder", async () => {
      await mailbox.clear();
      expect(await mailbox.size()).toBe(0);
    });
  });

  describe("transfer", () => {
    it("should copy to another folder on the same server", async () => {
      await mailbox.copy(5, "Archive");

      expect(await mailbox.getRawString(5)).toBe(rfc822("First"));
      expect(await mailbox.getFlags(5)).toEqual(new Set());
      const [copied] = session.messages("Archive");
      expect(copied.raw.toString("utf8")).toBe(rfc822("First"));
    });

    it("should leave a move onto itself without effect", async () => {
      await mailbox.move(9, mailbox);

      expect(await mailbox.size()).toBe(3);
      expect(await mailbox.getFlags(9)).toEqual(new Set(["\\Seen"]));
    });

    it("should move a message to a mailbox on another session", async () => {
      const remote = new InMemorySession();
      const target = await Mailbox.open(remote, "INBOX");

      await mailbox.move(5, target);

      expect(remote.messages("INBOX")).toHaveLength(1);
      expect(await target.get(1)).toMatchObject({ uid: 1 });
      expect(await mailbox.getFlags(5)).toEqual(new Set(["\\Deleted"]));
    });
  });

  describe("unsupported operations", () => {
    it("should refuse replacement in place", async () => {
      await expect(mailbox.set(5, rfc822("Replacement"))).rejects.toThrow(
        UnsupportedOperationError,
      );
      await expect(mailbox.update([[5, rfc822("Replacement")]])).rejects.toThrow(
        UnsupportedOperationError,
      );
    });
  });

  describe("pop", () => {
    it("should read, delete and expunge", async () => {
      const message = await mailbox.pop(9);

      expect(message.parsed.subject).toBe("Second");
      expect(await mailbox.keys()).toEqual([5, 12]);
    });

    it("should return the default for an absent UID", async () => {
      expect(await mailbox.pop(6, "missing")).toBe("missing");
    });

    it("should raise without a default", async () => {
      await expect(mailbox.pop(6)).rejects.toThrow(NoSuchMessageError);
    });

    it("should pop the lowest UID", async () => {
      const [uid, message] = await mailbox.popItem();

      expect(uid).toBe(5);
      expect(message.parsed.subject).toBe("First");
      expect(await mailbox.search("ALL")).toEqual([9, 12]);
    });

    it("should raise EmptyMailboxError on an empty folder", async () => {
      const empty = await Mailbox.open(session, "Archive");
      await expect(empty.popItem()).rejects.toThrow(EmptyMailboxError);
    });

    it("should expunge deleted messages before picking one", async () => {
      await mailbox.addFlags(5, "\\Deleted");
      const [uid] = await mailbox.popItem();
      expect(uid).toBe(9);
    });
  });

  describe("lifecycle", () => {
    it("should flush, then switch folders and drop the cache", async () => {
      await mailbox.get(5);
      expect(mailbox.cachedUid).toBe(5);

      await mailbox.switchFolder("Archive");

      expect(mailbox.folder).toBe("Archive");
      expect(session.selected).toBe("Archive");
      expect(mailbox.cachedUid).toBeUndefined();
      expect(session.count("EXPUNGE")).toBe(1);
    });

    it("should create a folder on switch when asked", async () => {
      await mailbox.switchFolder("Receipts", true);
      expect(mailbox.folder).toBe("Receipts");
      expect(session.folders.has("Receipts")).toBe(true);
    });

    it("should stay on the current folder when the switch fails", async () => {
      await expect(mailbox.switchFolder("Missing")).rejects.toThrow(
        NoSuchFolderError,
      );
      expect(mailbox.folder).toBe("INBOX");
    });

    it("should reconnect, log in and reselect", async () => {
      await mailbox.get(5);
      await mailbox.reconnect();

      expect(session.reconnects).toBe(1);
      expect(session.logins).toBe(1);
      expect(session.selected).toBe("INBOX");
      expect(mailbox.cachedUid).toBeUndefined();
    });

    it("should flush, close and log out", async () => {
      await mailbox.close();

      expect(session.count("EXPUNGE")).toBe(1);
      expect(session.closes).toBe(1);
      expect(session.logouts).toBe(1);
    });

    it("should surface a failed flush on close", async () => {
      session.fail("EXPUNGE");
      await expect(mailbox.close()).rejects.toThrow(ProtocolError);
      expect(session.closes).toBe(0);
    });

    it("should compare by session and folder", async () => {
      const same = await Mailbox.open(session, "INBOX");
      const other = await Mailbox.open(new InMemorySession(), "INBOX");

      expect(mailbox.equals(same)).toBe(true);
      expect(mailbox.equals(other)).toBe(false);
      expect(mailbox.equals("INBOX")).toBe(false);
    });

    it("should treat lock and unlock as no-ops", async () => {
      await expect(mailbox.lock()).resolves.toBeUndefined();
      await expect(mailbox.unlock()).resolves.toBeUndefined();
    });
  });
});
