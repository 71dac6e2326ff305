import type { ImapConnectionConfig, ServerConfig } from "../config/config.js";
import type { MessageView } from "../types/mailbox.types.js";
import {
  type ImapClientFactory,
  createImapClient,
  ImapFlowSession,
} from "./ImapFlowSession.js";
import { createLogger } from "./Logger.js";
import { Mailbox } from "./Mailbox.js";

const logger = createLogger("MailboxFactory");

/**
 * Connect and authenticate a session.
 */
export async function createImapSession(
  config: ImapConnectionConfig,
  createClient: ImapClientFactory = createImapClient,
): Promise<ImapFlowSession> {
  const session = new ImapFlowSession(config, createClient);
  await session.login();
  return session;
}

/**
 * Connect, then open the configured folder, creating it when allowed. The
 * configured trash folder, if any, receives discarded messages.
 */
export async function openMailbox(
  config: ServerConfig,
  createClient: ImapClientFactory = createImapClient,
): Promise<Mailbox<MessageView>> {
  const timer = logger.startTimer("openMailbox", {
    host: config.imap.host,
    folder: config.mailbox.folder,
  });

  try {
    const session = await createImapSession(config.imap, createClient);
    const mailbox = await Mailbox.open(session, config.mailbox.folder, {
      create: config.mailbox.createFolder,
      trash: config.mailbox.trashFolder,
    });
    timer.end(true);
    return mailbox;
  } catch (error) {
    timer.end(false, error instanceof Error ? error.name : "Unknown");
    throw error;
  }
}
