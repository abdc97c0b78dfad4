// worldcore/npc/ContactInbox.ts

import type { Notifier } from "../drops/DropTypes";
import { Logger, type LogSink } from "../utils/logger";

export interface ContactIdentity {
  id: string;
  firstName: string;
  lastName: string;
}

export interface ContactMessage {
  seq: number;
  from: string;
  text: string;
  sentAt: string; // ISO
  read: boolean;
}

/**
 * Player-facing message thread for one NPC contact.
 * This is the only Notifier the drop core talks to.
 */
export class ContactInbox implements Notifier {
  private readonly messages: ContactMessage[] = [];
  private seq = 0;

  constructor(
    readonly contact: ContactIdentity,
    private readonly log: LogSink = Logger.scope("CONTACT"),
    private readonly now: () => Date = () => new Date(),
  ) {}

  get displayName(): string {
    return `${this.contact.firstName} ${this.contact.lastName}`;
  }

  sendMessage(text: string): void {
    const msg: ContactMessage = {
      seq: ++this.seq,
      from: this.displayName,
      text,
      sentAt: this.now().toISOString(),
      read: false,
    };
    this.messages.push(msg);
    this.log.info(`${msg.from}: ${text}`);
  }

  list(): ContactMessage[] {
    return this.messages.map((m) => ({ ...m }));
  }

  unreadCount(): number {
    return this.messages.filter((m) => !m.read).length;
  }

  /** Return what was unread (as it was before reading), then mark it read. */
  readAll(): ContactMessage[] {
    const unread = this.messages.filter((m) => !m.read);
    const out = unread.map((m) => ({ ...m }));
    for (const m of unread) m.read = true;
    return out;
  }
}
