/**
 * Pure helpers that turn strings scraped from WhatsApp Web into records.
 * Kept free of Playwright so the rules can be tested without a browser.
 */

import type { AttachmentInfo, ChatMessage, ChatSummary } from "@whatsweb/shared";

const PRE_PLAIN_TEXT = /^\[(.*?)\] (.*?):\s*$/;
const TRANSLATE_Y = /translateY\((-?\d+(?:\.\d+)?)px\)/;

export const UNKNOWN = "unknown";

/**
 * Parse the `data-pre-plain-text` attribute of a message, e.g.
 * `"[10:32, 1/2/2024] Alice: "`.
 */
export function parsePrePlainText(
  attr: string | null,
): { time: string; sender: string } | null {
  if (!attr) return null;
  const match = PRE_PLAIN_TEXT.exec(attr);
  if (!match) return null;
  return { time: (match[1] ?? "").trim(), sender: (match[2] ?? "").trim() };
}

/**
 * Vertical offset of a virtualized list row from its computed `transform`.
 * Returns null when the value carries no usable offset.
 */
export function parseTranslateY(transform: string | null): number | null {
  if (!transform) return null;
  if (transform === "none") return 0;

  if (transform.startsWith("matrix(")) {
    const parts = transform.replace("matrix(", "").replace(")", "").split(",");
    if (parts.length !== 6) return null;
    const y = Number((parts[5] ?? "").trim());
    return Number.isFinite(y) ? y : null;
  }

  const match = TRANSLATE_Y.exec(transform);
  return match ? Number(match[1]) : null;
}

export function parseUnreadCount(text: string | null): number {
  if (!text) return 0;
  const count = parseInt(text.trim(), 10);
  return Number.isNaN(count) || count < 0 ? 0 : count;
}

/** Digits only, as expected by the `send?phone=` deep link. */
export function normalizePhoneNumber(raw: string): string {
  const digits = raw.replace(/\D/g, "");
  if (!digits) throw new Error(`Invalid phone number: "${raw}"`);
  return digits;
}

function clean(value: string | null): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export interface RawMessageRow {
  text: string | null;
  prePlainText: string | null;
  sender: string | null;
  time: string | null;
  outgoing: boolean;
  attachment: AttachmentInfo | null;
}

export function buildChatMessage(raw: RawMessageRow): ChatMessage {
  const meta = parsePrePlainText(raw.prePlainText);

  let sender = clean(meta?.sender ?? null) ?? clean(raw.sender) ?? UNKNOWN;
  if (raw.outgoing) {
    sender = "You";
  } else if (sender === UNKNOWN) {
    sender = "Sender";
  }

  return {
    sender,
    text: clean(raw.text) ?? UNKNOWN,
    time: clean(meta?.time ?? null) ?? clean(raw.time) ?? UNKNOWN,
    direction: raw.outgoing ? "outgoing" : "incoming",
    attachment: raw.attachment,
  };
}

export interface RawChatListItem {
  name: string | null;
  recentMessage: string | null;
  time: string | null;
  unread: string | null;
  transform: string | null;
}

export function buildChatSummary(raw: RawChatListItem): ChatSummary {
  return {
    name: clean(raw.name) ?? "Unknown",
    recentMessage: clean(raw.recentMessage) ?? "No recent message",
    time: clean(raw.time) ?? "No time available",
    unreadCount: parseUnreadCount(raw.unread),
    offsetY: parseTranslateY(raw.transform) ?? 0,
  };
}

/** Top-most row first; the DOM order of the virtualized list is arbitrary. */
export function sortChatSummaries(chats: ChatSummary[]): ChatSummary[] {
  return [...chats].sort((a, b) => a.offsetY - b.offsetY);
}

/** Identity of a chat-list entry for change detection. */
export function chatKey(chat: ChatSummary): string {
  return JSON.stringify([chat.name, chat.recentMessage, chat.time]);
}
