import type { ElementHandle } from "playwright";
import type { AttachmentInfo, ChatMessage, ChatSummary } from "@whatsweb/shared";
import {
  ATTACHMENT_BLOCK,
  ATTACHMENT_ICON,
  ATTACHMENT_NAME,
  ATTACHMENT_PAGES,
  ATTACHMENT_SIZE,
  ATTACHMENT_TYPE,
  LIST_ITEM_NAME,
  LIST_ITEM_RECENT_MESSAGE,
  LIST_ITEM_TIME,
  LIST_ITEM_UNREAD,
  MESSAGE_META,
  MESSAGE_OUTGOING,
  MESSAGE_SENDER,
  MESSAGE_TEXT,
  MESSAGE_TIME,
} from "../selectors.js";
import { buildChatMessage, buildChatSummary } from "./fields.js";

export type DomElement = ElementHandle<Element>;

async function textOf(root: DomElement, selector: string): Promise<string | null> {
  const el = await root.$(selector);
  return el ? el.innerText() : null;
}

async function attributeOf(
  root: DomElement,
  selector: string,
  name: string,
): Promise<string | null> {
  const el = await root.$(selector);
  return el ? el.getAttribute(name) : null;
}

/** Read the download block of a document/media message, or null when there is none. */
export async function readAttachment(row: DomElement): Promise<AttachmentInfo | null> {
  const block = await row.$(ATTACHMENT_BLOCK);
  if (!block) return null;

  const [name, type, size, details] = await Promise.all([
    textOf(block, ATTACHMENT_NAME),
    attributeOf(row, ATTACHMENT_TYPE, "title"),
    attributeOf(row, ATTACHMENT_SIZE, "title"),
    attributeOf(row, ATTACHMENT_PAGES, "title"),
  ]);

  return { name: name?.trim() || null, type, size, details };
}

export async function readMessageRow(row: DomElement): Promise<ChatMessage> {
  const [text, prePlainText, sender, time, outgoing, icon] = await Promise.all([
    textOf(row, MESSAGE_TEXT),
    attributeOf(row, MESSAGE_META, "data-pre-plain-text"),
    textOf(row, MESSAGE_SENDER),
    textOf(row, MESSAGE_TIME),
    row.$(MESSAGE_OUTGOING),
    row.$(ATTACHMENT_ICON),
  ]);

  const attachment = icon ? await readAttachment(row) : null;

  return buildChatMessage({
    text,
    prePlainText,
    sender,
    time,
    outgoing: outgoing !== null,
    attachment,
  });
}

export async function readChatListItem(item: DomElement): Promise<ChatSummary> {
  const [name, recentMessage, time, unread, transform] = await Promise.all([
    textOf(item, LIST_ITEM_NAME),
    textOf(item, LIST_ITEM_RECENT_MESSAGE),
    textOf(item, LIST_ITEM_TIME),
    textOf(item, LIST_ITEM_UNREAD),
    item.evaluate((el) => window.getComputedStyle(el).transform),
  ]);

  return buildChatSummary({ name, recentMessage, time, unread, transform });
}
