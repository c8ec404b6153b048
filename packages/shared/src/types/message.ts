export type MessageDirection = "incoming" | "outgoing";

/** Attachment block rendered inside a message row. */
export interface AttachmentInfo {
  name: string | null;
  /** Attachment kind as titled in the UI ("PDF", "Image", "Document"). */
  type: string | null;
  /** Human-readable size, e.g. "120 kB". */
  size: string | null;
  /** Extra detail shown next to the file, e.g. "3 pages". */
  details: string | null;
}

/** A message row as scraped from the open conversation. */
export interface ChatMessage {
  sender: string;
  text: string;
  /** Timestamp exactly as rendered, e.g. "10:32, 1/2/2024". */
  time: string;
  direction: MessageDirection;
  attachment: AttachmentInfo | null;
}
