export type { AttachmentInfo, ChatMessage, MessageDirection } from "./types/message.js";
export type { ChatSummary, ContactIdentifier } from "./types/chat.js";
export type { BrowserName, ChatProviderType, SessionStatus } from "./types/provider.js";
