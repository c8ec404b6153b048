export { WhatsAppClient, buildSendUrl } from "./client/whatsapp-client.js";
export type { WhatsAppClientOptions, ScrollUpOptions } from "./client/whatsapp-client.js";
export { MessageWatcher, DEFAULT_POLL_INTERVAL_MS } from "./watcher/message-watcher.js";
export type {
  LatestChatSource,
  MessageWatcherOptions,
  NewMessageHandler,
} from "./watcher/message-watcher.js";
export { launchSession } from "./browser/session.js";
export type { BrowserSession, SessionConfig, SessionLauncher } from "./browser/session.js";
export { loadConfig, resolveConfig } from "./config.js";
export type { ClientConfig, ConfigOverrides } from "./config.js";
export {
  buildChatMessage,
  buildChatSummary,
  normalizePhoneNumber,
  parsePrePlainText,
  parseTranslateY,
  parseUnreadCount,
} from "./parsing/fields.js";
export { readAttachment, readChatListItem, readMessageRow } from "./parsing/dom.js";
export { WhatsAppWebProvider } from "./provider/WhatsAppWebProvider.js";
export type { IChatProvider } from "./provider/IChatProvider.js";
export { createLogger } from "./utils/logger.js";
export type { Logger, LoggerOptions } from "./utils/logger.js";
export { splitMessage, WHATSAPP_MAX_LENGTH } from "./utils/split-message.js";
export * as selectors from "./selectors.js";
export type {
  AttachmentInfo,
  ChatMessage,
  ChatSummary,
  ContactIdentifier,
  MessageDirection,
} from "@whatsweb/shared";
