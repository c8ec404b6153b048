import type { Page } from "playwright";
import type {
  ChatMessage,
  ChatSummary,
  ContactIdentifier,
  SessionStatus,
} from "@whatsweb/shared";
import { resolveConfig, type ClientConfig, type ConfigOverrides } from "../config.js";
import { launchSession, type BrowserSession, type SessionLauncher } from "../browser/session.js";
import { readChatListItem, readMessageRow } from "../parsing/dom.js";
import { normalizePhoneNumber, sortChatSummaries } from "../parsing/fields.js";
import {
  CHAT_HEADER_TITLE,
  CHAT_LIST,
  CHAT_LIST_READY,
  FIRST_SEARCH_RESULT_OFFSET,
  LIST_ITEM,
  LOGOUT_CONFIRM_BUTTON,
  LOGOUT_MENU_ITEM,
  MAIN_MENU_BUTTON,
  MAIN_PANE,
  MENU_BUTTONS,
  MENU_ICON,
  MESSAGE_ROW,
  SEARCH_BOX,
  SEARCH_RESULTS,
  SIDE_PANE,
} from "../selectors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { errorMessage, isTimeoutError } from "../utils/errors.js";
import { splitMessage, WHATSAPP_MAX_LENGTH } from "../utils/split-message.js";
import {
  MessageWatcher,
  type MessageWatcherOptions,
  type NewMessageHandler,
} from "../watcher/message-watcher.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WhatsAppClientOptions {
  config?: ConfigOverrides;
  /** Replaces the Playwright launcher, e.g. to attach to an existing page. */
  launcher?: SessionLauncher;
  logger?: Logger;
}

export interface ScrollUpOptions {
  durationMs?: number;
  delta?: number;
  delayMs?: number;
}

const SCROLL_DELTA = 1000;
const SCROLL_DELAY_MS = 100;
const SEARCH_SETTLE_MS = 1000;
const PHONE_RETRY_DELAY_MS = 1000;

/** Deep link that opens (or offers to start) a chat with a phone number. */
export function buildSendUrl(baseUrl: string, phone: string): string {
  const url = new URL("send", baseUrl);
  url.searchParams.set("phone", normalizePhoneNumber(phone));
  url.searchParams.set("text", "");
  url.searchParams.set("type", "phone_number");
  url.searchParams.set("app_absent", "1");
  return url.toString();
}

// ---------------------------------------------------------------------------
// WhatsApp Web client
// ---------------------------------------------------------------------------

export class WhatsAppClient {
  readonly config: ClientConfig;
  private launcher: SessionLauncher;
  private log: Logger;
  private session: BrowserSession | null = null;
  private state: SessionStatus = "idle";
  private watchers = new Set<MessageWatcher>();

  constructor(options: WhatsAppClientOptions = {}) {
    this.config = resolveConfig(options.config);
    this.launcher = options.launcher ?? launchSession;
    this.log =
      options.logger ??
      createLogger("WhatsAppClient", { file: this.config.logFile, debug: this.config.debug });
  }

  get status(): SessionStatus {
    return this.state;
  }

  get page(): Page {
    if (!this.session) {
      throw new Error("Session has not been initialized.");
    }
    return this.session.page;
  }

  // -------------------------------------------------------------------------
  // Session lifecycle
  // -------------------------------------------------------------------------

  async initialize(): Promise<void> {
    if (this.session) return;

    this.state = "launching";
    this.log.info(`Launching ${this.config.browser} with persistent profile "${this.config.userDataDir}"...`);
    try {
      this.session = await this.launcher({
        browser: this.config.browser,
        headless: this.config.headless,
        userDataDir: this.config.userDataDir,
        launchArgs: this.config.launchArgs,
      });
    } catch (err) {
      this.state = "idle";
      throw err;
    }
    this.state = "ready";
    this.log.info(`${this.config.browser} launched successfully.`);
  }

  /**
   * Open WhatsApp Web and wait until the chat list renders. On a fresh
   * profile this is where the QR code gets scanned in the browser window.
   */
  async login(options: { timeoutMs?: number } = {}): Promise<void> {
    const page = this.page;
    if (this.session?.resumed) {
      this.log.info("Existing profile found; expecting a persisted login.");
    } else {
      this.log.info("No saved profile; scan the QR code in the browser window to log in.");
    }

    await page.goto(this.config.baseUrl);
    await page.bringToFront();

    this.log.info("Waiting for WhatsApp chats to load...");
    await page.waitForSelector(CHAT_LIST_READY, {
      timeout: options.timeoutMs ?? this.config.loginTimeoutMs,
    });
    this.log.info("WhatsApp chats loaded.");
  }

  /** Log the account out of WhatsApp Web. Returns false when any step fails. */
  async logout(): Promise<boolean> {
    const page = this.page;
    const timeout = this.config.actionTimeoutMs;
    try {
      await page.locator(MAIN_MENU_BUTTON).click({ timeout });
      await page.locator(LOGOUT_MENU_ITEM).click({ timeout });
      await page.locator(LOGOUT_CONFIRM_BUTTON).click({ timeout });
      this.log.info("Logged out.");
      return true;
    } catch (err) {
      const kind = isTimeoutError(err) ? "Timeout" : "Unexpected error";
      this.log.error(`${kind} during logout: ${errorMessage(err)}`);
      return false;
    }
  }

  /** Stop every watcher and close the browser. Safe to call more than once. */
  async close(): Promise<void> {
    for (const watcher of this.watchers) watcher.stop();
    this.watchers.clear();

    const session = this.session;
    this.session = null;
    this.state = "closed";
    if (session) {
      await session.close();
      this.log.info("Browser closed.");
    }
  }

  // -------------------------------------------------------------------------
  // Input helpers
  // -------------------------------------------------------------------------

  /** Clear the focused text field. */
  async clearText(): Promise<void> {
    const selectAll = this.config.platform === "darwin" ? "Meta+A" : "Control+A";
    await this.page.keyboard.press(selectAll);
    await this.page.keyboard.press("Backspace");
  }

  private async search(query: string): Promise<void> {
    const box = this.page.locator(SEARCH_BOX);
    await box.click({ timeout: this.config.actionTimeoutMs });
    await this.clearText();
    await box.pressSequentially(query);
  }

  // -------------------------------------------------------------------------
  // Scrolling
  // -------------------------------------------------------------------------

  /**
   * Wheel the side pane down until its scroll height stops growing, so every
   * chat in the virtualized list has been rendered at least once.
   */
  async scrollChatListToEnd(): Promise<void> {
    const page = this.page;
    try {
      const pane = page.locator(SIDE_PANE);
      const box = await pane.boundingBox();
      if (!box) {
        this.log.error("Could not locate the chat list for scrolling.");
        return;
      }
      const centerX = box.x + box.width / 2;
      const centerY = box.y + box.height / 2;

      let previousHeight = await pane.evaluate((el) => el.scrollHeight);
      for (;;) {
        await page.mouse.move(centerX, centerY);
        await page.mouse.wheel(0, SCROLL_DELTA);
        await page.waitForTimeout(SCROLL_DELAY_MS);

        const currentHeight = await pane.evaluate((el) => el.scrollHeight);
        if (currentHeight === previousHeight) break;
        previousHeight = currentHeight;
      }
      this.log.info("Reached the end of the chat list.");
    } catch (err) {
      this.log.error(`Error while scrolling the chat list: ${errorMessage(err)}`);
    }
  }

  /** Wheel the open conversation upwards until `durationMs` has elapsed, to load older messages. */
  async scrollChatPaneUp(options: ScrollUpOptions = {}): Promise<void> {
    const { durationMs = 10_000, delta = SCROLL_DELTA, delayMs = SCROLL_DELAY_MS } = options;
    if (durationMs < 0 || delayMs < 0) {
      throw new Error(`durationMs and delayMs must not be negative (got ${durationMs}, ${delayMs})`);
    }
    const page = this.page;
    try {
      const box = await page.locator(MAIN_PANE).boundingBox();
      if (!box) {
        this.log.error("Could not locate the chat pane for scrolling.");
        return;
      }
      const centerX = box.x + box.width / 2;
      const centerY = box.y + box.height / 2;

      const deadline = Date.now() + durationMs;
      while (Date.now() < deadline) {
        await page.mouse.move(centerX, centerY);
        await page.mouse.wheel(0, -delta);
        await page.waitForTimeout(delayMs);
      }
    } catch (err) {
      this.log.error(`Error while scrolling the chat pane: ${errorMessage(err)}`);
    }
  }

  // -------------------------------------------------------------------------
  // Finding and opening chats
  // -------------------------------------------------------------------------

  /**
   * Search for a contact by name prefix. Returns the full chat name of the
   * top search hit when it starts with `prefix` (case-insensitive), else null.
   */
  async findContact(prefix: ContactIdentifier): Promise<string | null> {
    try {
      await this.search(prefix);
      await this.page.waitForTimeout(SEARCH_SETTLE_MS);

      const results = await this.page.$(SEARCH_RESULTS);
      if (!results) {
        this.log.info(`It was not possible to fetch chat "${prefix}"`);
        return null;
      }

      let chatName: string | null = null;
      for (const item of await results.$$(LIST_ITEM)) {
        const entry = await readChatListItem(item);
        if (entry.offsetY === FIRST_SEARCH_RESULT_OFFSET) {
          chatName = entry.name;
        }
      }

      if (chatName && chatName.toUpperCase().startsWith(prefix.toUpperCase())) {
        this.log.info(`Contact with prefix "${prefix}" found as "${chatName}"`);
        return chatName;
      }
      this.log.info(`Contact with prefix "${prefix}" not found`);
      return null;
    } catch (err) {
      this.log.error(`Error while searching for "${prefix}": ${errorMessage(err)}`);
      return null;
    }
  }

  /**
   * Open the chat for a phone number through the send deep link. Navigation
   * timeouts are retried up to `maxAttempts` times.
   */
  async openChatByPhone(phone: string, options: { maxAttempts?: number } = {}): Promise<void> {
    const maxAttempts = options.maxAttempts ?? 3;
    const url = buildSendUrl(this.config.baseUrl, phone);
    const page = this.page;

    for (let attempt = 1; ; attempt++) {
      try {
        await page.goto(url);
        await page.waitForLoadState("networkidle");
        return;
      } catch (err) {
        if (!isTimeoutError(err) || attempt >= maxAttempts) throw err;
        this.log.warn(`Timed out opening chat for ${phone} (attempt ${attempt}/${maxAttempts}); retrying`);
        await page.waitForTimeout(PHONE_RETRY_DELAY_MS);
      }
    }
  }

  /** Open a chat through the search box. Returns the opened chat's title, or null. */
  async openChat(contact: ContactIdentifier): Promise<string | null> {
    try {
      const previous = await this.page.$(CHAT_HEADER_TITLE);
      const previousName = previous ? (await previous.innerText()).trim() : null;

      await this.search(contact);
      await this.page.locator(SEARCH_BOX).press("Enter");

      const chatName = (
        await this.page
          .locator(CHAT_HEADER_TITLE)
          .first()
          .innerText({ timeout: this.config.actionTimeoutMs })
      ).trim();

      // A search without hits leaves the previously open chat in place
      if (
        chatName &&
        chatName === previousName &&
        !chatName.toUpperCase().startsWith(contact.toUpperCase())
      ) {
        this.log.info(`Contact "${contact}" not found; "${chatName}" is still open`);
        return null;
      }
      if (chatName) {
        this.log.info(`Opened the chat panel of "${chatName}"`);
        return chatName;
      }
      this.log.info(`Contact "${contact}" not found`);
      return null;
    } catch (err) {
      if (!isTimeoutError(err)) throw err;
      this.log.warn(`It was not possible to open chat "${contact}": ${errorMessage(err)}`);
      return null;
    }
  }

  /** Close the open conversation through its header menu. Returns false when none is open. */
  async closeChat(): Promise<boolean> {
    const menus = await this.page.$$(MENU_BUTTONS);
    // The first menu belongs to the side pane, the second to the open chat
    const chatMenu = menus[1];
    if (!chatMenu) return false;

    try {
      if (!(await chatMenu.$(MENU_ICON))) return false;
      await chatMenu.click();
      await this.page.keyboard.press("ArrowDown");
      await this.page.keyboard.press("ArrowDown");
      await this.page.keyboard.press("Enter");
      return true;
    } catch (err) {
      this.log.error(`Error closing chat panel: ${errorMessage(err)}`);
      return false;
    }
  }

  // -------------------------------------------------------------------------
  // Sending
  // -------------------------------------------------------------------------

  /**
   * Send a text message to a contact. Returns false when the chat could not be
   * opened. Text over the WhatsApp length limit goes out as several messages.
   */
  async sendMessage(contact: ContactIdentifier, text: string): Promise<boolean> {
    if (!text.trim()) {
      throw new Error("Cannot send an empty message.");
    }

    const chatName = await this.openChat(contact);
    if (!chatName) {
      this.log.error(`Failed to send message to "${contact}": chat not found.`);
      return false;
    }

    // A bare "\r" would be typed as Enter and send the message early
    const normalized = text.replace(/\r\n?/g, "\n");
    for (const chunk of splitMessage(normalized, WHATSAPP_MAX_LENGTH)) {
      await this.typeAndSend(chunk);
    }
    this.log.info(`Sent message to "${chatName}" (${text.length} chars)`);
    return true;
  }

  private async typeAndSend(text: string): Promise<void> {
    const keyboard = this.page.keyboard;
    await this.clearText();

    // Enter sends; Shift+Enter keeps multi-line text in one message
    const lines = text.split("\n");
    for (const [i, line] of lines.entries()) {
      if (i > 0) await keyboard.press("Shift+Enter");
      if (line) await keyboard.type(line, { delay: this.config.typingDelayMs });
    }
    await keyboard.press("Enter");
  }

  // -------------------------------------------------------------------------
  // Reading
  // -------------------------------------------------------------------------

  /** Parse every rendered message row of the open conversation, in DOM order. */
  async extractMessages(): Promise<ChatMessage[]> {
    const page = this.page;
    await page.waitForSelector(MAIN_PANE);
    const rows = await page.$$(MESSAGE_ROW);

    const parsed = await Promise.all(
      rows.map(async (row, index) => {
        try {
          return await readMessageRow(row);
        } catch (err) {
          this.log.warn(`Skipping message row ${index}: ${errorMessage(err)}`);
          return null;
        }
      }),
    );
    return parsed.filter((message): message is ChatMessage => message !== null);
  }

  /** Open a chat and return its last `limit` rendered messages. */
  async extractMessagesFromChat(
    contact: ContactIdentifier,
    limit: number,
  ): Promise<ChatMessage[]> {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new Error(`limit must be a positive integer (got ${limit})`);
    }

    this.log.info(`Fetching chat history for "${contact}" (last ${limit} messages).`);
    const chatName = await this.openChat(contact);
    if (!chatName) {
      this.log.warn(`No chat history for "${contact}": chat not found.`);
      return [];
    }
    return (await this.extractMessages()).slice(-limit);
  }

  /** Read the rendered side-pane chat list, most recent first. */
  async extractChatList(): Promise<ChatSummary[]> {
    const list = await this.page.$(CHAT_LIST);
    if (!list) {
      throw new Error("Chat list is not rendered; is the session logged in?");
    }

    const items = await list.$$(LIST_ITEM);
    const chats: ChatSummary[] = [];
    for (const [index, item] of items.entries()) {
      try {
        chats.push(await readChatListItem(item));
      } catch (err) {
        this.log.warn(`Skipping chat list entry ${index}: ${errorMessage(err)}`);
      }
    }
    this.log.debug(`Read ${chats.length} chat list entries`);
    return sortChatSummaries(chats);
  }

  /** The top entry of the chat list, or null when the list is empty. */
  async fetchLatestChat(): Promise<ChatSummary | null> {
    const chats = await this.extractChatList();
    return chats[0] ?? null;
  }

  /**
   * Poll the chat list and call `handler` for each chat whose latest message
   * has not been seen before. The returned watcher is already running.
   */
  onNewMessage(
    handler: NewMessageHandler,
    options: Omit<MessageWatcherOptions, "logger"> = {},
  ): MessageWatcher {
    // Fail fast instead of logging a poll error every interval
    if (!this.session) {
      throw new Error("Session has not been initialized.");
    }

    const watcher = new MessageWatcher(this, handler, { ...options, logger: this.log });
    watcher.onStop(() => this.watchers.delete(watcher));
    this.watchers.add(watcher);
    watcher.start();
    return watcher;
  }
}
