import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { WhatsAppClient, buildSendUrl } from "../whatsapp-client.js";
import type { BrowserSession, SessionConfig } from "../../browser/session.js";
import type { Logger } from "../../utils/logger.js";
import type { ConfigOverrides } from "../../config.js";
import {
  CHAT_HEADER_TITLE,
  CHAT_LIST,
  CHAT_LIST_READY,
  LIST_ITEM,
  LIST_ITEM_NAME,
  LIST_ITEM_RECENT_MESSAGE,
  LIST_ITEM_TIME,
  LIST_ITEM_UNREAD,
  LOGOUT_CONFIRM_BUTTON,
  LOGOUT_MENU_ITEM,
  MAIN_MENU_BUTTON,
  MAIN_PANE,
  MENU_BUTTONS,
  MENU_ICON,
  MESSAGE_META,
  MESSAGE_OUTGOING,
  MESSAGE_ROW,
  MESSAGE_TEXT,
  MESSAGE_TIME,
  SEARCH_BOX,
  SEARCH_RESULTS,
  SIDE_PANE,
} from "../../selectors.js";
import {
  FakeElement,
  FakePage,
  type FakeElementSpec,
  asPage,
  timeoutError,
} from "../../test-helpers/fake-dom.js";

// ---------------------------------------------------------------------------
// Test setup
// ---------------------------------------------------------------------------

const BASE_URL = "https://web.whatsapp.com/";

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createClient(config: ConfigOverrides = {}) {
  const page = new FakePage();
  const logger = silentLogger();
  const closeSession = vi.fn(async () => {});
  const launcher = vi.fn(
    async (_config: SessionConfig): Promise<BrowserSession> => ({
      page: asPage(page),
      resumed: true,
      close: closeSession,
    }),
  );

  const client = new WhatsAppClient({
    config: {
      browser: "chromium",
      headless: false,
      userDataDir: "test-profile",
      baseUrl: BASE_URL,
      loginTimeoutMs: 600_000,
      actionTimeoutMs: 5_000,
      typingDelayMs: 0,
      launchArgs: [],
      logFile: null,
      platform: "linux",
      ...config,
    },
    launcher,
    logger,
  });

  return { client, page, logger, launcher, closeSession };
}

function chatListItem(
  name: string,
  recentMessage: string,
  time: string,
  offsetY: number,
  unread?: string,
): FakeElementSpec {
  return {
    transform: `matrix(1, 0, 0, 1, 0, ${offsetY})`,
    children: {
      [LIST_ITEM_NAME]: { text: name },
      [LIST_ITEM_RECENT_MESSAGE]: { text: recentMessage },
      [LIST_ITEM_TIME]: { text: time },
      ...(unread ? { [LIST_ITEM_UNREAD]: { text: unread } } : {}),
    },
  };
}

describe("WhatsAppClient", () => {
  let ctx: ReturnType<typeof createClient>;

  beforeEach(() => {
    ctx = createClient();
  });

  // -------------------------------------------------------------------------
  // Session lifecycle
  // -------------------------------------------------------------------------

  describe("session lifecycle", () => {
    it("rejects page operations before initialize", async () => {
      expect(ctx.client.status).toBe("idle");
      await expect(ctx.client.login()).rejects.toThrow("Session has not been initialized.");
      await expect(ctx.client.extractMessages()).rejects.toThrow(
        "Session has not been initialized.",
      );
    });

    it("launches the session once with the configured browser options", async () => {
      await ctx.client.initialize();
      await ctx.client.initialize();

      expect(ctx.launcher).toHaveBeenCalledOnce();
      expect(ctx.launcher).toHaveBeenCalledWith({
        browser: "chromium",
        headless: false,
        userDataDir: "test-profile",
        launchArgs: [],
      });
      expect(ctx.client.status).toBe("ready");
    });

    it("returns to idle when the launch fails", async () => {
      ctx.launcher.mockRejectedValueOnce(new Error("no browser installed"));
      await expect(ctx.client.initialize()).rejects.toThrow("no browser installed");
      expect(ctx.client.status).toBe("idle");
    });

    it("opens WhatsApp Web and waits for the chat list", async () => {
      await ctx.client.initialize();
      await ctx.client.login();

      expect(ctx.page.calls).toEqual([
        `goto ${BASE_URL}`,
        "bringToFront",
        `wait ${CHAT_LIST_READY} 600000`,
      ]);
    });

    it("accepts a login timeout override", async () => {
      await ctx.client.initialize();
      await ctx.client.login({ timeoutMs: 30_000 });
      expect(ctx.page.calls).toContain(`wait ${CHAT_LIST_READY} 30000`);
    });

    it("closes the session once", async () => {
      await ctx.client.initialize();
      await ctx.client.close();
      await ctx.client.close();

      expect(ctx.closeSession).toHaveBeenCalledOnce();
      expect(ctx.client.status).toBe("closed");
    });
  });

  // -------------------------------------------------------------------------
  // Logout
  // -------------------------------------------------------------------------

  describe("logout", () => {
    it("clicks through the menu and confirmation", async () => {
      await ctx.client.initialize();
      expect(await ctx.client.logout()).toBe(true);
      expect(ctx.page.calls).toEqual([
        `click ${MAIN_MENU_BUTTON}`,
        `click ${LOGOUT_MENU_ITEM}`,
        `click ${LOGOUT_CONFIRM_BUTTON}`,
      ]);
    });

    it("returns false and logs when a step fails", async () => {
      ctx.page.clickErrors.set(LOGOUT_MENU_ITEM, timeoutError("menu item not found"));
      await ctx.client.initialize();

      expect(await ctx.client.logout()).toBe(false);
      expect(ctx.logger.error).toHaveBeenCalledWith("Timeout during logout: menu item not found");
      expect(ctx.page.calls).not.toContain(`click ${LOGOUT_CONFIRM_BUTTON}`);
    });
  });

  // -------------------------------------------------------------------------
  // Sending
  // -------------------------------------------------------------------------

  describe("sendMessage", () => {
    it("opens the chat and types the message line by line", async () => {
      ctx.page.texts.set(CHAT_HEADER_TITLE, "Alice Smith");
      await ctx.client.initialize();

      expect(await ctx.client.sendMessage("ali", "hi\nthere")).toBe(true);
      expect(ctx.page.calls).toEqual([
        `click ${SEARCH_BOX}`,
        "key Control+A",
        "key Backspace",
        `fill ${SEARCH_BOX} ali`,
        `press ${SEARCH_BOX} Enter`,
        "key Control+A",
        "key Backspace",
        "type hi",
        "key Shift+Enter",
        "type there",
        "key Enter",
      ]);
    });

    it("uses the macOS select-all shortcut on darwin", async () => {
      const mac = createClient({ platform: "darwin" });
      await mac.client.initialize();
      await mac.client.clearText();
      expect(mac.page.calls).toEqual(["key Meta+A", "key Backspace"]);
    });

    it("returns false when the chat cannot be opened", async () => {
      await ctx.client.initialize();

      expect(await ctx.client.sendMessage("nobody", "hello")).toBe(false);
      expect(ctx.page.calls.filter((c) => c.startsWith("type "))).toEqual([]);
      expect(ctx.logger.error).toHaveBeenCalledWith(
        'Failed to send message to "nobody": chat not found.',
      );
    });

    it("refuses empty messages", async () => {
      await ctx.client.initialize();
      await expect(ctx.client.sendMessage("ali", "  ")).rejects.toThrow(
        "Cannot send an empty message.",
      );
    });

    it("keeps CRLF text in one message", async () => {
      ctx.page.texts.set(CHAT_HEADER_TITLE, "Alice Smith");
      await ctx.client.initialize();

      await ctx.client.sendMessage("ali", "line one\r\nline two\rline three");
      expect(ctx.page.calls.slice(7)).toEqual([
        "type line one",
        "key Shift+Enter",
        "type line two",
        "key Shift+Enter",
        "type line three",
        "key Enter",
      ]);
    });

    it("does not send to the chat left open by a search without hits", async () => {
      ctx.page.elements.set(CHAT_HEADER_TITLE, new FakeElement({ text: "Bob" }));
      ctx.page.texts.set(CHAT_HEADER_TITLE, "Bob");
      await ctx.client.initialize();

      expect(await ctx.client.sendMessage("ali", "hello")).toBe(false);
      expect(ctx.page.calls.filter((c) => c.startsWith("type "))).toEqual([]);
    });

    it("reopens the chat that is already open", async () => {
      ctx.page.elements.set(CHAT_HEADER_TITLE, new FakeElement({ text: "Alice Smith" }));
      ctx.page.texts.set(CHAT_HEADER_TITLE, "Alice Smith");
      await ctx.client.initialize();

      expect(await ctx.client.openChat("ali")).toBe("Alice Smith");
    });

    it("propagates unexpected errors while opening the chat", async () => {
      ctx.page.texts.set(CHAT_HEADER_TITLE, new Error("page crashed"));
      await ctx.client.initialize();
      await expect(ctx.client.openChat("ali")).rejects.toThrow("page crashed");
    });
  });

  // -------------------------------------------------------------------------
  // Finding and opening chats
  // -------------------------------------------------------------------------

  describe("findContact", () => {
    beforeEach(() => {
      ctx.page.elements.set(
        SEARCH_RESULTS,
        new FakeElement({
          lists: {
            [LIST_ITEM]: [
              chatListItem("Chats", "", "", 0),
              chatListItem("Alice Smith", "hi", "10:00", 72),
              chatListItem("Alicia Keys", "yo", "09:00", 144),
            ],
          },
        }),
      );
    });

    it("returns the top search hit matching the prefix", async () => {
      await ctx.client.initialize();
      expect(await ctx.client.findContact("ali")).toBe("Alice Smith");
      expect(ctx.page.calls).toContain("sleep 1000");
    });

    it("returns null when the top hit does not match", async () => {
      await ctx.client.initialize();
      expect(await ctx.client.findContact("bob")).toBeNull();
    });

    it("returns null when no results render", async () => {
      ctx.page.elements.clear();
      await ctx.client.initialize();
      expect(await ctx.client.findContact("ali")).toBeNull();
    });
  });

  describe("openChatByPhone", () => {
    const url = `${BASE_URL}send?phone=15550109999&text=&type=phone_number&app_absent=1`;

    it("builds the send deep link", () => {
      expect(buildSendUrl(BASE_URL, "+1 (555) 010-9999")).toBe(url);
    });

    it("retries navigation timeouts", async () => {
      ctx.page.gotoErrors.push(timeoutError());
      await ctx.client.initialize();

      await ctx.client.openChatByPhone("+1 (555) 010-9999");
      expect(ctx.page.calls).toEqual([`goto ${url}`, "sleep 1000", `goto ${url}`, "load networkidle"]);
    });

    it("gives up after the last attempt", async () => {
      ctx.page.gotoErrors.push(timeoutError(), timeoutError());
      await ctx.client.initialize();

      await expect(
        ctx.client.openChatByPhone("15550109999", { maxAttempts: 2 }),
      ).rejects.toThrow("Timeout 5000ms exceeded.");
      expect(ctx.page.calls.filter((c) => c.startsWith("goto"))).toHaveLength(2);
    });

    it("does not retry other errors", async () => {
      ctx.page.gotoErrors.push(new Error("net::ERR_NAME_NOT_RESOLVED"));
      await ctx.client.initialize();

      await expect(ctx.client.openChatByPhone("15550109999")).rejects.toThrow(
        "net::ERR_NAME_NOT_RESOLVED",
      );
      expect(ctx.page.calls).toEqual([`goto ${url}`]);
    });
  });

  describe("closeChat", () => {
    it("picks Close chat from the conversation menu", async () => {
      const chatMenu = new FakeElement({ children: { [MENU_ICON]: {} } });
      ctx.page.elementLists.set(MENU_BUTTONS, [new FakeElement(), chatMenu]);
      await ctx.client.initialize();

      expect(await ctx.client.closeChat()).toBe(true);
      expect(chatMenu.clicks).toBe(1);
      expect(ctx.page.calls).toEqual(["key ArrowDown", "key ArrowDown", "key Enter"]);
    });

    it("returns false when no chat is open", async () => {
      ctx.page.elementLists.set(MENU_BUTTONS, [new FakeElement()]);
      await ctx.client.initialize();

      expect(await ctx.client.closeChat()).toBe(false);
      expect(ctx.page.calls).toEqual([]);
    });
  });

  // -------------------------------------------------------------------------
  // Scrolling
  // -------------------------------------------------------------------------

  describe("scrolling", () => {
    it("wheels the chat list down until its height settles", async () => {
      ctx.page.boxes.set(SIDE_PANE, { x: 0, y: 100, width: 400, height: 600 });
      ctx.page.scrollHeights.set(SIDE_PANE, [1000, 2000, 2000]);
      await ctx.client.initialize();

      await ctx.client.scrollChatListToEnd();
      expect(ctx.page.calls).toEqual([
        "move 200,400",
        "wheel 0,1000",
        "sleep 100",
        "move 200,400",
        "wheel 0,1000",
        "sleep 100",
      ]);
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("wheels the conversation up for the requested duration", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      ctx.page.onWait = (ms) => vi.advanceTimersByTime(ms);
      ctx.page.boxes.set(MAIN_PANE, { x: 400, y: 0, width: 200, height: 100 });
      await ctx.client.initialize();

      await ctx.client.scrollChatPaneUp({ durationMs: 300, delta: 500, delayMs: 100 });
      expect(ctx.page.calls).toEqual([
        "move 500,50",
        "wheel 0,-500",
        "sleep 100",
        "move 500,50",
        "wheel 0,-500",
        "sleep 100",
        "move 500,50",
        "wheel 0,-500",
        "sleep 100",
      ]);
    });

    it("stops at the deadline even without a pause between wheels", async () => {
      ctx.page.boxes.set(MAIN_PANE, { x: 400, y: 0, width: 200, height: 100 });
      await ctx.client.initialize();

      await ctx.client.scrollChatPaneUp({ durationMs: 20, delayMs: 0 });
      expect(ctx.page.calls.slice(0, 3)).toEqual(["move 500,50", "wheel 0,-1000", "sleep 0"]);
    });

    it("does not scroll for a zero duration", async () => {
      ctx.page.boxes.set(MAIN_PANE, { x: 400, y: 0, width: 200, height: 100 });
      await ctx.client.initialize();

      await ctx.client.scrollChatPaneUp({ durationMs: 0 });
      expect(ctx.page.calls).toEqual([]);
    });

    it("rejects negative timings", async () => {
      await ctx.client.initialize();
      await expect(ctx.client.scrollChatPaneUp({ delayMs: -1 })).rejects.toThrow(
        "durationMs and delayMs must not be negative (got 10000, -1)",
      );
    });

    it("logs and returns when the pane is missing", async () => {
      await ctx.client.initialize();
      await ctx.client.scrollChatPaneUp();

      expect(ctx.page.calls).toEqual([]);
      expect(ctx.logger.error).toHaveBeenCalledWith("Could not locate the chat pane for scrolling.");
    });
  });

  // -------------------------------------------------------------------------
  // Reading
  // -------------------------------------------------------------------------

  describe("extractMessages", () => {
    beforeEach(() => {
      ctx.page.texts.set(CHAT_HEADER_TITLE, "Alice Smith");
      ctx.page.elementLists.set(MESSAGE_ROW, [
        new FakeElement({
          children: {
            [MESSAGE_TEXT]: { text: " Hello there " },
            [MESSAGE_META]: { attrs: { "data-pre-plain-text": "[10:32, 1/2/2024] Alice: " } },
          },
        }),
        new FakeElement({ broken: true }),
        new FakeElement({
          children: {
            [MESSAGE_TEXT]: { text: "On my way" },
            [MESSAGE_TIME]: { text: "10:35" },
            [MESSAGE_OUTGOING]: {},
          },
        }),
      ]);
    });

    it("parses rows in order and skips unreadable ones", async () => {
      await ctx.client.initialize();

      expect(await ctx.client.extractMessages()).toEqual([
        {
          sender: "Alice",
          text: "Hello there",
          time: "10:32, 1/2/2024",
          direction: "incoming",
          attachment: null,
        },
        {
          sender: "You",
          text: "On my way",
          time: "10:35",
          direction: "outgoing",
          attachment: null,
        },
      ]);
      expect(ctx.page.calls).toEqual([`wait ${MAIN_PANE} default`]);
      expect(ctx.logger.warn).toHaveBeenCalledWith("Skipping message row 1: element detached");
    });

    it("returns the last messages of a chat", async () => {
      await ctx.client.initialize();

      const messages = await ctx.client.extractMessagesFromChat("ali", 1);
      expect(messages.map((m) => m.text)).toEqual(["On my way"]);
    });

    it("returns nothing when the chat cannot be opened", async () => {
      ctx.page.texts.clear();
      await ctx.client.initialize();

      expect(await ctx.client.extractMessagesFromChat("nobody", 5)).toEqual([]);
    });

    it("rejects a non-positive limit", async () => {
      await ctx.client.initialize();
      await expect(ctx.client.extractMessagesFromChat("ali", 0)).rejects.toThrow(
        "limit must be a positive integer (got 0)",
      );
    });
  });

  describe("extractChatList", () => {
    it("returns chats ordered top to bottom", async () => {
      ctx.page.elements.set(
        CHAT_LIST,
        new FakeElement({
          lists: {
            [LIST_ITEM]: [
              chatListItem("Bob", "See you", "09:00", 72),
              chatListItem("Carol", "Lunch?", "11:15", 0, "2 unread messages"),
            ],
          },
        }),
      );
      await ctx.client.initialize();

      expect(await ctx.client.extractChatList()).toEqual([
        { name: "Carol", recentMessage: "Lunch?", time: "11:15", unreadCount: 2, offsetY: 0 },
        { name: "Bob", recentMessage: "See you", time: "09:00", unreadCount: 0, offsetY: 72 },
      ]);
      expect(await ctx.client.fetchLatestChat()).toEqual({
        name: "Carol",
        recentMessage: "Lunch?",
        time: "11:15",
        unreadCount: 2,
        offsetY: 0,
      });
    });

    it("returns null as the latest chat of an empty list", async () => {
      ctx.page.elements.set(CHAT_LIST, new FakeElement());
      await ctx.client.initialize();
      expect(await ctx.client.fetchLatestChat()).toBeNull();
    });

    it("skips entries that cannot be read", async () => {
      ctx.page.elements.set(
        CHAT_LIST,
        new FakeElement({
          lists: {
            [LIST_ITEM]: [{ broken: true }, chatListItem("Bob", "See you", "09:00", 72)],
          },
        }),
      );
      await ctx.client.initialize();

      expect(await ctx.client.extractChatList()).toEqual([
        { name: "Bob", recentMessage: "See you", time: "09:00", unreadCount: 0, offsetY: 72 },
      ]);
      expect(ctx.logger.warn).toHaveBeenCalledWith("Skipping chat list entry 0: element detached");
    });

    it("throws when the chat list is not rendered", async () => {
      await ctx.client.initialize();
      await expect(ctx.client.extractChatList()).rejects.toThrow(
        "Chat list is not rendered; is the session logged in?",
      );
    });
  });

  // -------------------------------------------------------------------------
  // Watching
  // -------------------------------------------------------------------------

  describe("onNewMessage", () => {
    it("requires an initialized session", () => {
      expect(() => ctx.client.onNewMessage(vi.fn())).toThrow("Session has not been initialized.");
    });

    it("delivers the latest chat and stops with the client", async () => {
      ctx.page.elements.set(
        CHAT_LIST,
        new FakeElement({ lists: { [LIST_ITEM]: [chatListItem("Dan", "ping", "12:00", 0)] } }),
      );
      await ctx.client.initialize();

      const handler = vi.fn();
      const watcher = ctx.client.onNewMessage(handler, { intervalMs: 500 });
      expect(watcher.isRunning).toBe(true);
      expect(watcher.intervalMs).toBe(500);

      await vi.waitFor(() => expect(handler).toHaveBeenCalledWith({
        name: "Dan",
        recentMessage: "ping",
        time: "12:00",
        unreadCount: 0,
        offsetY: 0,
      }));

      await ctx.client.close();
      expect(watcher.isRunning).toBe(false);
    });
  });
});
