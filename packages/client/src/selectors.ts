// ---------------------------------------------------------------------------
// WhatsApp Web selectors
//
// The web app ships obfuscated class names that change between releases.
// Everything the client locates goes through this table.
// ---------------------------------------------------------------------------

// Side pane
export const SIDE_PANE = "#pane-side";
export const CHAT_LIST_READY = '//*[@id="pane-side"]/div[2]/div/div/child::div';
export const SEARCH_BOX =
  "#side div[contenteditable='true'][role='textbox'][data-lexical-editor='true']";
export const SEARCH_RESULTS = 'div[aria-label="Search results."]';
export const CHAT_LIST = 'div[aria-label="Chat list"]';
export const LIST_ITEM = 'div[role="listitem"]';
export const LIST_ITEM_NAME = 'span[dir="auto"]';
export const LIST_ITEM_RECENT_MESSAGE = 'div[class="_ak8k"]>span>span';
export const LIST_ITEM_TIME = "div._ak8i";
export const LIST_ITEM_UNREAD = 'span[aria-label*="unread"]';

/** Vertical offset of the first search hit; the slot above it is the "Chats" heading. */
export const FIRST_SEARCH_RESULT_OFFSET = 72;

// Menus
export const MAIN_MENU_BUTTON =
  'div[role="button"][title="Menu"][aria-label="Menu"][data-tab="2"]';
export const LOGOUT_MENU_ITEM = 'div[role="button"][aria-label="Log out"]';
export const LOGOUT_CONFIRM_BUTTON = 'div:has(h1:text("Log out?")) button:has-text("Log out")';
export const MENU_BUTTONS = "div[aria-label='Menu']";
export const MENU_ICON = "span[aria-hidden='true']";

// Conversation
export const MAIN_PANE = "#main";
export const CHAT_HEADER_TITLE = '#main header ._amig span[dir="auto"]';
export const MESSAGE_ROW = "#main div[role='row']";
export const MESSAGE_TEXT = "span.selectable-text.copyable-text";
export const MESSAGE_META = "div._amk6._amlo div.copyable-text";
export const MESSAGE_SENDER = "span._ahxt.x1ypdohk.xt0b8zv._ao3e";
export const MESSAGE_TIME = "span.x1rg5ohu.x16dsc37";
export const MESSAGE_OUTGOING = "div.message-out";

// Attachments
export const ATTACHMENT_ICON =
  "div.icon-doc-pdf, div.icon-doc-img, div.icon-doc-video, div.icon-audio-download";
export const ATTACHMENT_BLOCK = 'div[title^="Download"]';
export const ATTACHMENT_NAME = "span.selectable-text";
export const ATTACHMENT_TYPE = 'span[title="PDF"], span[title="Image"], span[title="Document"]';
export const ATTACHMENT_SIZE = 'span[title*="kB"], span[title*="MB"]';
export const ATTACHMENT_PAGES = 'span[title*="pages"]';
