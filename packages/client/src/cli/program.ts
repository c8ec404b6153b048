/**
 * `whatsweb` command-line interface.
 *
 * Usage:
 *   whatsweb login
 *   whatsweb send <contact> <message...>
 *   whatsweb history <contact> [--limit <n>]
 *   whatsweb chats [--all]
 *   whatsweb watch [--interval <ms>] [--skip-existing]
 *   whatsweb logout
 *
 * Global options (override WHATSWEB_* environment variables):
 *   --headless  --user-data-dir <dir>  --browser <name>  --log-file <path>  --debug
 */

import { Command, InvalidArgumentError } from "commander";
import type { BrowserName } from "@whatsweb/shared";
import type { ConfigOverrides } from "../config.js";
import type { WhatsAppClient } from "../client/whatsapp-client.js";
import { MIN_POLL_INTERVAL_MS } from "../watcher/message-watcher.js";

export type CliClient = Pick<
  WhatsAppClient,
  | "initialize"
  | "login"
  | "logout"
  | "close"
  | "sendMessage"
  | "extractMessagesFromChat"
  | "extractChatList"
  | "scrollChatListToEnd"
  | "onNewMessage"
>;

export interface CliDeps {
  createClient(config: ConfigOverrides): CliClient;
  /** Print one line of output. */
  write(line: string): void;
  /** Resolves when the user asks a long-running command to stop. */
  waitForInterrupt(): Promise<void>;
  /** Where usage errors and help go; defaults to stderr. */
  writeErr?: (text: string) => void;
}

export type GlobalOptions = {
  headless?: boolean;
  userDataDir?: string;
  browser?: BrowserName;
  logFile?: string;
  debug?: boolean;
};

const BROWSERS: readonly BrowserName[] = ["chromium", "firefox", "webkit"];

function parseBrowser(value: string): BrowserName {
  const match = BROWSERS.find((b) => b === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of ${BROWSERS.join(", ")}.`);
  }
  return match;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

function parseInterval(value: string): number {
  const n = parsePositiveInt(value);
  if (n < MIN_POLL_INTERVAL_MS) {
    throw new InvalidArgumentError(`Expected at least ${MIN_POLL_INTERVAL_MS} ms.`);
  }
  return n;
}

export function toConfigOverrides(opts: GlobalOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (opts.headless) overrides.headless = true;
  if (opts.userDataDir) overrides.userDataDir = opts.userDataDir;
  if (opts.browser) overrides.browser = opts.browser;
  if (opts.logFile) overrides.logFile = opts.logFile;
  if (opts.debug) overrides.debug = true;
  return overrides;
}

export function buildProgram(deps: CliDeps): Command {
  const program = new Command();
  // Subcommands copy these settings, so they come first.
  // Errors are thrown to the caller instead of exiting the process.
  program.exitOverride();
  if (deps.writeErr) program.configureOutput({ writeErr: deps.writeErr });

  program
    .name("whatsweb")
    .description("Drive WhatsApp Web from the command line")
    .option("--headless", "run the browser without a window")
    .option("--user-data-dir <dir>", "persistent browser profile directory")
    .option("--browser <name>", "chromium, firefox or webkit", parseBrowser)
    .option("--log-file <path>", "append log lines to this file")
    .option("--debug", "print debug logging");

  async function withClient<T>(fn: (client: CliClient) => Promise<T>): Promise<T> {
    const client = deps.createClient(toConfigOverrides(program.opts<GlobalOptions>()));
    try {
      await client.initialize();
      await client.login();
      return await fn(client);
    } finally {
      await client.close();
    }
  }

  program
    .command("login")
    .description("Open WhatsApp Web and wait until the chats load (scan the QR code if asked)")
    .action(async () => {
      await withClient(async () => {
        deps.write("Logged in.");
      });
    });

  program
    .command("send <contact> <message...>")
    .description("Send a text message to a contact")
    .action(async (contact: string, words: string[]) => {
      const text = words.join(" ");
      await withClient(async (client) => {
        if (!(await client.sendMessage(contact, text))) {
          throw new Error(`Could not open chat "${contact}"`);
        }
        deps.write(`Sent to ${contact}.`);
      });
    });

  program
    .command("history <contact>")
    .description("Print the last messages of a chat as JSON")
    .option("-n, --limit <n>", "number of messages", parsePositiveInt, 20)
    .action(async (contact: string, opts: { limit: number }) => {
      await withClient(async (client) => {
        const messages = await client.extractMessagesFromChat(contact, opts.limit);
        deps.write(JSON.stringify(messages, null, 2));
      });
    });

  program
    .command("chats")
    .description("Print the chat list as JSON")
    .option("--all", "scroll the list to the end first")
    .action(async (opts: { all?: boolean }) => {
      await withClient(async (client) => {
        if (opts.all) await client.scrollChatListToEnd();
        const chats = await client.extractChatList();
        deps.write(JSON.stringify(chats, null, 2));
      });
    });

  program
    .command("watch")
    .description("Print each new chat as a JSON line until interrupted")
    .option("--interval <ms>", "poll interval", parseInterval, 1000)
    .option("--skip-existing", "ignore the chat that is on top at start-up")
    .action(async (opts: { interval: number; skipExisting?: boolean }) => {
      await withClient(async (client) => {
        const watcher = client.onNewMessage(
          (chat) => {
            deps.write(JSON.stringify(chat));
          },
          { intervalMs: opts.interval, skipExisting: opts.skipExisting ?? false },
        );
        await deps.waitForInterrupt();
        watcher.stop();
      });
    });

  program
    .command("logout")
    .description("Log this browser profile out of WhatsApp Web")
    .action(async () => {
      await withClient(async (client) => {
        if (!(await client.logout())) {
          throw new Error("Logout failed");
        }
        deps.write("Logged out.");
      });
    });

  return program;
}
