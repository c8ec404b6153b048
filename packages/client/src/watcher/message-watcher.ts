import type { ChatSummary } from "@whatsweb/shared";
import { chatKey } from "../parsing/fields.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";

export const DEFAULT_POLL_INTERVAL_MS = 1_000;
export const MIN_POLL_INTERVAL_MS = 100;
/** Oldest keys are forgotten past this many. */
export const MAX_SEEN_KEYS = 1_000;

export interface LatestChatSource {
  fetchLatestChat(): Promise<ChatSummary | null>;
}

export type NewMessageHandler = (chat: ChatSummary) => void | Promise<void>;

export interface MessageWatcherOptions {
  intervalMs?: number;
  /** Treat whatever is on top at start-up as already seen. */
  skipExisting?: boolean;
  logger?: Logger;
}

/**
 * Polls the top of the chat list and reports each chat summary it has not
 * seen before. WhatsApp Web exposes no message events to the page, so the
 * chat list is the change signal: a new message moves its chat to the top
 * with a new preview and time.
 */
export class MessageWatcher {
  readonly intervalMs: number;
  private source: LatestChatSource;
  private handler: NewMessageHandler;
  private skipExisting: boolean;
  private log: Logger;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  /** True while a scheduled poll has not settled yet. */
  private polling = false;
  /** Bumped by start() and stop(); polls from an older generation are discarded. */
  private generation = 0;
  private primed = false;
  private seen = new Set<string>();
  private stopListeners: (() => void)[] = [];

  constructor(
    source: LatestChatSource,
    handler: NewMessageHandler,
    options: MessageWatcherOptions = {},
  ) {
    const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    if (!Number.isFinite(intervalMs) || intervalMs < MIN_POLL_INTERVAL_MS) {
      throw new Error(`intervalMs must be at least ${MIN_POLL_INTERVAL_MS} (got ${intervalMs})`);
    }
    this.intervalMs = intervalMs;
    this.source = source;
    this.handler = handler;
    this.skipExisting = options.skipExisting ?? false;
    this.log = options.logger ?? createLogger("MessageWatcher");
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.generation++;
    this.log.info(`Listening for new messages every ${this.intervalMs}ms.`);
    // A poll left over from before stop() schedules the next one when it settles
    if (!this.polling) this.schedule(0);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.log.info("Stopped listening for new messages.");
    for (const listener of this.stopListeners) listener();
  }

  /** Register a callback for when the watcher stops. */
  onStop(listener: () => void): void {
    this.stopListeners.push(listener);
  }

  /**
   * Run a single poll. Resolves with the chat passed to the handler, or null
   * when nothing new was found. Never rejects.
   */
  pollOnce(): Promise<ChatSummary | null> {
    return this.poll(this.generation);
  }

  private async poll(generation: number): Promise<ChatSummary | null> {
    let latest: ChatSummary | null;
    try {
      latest = await this.source.fetchLatestChat();
    } catch (err) {
      this.log.error(`Failed to read the chat list: ${errorMessage(err)}`);
      return null;
    }
    // Started before a stop() or restart; the next poll reads the list again
    if (generation !== this.generation) return null;
    if (!latest) return null;

    const firstPoll = !this.primed;
    this.primed = true;

    const key = chatKey(latest);
    if (this.seen.has(key)) return null;
    this.remember(key);

    if (firstPoll && this.skipExisting) return null;

    this.log.info(`New message: ${latest.name}: ${latest.recentMessage}`);
    try {
      await this.handler(latest);
    } catch (err) {
      this.log.error(`New-message handler failed: ${errorMessage(err)}`);
    }
    return latest;
  }

  private remember(key: string): void {
    this.seen.add(key);
    if (this.seen.size > MAX_SEEN_KEYS) {
      const oldest = this.seen.values().next();
      if (!oldest.done) this.seen.delete(oldest.value);
    }
  }

  // The next poll is only scheduled once the previous one settles
  private schedule(delayMs: number): void {
    const generation = this.generation;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.polling = true;
      this.poll(generation)
        .catch((err: unknown) => {
          this.log.error(`Poll failed: ${errorMessage(err)}`);
        })
        .then(() => {
          this.polling = false;
          if (!this.running) return;
          // Restarted while this poll was in flight: the new run polls right away
          this.schedule(generation === this.generation ? this.intervalMs : 0);
        });
    }, delayMs);
  }
}
