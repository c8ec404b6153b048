import { z } from "zod";
import type { BrowserName } from "@whatsweb/shared";

export interface ClientConfig {
  /** Playwright browser engine to launch. */
  browser: BrowserName;
  headless: boolean;
  /** Persistent profile directory; keeps the WhatsApp login between runs. */
  userDataDir: string;
  baseUrl: string;
  /** How long login waits for the chat list (QR scan included). */
  loginTimeoutMs: number;
  /** Timeout for individual clicks and reads. */
  actionTimeoutMs: number;
  /** Per-key delay when typing a message. */
  typingDelayMs: number;
  /** Extra command-line switches for the browser. */
  launchArgs: string[];
  /** Append log lines to this file when set. */
  logFile: string | null;
  debug: boolean;
  /** Decides the select-all shortcut (Meta on macOS, Control elsewhere). */
  platform: NodeJS.Platform;
}

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const optionalPath = z
  .string()
  .optional()
  .transform((v) => (v ? v : null));

const envSchema = z.object({
  WHATSWEB_BROWSER: z.enum(["chromium", "firefox", "webkit"]).default("chromium"),
  WHATSWEB_HEADLESS: booleanFlag.default("false"),
  WHATSWEB_USER_DATA_DIR: z.string().min(1).default("user_data"),
  WHATSWEB_BASE_URL: z.string().url().default("https://web.whatsapp.com/"),
  WHATSWEB_LOGIN_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  WHATSWEB_ACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  WHATSWEB_TYPING_DELAY_MS: z.coerce.number().int().nonnegative().default(20),
  WHATSWEB_BROWSER_ARGS: z
    .string()
    .optional()
    .transform((v) => (v ? v.split(/\s+/).filter(Boolean) : [])),
  WHATSWEB_LOG_FILE: optionalPath,
  WHATSWEB_DEBUG: booleanFlag.default("false"),
});

const overridesSchema = z
  .object({
    browser: z.enum(["chromium", "firefox", "webkit"]),
    headless: z.boolean(),
    userDataDir: z.string().min(1),
    baseUrl: z.string().url(),
    loginTimeoutMs: z.number().int().positive(),
    actionTimeoutMs: z.number().int().positive(),
    typingDelayMs: z.number().int().nonnegative(),
    launchArgs: z.array(z.string()),
    logFile: z.string().min(1).nullable(),
    debug: z.boolean(),
  })
  .partial();

export type ConfigOverrides = Partial<ClientConfig>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Read client configuration from WHATSWEB_* environment variables.
 * Throws with every failing variable listed.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): ClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  const e = parsed.data;

  return {
    browser: e.WHATSWEB_BROWSER,
    headless: e.WHATSWEB_HEADLESS,
    userDataDir: e.WHATSWEB_USER_DATA_DIR,
    baseUrl: e.WHATSWEB_BASE_URL,
    loginTimeoutMs: e.WHATSWEB_LOGIN_TIMEOUT_MS,
    actionTimeoutMs: e.WHATSWEB_ACTION_TIMEOUT_MS,
    typingDelayMs: e.WHATSWEB_TYPING_DELAY_MS,
    launchArgs: e.WHATSWEB_BROWSER_ARGS,
    logFile: e.WHATSWEB_LOG_FILE,
    debug: e.WHATSWEB_DEBUG,
    platform,
  };
}

/** Environment config with explicit options layered on top. */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): ClientConfig {
  const { platform, ...rest } = overrides;
  const parsed = overridesSchema.safeParse(rest);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }

  const base = loadConfig(env, platform ?? process.platform);
  const o = parsed.data;
  return {
    browser: o.browser ?? base.browser,
    headless: o.headless ?? base.headless,
    userDataDir: o.userDataDir ?? base.userDataDir,
    baseUrl: o.baseUrl ?? base.baseUrl,
    loginTimeoutMs: o.loginTimeoutMs ?? base.loginTimeoutMs,
    actionTimeoutMs: o.actionTimeoutMs ?? base.actionTimeoutMs,
    typingDelayMs: o.typingDelayMs ?? base.typingDelayMs,
    launchArgs: o.launchArgs ?? base.launchArgs,
    // null is a valid override: it turns the file sink off
    logFile: o.logFile === undefined ? base.logFile : o.logFile,
    debug: o.debug ?? base.debug,
    platform: base.platform,
  };
}
