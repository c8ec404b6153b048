export type ChatProviderType = "whatsapp-web";

export type BrowserName = "chromium" | "firefox" | "webkit";

export type SessionStatus = "idle" | "launching" | "ready" | "closed";
