/** Debug logging is on when WHATSWEB_DEBUG is "1" or "true". */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.WHATSWEB_DEBUG === "1" || env.WHATSWEB_DEBUG === "true";
}
