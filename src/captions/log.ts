/** Recovered conditions are reported on stderr as `[scope] message`. */
export function warn(scope: string, message: string, ...details: unknown[]): void {
  if (process.env.CAPTION_LOG_LEVEL === "silent") return;
  console.warn(`[${scope}] ${message}`, ...details);
}
