import { createApp, type AppContext } from "../app";
import { abortOnSigint } from "../lib/abort";
import { loadConfig } from "../lib/config";

/**
 * Runs `fn` against a freshly wired app whose signal aborts on Ctrl-C.
 */
export async function withApp<T>(
  fn: (app: AppContext, signal: AbortSignal) => Promise<T>,
  sessionId?: string
): Promise<T> {
  const config = loadConfig();
  const app = createApp(config, { sessionId });
  const sigint = abortOnSigint();
  try {
    return await fn(app, sigint.signal);
  } finally {
    sigint.dispose();
    app.close();
  }
}

export function parseIntegerOption(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || String(parsed) !== value.trim()) {
    throw new Error(`${flag} must be an integer, got "${value}".`);
  }
  return parsed;
}
