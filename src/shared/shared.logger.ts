import { isArchiveDebugEnabled } from "./shared.config";

export type DebugLogger = (event: string, payload?: Record<string, unknown>) => void;

/**
 * Scoped logger that stays silent unless `PPAK_DEBUG=1`. The flag is read on
 * every call so tests and long-lived callers can toggle it at runtime.
 */
export const createDebugLogger = (scope: string): DebugLogger => {
  return (event, payload) => {
    if (!isArchiveDebugEnabled()) {
      return;
    }

    console.info(`[${scope}] ${event}`, payload || {});
  };
};
