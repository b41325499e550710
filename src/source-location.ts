// ============================================================
// GUEST SOURCE LOCATION
// ============================================================

/**
 * Position reported by the guest runtime.
 * Lua messages carry a chunk name and a line, never a column.
 */
export interface GuestLocation {
  /** Chunk name as the guest prints it (e.g. `[string "..."]`, `main.lua`) */
  readonly chunkName: string;
  readonly line: number;
}

const LOCATION_PREFIX = /^(.*?):(\d+): /s;

/**
 * Split a guest error message of the form `chunk:line: text`.
 * Returns undefined when the message carries no position.
 */
export function parseGuestLocation(
  message: string
): GuestLocation | undefined {
  const match = LOCATION_PREFIX.exec(message);
  if (!match) return undefined;
  const [, chunkName, line] = match;
  if (chunkName === undefined || line === undefined) return undefined;
  return { chunkName, line: Number(line) };
}
