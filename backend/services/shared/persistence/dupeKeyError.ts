// backend/services/shared/persistence/dupeKeyError.ts
/**
 * Purpose:
 * - Centralize Mongo duplicate-key parsing (E11000).
 * - Provide a standard DuplicateKeyError usable by every store, including the
 *   in-memory one, so callers translate a single shape.
 */

export type DuplicateInfo = {
  index?: string;
  key?: Record<string, unknown>;
  message: string;
};

function numericCode(err: object): number | undefined {
  const code =
    ("code" in err ? err.code : undefined) ??
    ("errorCode" in err ? err.errorCode : undefined);
  return typeof code === "number" ? code : undefined;
}

function keyPatternOf(err: object): Record<string, unknown> | undefined {
  if (!("keyValue" in err)) return undefined;
  const kv = err.keyValue;
  if (kv && typeof kv === "object" && !Array.isArray(kv)) {
    return Object.fromEntries(Object.entries(kv));
  }
  return undefined;
}

export function parseDuplicateKey(err: unknown): DuplicateInfo | null {
  if (err instanceof DuplicateKeyError) {
    return { index: err.index, key: err.key, message: err.message };
  }
  if (!err || typeof err !== "object") return null;

  const message = "message" in err ? String(err.message ?? "") : "";
  if (numericCode(err) !== 11000 && !/E11000 duplicate key error/i.test(message)) {
    return null;
  }

  const out: DuplicateInfo = { message };

  const idxMatch = message.match(/index:\s*([^\s]+)\s/);
  if (idxMatch) out.index = idxMatch[1];

  // The driver exposes keyValue; fall back to scraping the message.
  out.key = keyPatternOf(err);
  if (!out.key) {
    const keyMatch = message.match(/dup key:\s*(\{.*\})/);
    if (keyMatch) {
      const raw = keyMatch[1];
      try {
        const jsonish = raw.replace(/(['"])?([a-zA-Z0-9_]+)(['"])?:/g, '"$2":');
        const parsed: unknown = JSON.parse(jsonish);
        out.key =
          parsed && typeof parsed === "object" && !Array.isArray(parsed)
            ? Object.fromEntries(Object.entries(parsed))
            : { raw };
      } catch {
        out.key = { raw };
      }
    }
  }

  return out;
}

export class DuplicateKeyError extends Error {
  public readonly code = 11000;
  public readonly index?: string;
  public readonly key?: Record<string, unknown>;

  constructor(info: DuplicateInfo) {
    super(info.message);
    this.name = "DuplicateKeyError";
    this.index = info.index;
    this.key = info.key;
  }
}
