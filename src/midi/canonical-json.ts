// ─── Canonical JSON ──────────────────────────────────────────────────────────
//
// Deterministic JSON text: object keys sorted at every depth, no whitespace,
// undefined members dropped. Encoding the same value twice gives the same
// bytes, so framed output is reproducible.
// ─────────────────────────────────────────────────────────────────────────────

export function canonicalJson(value: unknown): string {
  const text = JSON.stringify(value, (_key, v: unknown) => sortKeys(v));
  if (text === undefined) {
    throw new TypeError(`Value is not JSON-serializable: ${String(value)}`);
  }
  return text;
}

function sortKeys(value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = Reflect.get(value, key);
  }
  return sorted;
}

/** UTF-8 bytes of the canonical encoding. */
export function encodeCanonical(value: unknown): Uint8Array {
  return new TextEncoder().encode(canonicalJson(value));
}
