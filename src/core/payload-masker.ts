/**
 * Payload masking for request/response logging.
 *
 * Deep-walks a request or response and replaces the values of
 * sensitive-looking fields (passwords, tokens, card data) with
 * MASKED_PLACEHOLDER, at any depth. Returns a copy; the input is never
 * mutated. Reports the masked field paths so callers can log them.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Replacement for the value of a masked field. */
export const MASKED_PLACEHOLDER = '***MASKED***';

/** Replacement for an object already being walked higher up. */
export const CIRCULAR_PLACEHOLDER = '[Circular]';

/**
 * Field names whose values are masked. Matched case-insensitively against
 * the key alone, never the value.
 */
const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /pass(word|wd|phrase)/i,
  /token/i,
  /secret/i,
  /api[-_]?key/i,
  /private[-_]?key/i,
  /auth/i,
  /credential/i,
  /^ssn$/i,
  /social[-_]?security/i,
  /credit[-_]?card/i,
  /card[-_]?number/i,
  /cvv|cvc/i,
  /^pin$/i,
];

export function isSensitiveField(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

// ---------------------------------------------------------------------------
// maskPayload
// ---------------------------------------------------------------------------

export interface MaskResult {
  value: unknown;
  /** JSON-path-style paths of the masked fields, e.g. `$.user.password`. */
  maskedPaths: string[];
}

export function maskPayload(value: unknown): MaskResult {
  const maskedPaths: string[] = [];
  const masked = walk(value, '$', maskedPaths, new WeakSet<object>());
  return { value: masked, maskedPaths };
}

function walk(value: unknown, path: string, maskedPaths: string[], active: WeakSet<object>): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (active.has(value)) {
    return CIRCULAR_PLACEHOLDER;
  }

  active.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown, index) => walk(item, `${path}[${index}]`, maskedPaths, active));
    }

    const result: Record<string, unknown> = {};
    for (const key of Object.keys(value)) {
      if (isSensitiveField(key)) {
        result[key] = MASKED_PLACEHOLDER;
        maskedPaths.push(`${path}.${key}`);
        continue;
      }
      result[key] = walk(Reflect.get(value, key), `${path}.${key}`, maskedPaths, active);
    }
    return result;
  } finally {
    // Shared (non-cyclic) references elsewhere in the tree are walked again.
    active.delete(value);
  }
}
