const REDACTION_PLACEHOLDER = '[REDACTED]';

// Provider credentials that may leak into prompts, replies or config snapshots.
const secretPatterns: readonly RegExp[] = [
  /sk-ant-[a-zA-Z0-9-]{20,}/g,
  /sk-[a-zA-Z0-9_-]{20,}/g,
  /(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?[a-zA-Z0-9_-]+['"]?/g,
];

const SECRET_KEY_NAMES = /^(api_?key|apiKey|token|secret|password|authorization)$/i;

export interface RedactionResult<T> {
  redacted: T;
  redactionCount: number;
}

export function redactString(input: string): RedactionResult<string> {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of secretPatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

/**
 * Walks arrays and plain objects, redacting secret-looking strings and the
 * values of credential-named keys.
 */
export function redactUnknown(input: unknown): RedactionResult<unknown> {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let total = 0;
    const redacted = input.map((item: unknown) => {
      const result = redactUnknown(item);
      total += result.redactionCount;
      return result.redacted;
    });
    return { redacted, redactionCount: total };
  }

  if (typeof input === 'object' && input !== null) {
    let total = 0;
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      if (SECRET_KEY_NAMES.test(key) && typeof value === 'string' && value.length > 0) {
        redacted[key] = REDACTION_PLACEHOLDER;
        total += 1;
        continue;
      }
      const result = redactUnknown(value);
      total += result.redactionCount;
      redacted[key] = result.redacted;
    }
    return { redacted, redactionCount: total };
  }

  return { redacted: input, redactionCount: 0 };
}

/** Redacted copy of a value about to be written to a log, trace or summary file. */
export function redactForLogs(input: unknown): unknown {
  return redactUnknown(input).redacted;
}
