const REDACTION_PLACEHOLDER = '[REDACTED]';

// Provider API key prefixes
const apiKeyPatterns = [
  /sk-[a-zA-Z0-9]{20,}/g, // OpenAI style
  /sk-ant-[a-zA-Z0-9-]{20,}/g, // Anthropic style
];

// Inline credential assignments, e.g. in a task description or generated code
const envVarPatterns = [/(?:TOKEN|SECRET|API_KEY)\s*=\s*['"]?([a-zA-Z0-9_-]+)['"]?/g];

const allPatterns = [...apiKeyPatterns, ...envVarPatterns];

// Object keys whose string values are always secrets, e.g. `provider.api_key`
const secretKeyPattern = /^(?:api_?key|authorization|password|secret|token)$/i;

export function redactString(input: string): {
  redacted: string;
  redactionCount: number;
} {
  let redacted = input;
  let redactionCount = 0;

  for (const pattern of allPatterns) {
    const matches = redacted.match(pattern);
    if (matches) {
      redactionCount += matches.length;
      redacted = redacted.replace(pattern, REDACTION_PLACEHOLDER);
    }
  }

  return { redacted, redactionCount };
}

export function redactUnknown(input: unknown): {
  redacted: unknown;
  redactionCount: number;
} {
  if (typeof input === 'string') {
    return redactString(input);
  }

  if (Array.isArray(input)) {
    let totalRedactions = 0;
    const redactedArray = input.map((item: unknown) => {
      const { redacted, redactionCount } = redactUnknown(item);
      totalRedactions += redactionCount;
      return redacted;
    });
    return { redacted: redactedArray, redactionCount: totalRedactions };
  }

  if (typeof input === 'object' && input !== null) {
    let totalRedactions = 0;
    const redactedObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      if (typeof value === 'string' && value && secretKeyPattern.test(key)) {
        totalRedactions++;
        redactedObj[key] = REDACTION_PLACEHOLDER;
        continue;
      }
      const { redacted, redactionCount } = redactUnknown(value);
      totalRedactions += redactionCount;
      redactedObj[key] = redacted;
    }
    return { redacted: redactedObj, redactionCount: totalRedactions };
  }

  return { redacted: input, redactionCount: 0 };
}

/**
 * Redacts a structured value before it is persisted to a log file.
 */
export function redactForLogs(input: unknown): unknown {
  return redactUnknown(input).redacted;
}
