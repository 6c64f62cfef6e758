/**
 * JSON parser that recovers from the usual damage in model replies and
 * half-written files: a BOM, a markdown code fence, or trailing text
 * after the first complete object or array.
 */
export function safeJsonParse(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    // Fall through to recovery
  }

  const trimmed = content
    .replace(/^\uFEFF/, '')
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();
  if (!trimmed) throw new SyntaxError('Empty JSON content');

  try {
    return JSON.parse(trimmed);
  } catch {
    // Fall through to brace-matching recovery
  }

  const startChar = trimmed[0];
  if (startChar !== '{' && startChar !== '[') {
    throw new SyntaxError(`Unexpected token ${startChar} at start of JSON`);
  }

  const endChar = startChar === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = 0; i < trimmed.length; i++) {
    const ch = trimmed[i];
    if (escape) {
      escape = false;
      continue;
    }
    if (ch === '\\' && inString) {
      escape = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;
    if (ch === startChar) depth++;
    if (ch === endChar) {
      depth--;
      if (depth === 0) {
        return JSON.parse(trimmed.substring(0, i + 1));
      }
    }
  }

  throw new SyntaxError('Could not recover valid JSON from corrupted content');
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return null;
}

export function readString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}
