export class JsonRepairError extends Error {
  public readonly text: string;

  constructor(message: string, text: string) {
    super(message);
    this.name = 'JsonRepairError';
    this.text = text;
  }
}

export interface ParsedJson {
  value: unknown;
  repaired: boolean;
}

export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)(?:```\s*)?$/i);
  return fenced ? fenced[1].trim() : trimmed;
}

interface CutPoint {
  index: number;
  open: string[];
}

/**
 * Cuts a truncated JSON document back to the last value that closed and
 * re-closes every container still open at that point. Returns null when no
 * container ever closed.
 */
export function closeTruncatedJson(text: string): string | null {
  const open: string[] = [];
  let inString = false;
  let escaped = false;
  let lastCut: CutPoint | null = null;

  for (let index = 0; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{' || char === '[') {
      open.push(char);
    } else if (char === '}' || char === ']') {
      const expected = char === '}' ? '{' : '[';
      if (open[open.length - 1] !== expected) {
        break;
      }
      open.pop();
      lastCut = { index: index + 1, open: [...open] };
      if (open.length === 0) {
        break;
      }
    }
  }

  if (!lastCut) {
    return null;
  }

  const closers = lastCut.open
    .reverse()
    .map((bracket) => (bracket === '{' ? '}' : ']'))
    .join('');
  return text.slice(0, lastCut.index) + closers;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    if (error instanceof SyntaxError) {
      return { ok: false };
    }
    throw error;
  }
}

/**
 * Parses model output as JSON. On failure, makes a single structural repair
 * attempt for truncated output before giving up.
 */
export function parseJsonWithRepair(raw: string): ParsedJson {
  const text = stripCodeFences(raw);
  const direct = tryParse(text);
  if (direct.ok) {
    return { value: direct.value, repaired: false };
  }

  const closed = closeTruncatedJson(text);
  if (closed === null) {
    throw new JsonRepairError('Response contains no complete JSON value', text);
  }
  try {
    return { value: JSON.parse(closed), repaired: true };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new JsonRepairError(`Response JSON could not be repaired: ${reason}`, text);
  }
}
