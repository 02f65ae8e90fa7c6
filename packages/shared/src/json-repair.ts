import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { OracleParseError, errorMessage } from './errors.js';

/**
 * JSON handling for free-text oracle responses: fence stripping, a best-effort
 * repair pass, and a single typed error when the text still cannot be used.
 */

const FENCED_JSON = /```json\s*([\s\S]*?)```/i;
const FENCED_ANY = /```[a-z]*\s*([\s\S]*?)```/i;

export function extractJsonText(raw: string): string {
  let text = raw.trim();

  const fenced = text.match(FENCED_JSON) ?? text.match(FENCED_ANY);
  if (fenced) text = fenced[1].trim();

  if (!text.startsWith('{')) {
    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start !== -1 && end > start) text = text.slice(start, end + 1);
  }

  return text;
}

/** Characters that can end a JSON value; a new value right after one means a comma is missing. */
function endsValue(ch: string): boolean {
  return ch === '"' || ch === '}' || ch === ']' || /[0-9el]/.test(ch);
}

function startsValue(ch: string): boolean {
  return ch === '"' || ch === '{' || ch === '[';
}

/** Index of the next character that is neither whitespace nor part of a comment. */
function nextSignificant(text: string, from: number): number {
  let i = from;
  while (i < text.length) {
    const ch = text[i];
    if (/\s/.test(ch)) {
      i++;
    } else if (ch === '/' && text[i + 1] === '/') {
      while (i < text.length && text[i] !== '\n') i++;
    } else if (ch === '/' && text[i + 1] === '*') {
      const close = text.indexOf('*/', i + 2);
      i = close === -1 ? text.length : close + 2;
    } else {
      return i;
    }
  }
  return -1;
}

/**
 * String-aware repair of the usual LLM mistakes: comments, trailing commas,
 * missing commas between adjacent values, and raw control characters inside
 * string literals. Text inside strings (URLs included) is left alone.
 */
export function repairJson(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;
  let lastSignificant = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
        out += ch;
      } else if (ch === '\\') {
        escaped = true;
        out += ch;
      } else if (ch === '"') {
        inString = false;
        lastSignificant = '"';
        out += ch;
      } else if (ch === '\n') {
        out += '\\n';
      } else if (ch === '\r') {
        out += '\\r';
      } else if (ch === '\t') {
        out += '\\t';
      } else {
        out += ch;
      }
      i++;
      continue;
    }

    if (ch === '/' && (text[i + 1] === '/' || text[i + 1] === '*')) {
      const next = nextSignificant(text, i);
      i = next === -1 ? text.length : next;
      continue;
    }

    if (ch === ',') {
      const next = nextSignificant(text, i + 1);
      if (next === -1 || text[next] === '}' || text[next] === ']') {
        i++;
        continue;
      }
    }

    if (startsValue(ch) && endsValue(lastSignificant)) {
      out += ',';
    }

    if (ch === '"') inString = true;
    if (!/\s/.test(ch)) lastSignificant = ch;
    out += ch;
    i++;
  }

  return out;
}

/** First few issues as `path: message`, joined for a one-line error. */
export function formatZodIssues(error: ZodError, limit = 5): string {
  return error.issues
    .slice(0, limit)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export interface ParseOracleJsonOptions {
  label: string;
}

/**
 * Extract, parse (strictly, then after repair) and validate an oracle response.
 * Every failure surfaces as one `OracleParseError`.
 */
export function parseOracleJson<T>(
  raw: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  options: ParseOracleJsonOptions,
): T {
  const extracted = extractJsonText(raw);

  let value: unknown;
  try {
    value = JSON.parse(extracted);
  } catch {
    try {
      value = JSON.parse(repairJson(extracted));
    } catch (err) {
      throw new OracleParseError(options.label, 'syntax', raw, extracted, errorMessage(err), err);
    }
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    throw new OracleParseError(
      options.label,
      'schema',
      raw,
      extracted,
      formatZodIssues(result.error),
      result.error,
    );
  }

  return result.data;
}
