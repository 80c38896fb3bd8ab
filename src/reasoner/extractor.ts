import type { ZodType, ZodTypeDef } from 'zod';
import { ExtractionError } from '../errors.js';
import type { JsonObject, JsonValue } from '../types.js';

export interface ExtractOptions {
  /**
   * Keys a truncated reply may carry. Setting this turns on best-effort repair
   * of replies cut off mid-object; without it a truncated reply fails.
   */
  repairKeys?: readonly string[];
  /**
   * Last resort for call sites that expect a question: synthesize `{ question }`
   * from the first interrogative sentence. Never enable this where another
   * shape is expected.
   */
  allowQuestionSentence?: boolean;
}

const SNIPPET_LENGTH = 200;
const FENCE = /```[a-zA-Z0-9_-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?[ \t]*```/;

export function snippet(raw: string): string {
  const flat = raw.replace(/\s+/g, ' ').trim();
  return flat.length > SNIPPET_LENGTH ? `${flat.slice(0, SNIPPET_LENGTH - 3)}...` : flat;
}

function isJsonObject(v: JsonValue | undefined): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function tryParseObject(text: string): JsonObject | null {
  try {
    const v: JsonValue = JSON.parse(text);
    return isJsonObject(v) ? v : null;
  } catch {
    return null;
  }
}

/** Index just past the brace closing the object opened at `start`, or -1. */
function matchBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escape = false;
  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (inString) {
      if (escape) escape = false;
      else if (c === '\\') escape = true;
      else if (c === '"') inString = false;
      continue;
    }
    if (c === '"') inString = true;
    else if (c === '{') depth++;
    else if (c === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

function balancedObject(text: string): JsonObject | null {
  // an earlier '{' may belong to prose; try each candidate in turn
  for (let start = text.indexOf('{'); start !== -1; start = text.indexOf('{', start + 1)) {
    const end = matchBrace(text, start);
    if (end === -1) continue;
    const parsed = tryParseObject(text.slice(start, end));
    if (parsed) return parsed;
  }
  return null;
}

/**
 * Rebuild an object cut off before its closing brace. Only whole top-level
 * members survive: the trailing member is kept when it ends in a finished
 * string, object or array value, otherwise the text is cut back to the last
 * top-level comma rather than closed mid-value.
 */
export function repairTruncated(text: string, allowedKeys: readonly string[]): JsonObject | null {
  const start = text.indexOf('{');
  if (start === -1) return null;
  const body = text.slice(start).trimEnd();

  let depth = 0;
  let inString = false;
  let escape = false;
  let stringStart = -1;
  let lastMemberComma = -1;
  for (let i = 0; i < body.length; i++) {
    const c = body[i];
    if (inString) {
      if (escape) escape = false;
      else if (c === '\\') escape = true;
      else if (c === '"') inString = false;
      continue;
    }
    if (c === '"') {
      inString = true;
      stringStart = i;
    } else if (c === '{' || c === '[') {
      depth++;
    } else if (c === '}' || c === ']') {
      depth--;
      if (depth === 0) return null; // closed, so not truncated
    } else if (c === ',' && depth === 1) {
      lastMemberComma = i;
    }
  }

  const last = body[body.length - 1];
  let candidate: string | null = null;
  if (!inString && depth === 1) {
    if (last === '}' || last === ']') {
      candidate = `${body}}`;
    } else if (last === '"') {
      // after ':' the string is a value; after '{' or ',' it is a dangling key
      const before = body.slice(0, stringStart).trimEnd();
      if (before.endsWith(':')) candidate = `${body}}`;
    }
  }
  if (candidate === null && lastMemberComma !== -1) {
    candidate = `${body.slice(0, lastMemberComma)}}`;
  }
  if (candidate === null) return null;

  const repaired = tryParseObject(candidate);
  if (!repaired) return null;
  const keys = Object.keys(repaired);
  if (keys.length === 0 || keys.some(k => !allowedKeys.includes(k))) return null;
  return repaired;
}

function questionSentence(text: string): string | null {
  for (const line of text.split(/\r?\n/)) {
    const q = line.indexOf('?');
    if (q === -1) continue;
    const head = line.slice(0, q + 1);
    const boundary = Math.max(head.lastIndexOf('. '), head.lastIndexOf('! '), head.lastIndexOf(': '));
    const sentence = head
      .slice(boundary === -1 ? 0 : boundary + 2)
      .replace(/^[\s>*#\-\d.)"]+/, '')
      .trim();
    if (sentence.length > 1) return sentence;
  }
  return null;
}

/**
 * Pull one JSON object out of free reasoner text. Strategies run in order:
 * the text as-is, the body of a fenced block, the first balanced `{...}` in
 * surrounding prose, then the opt-in repair and question-sentence fallbacks.
 */
export function extractObject(raw: string, options: ExtractOptions = {}): JsonObject {
  const text = raw.trim();
  if (!text) throw new ExtractionError('empty', '', 'reply was empty');

  const direct = tryParseObject(text);
  if (direct) return direct;

  const fenced = FENCE.exec(text);
  if (fenced) {
    const inner = fenced[1].trim();
    const parsed = tryParseObject(inner) ?? balancedObject(inner);
    if (parsed) return parsed;
  }

  const balanced = balancedObject(text);
  if (balanced) return balanced;

  if (options.repairKeys) {
    const repaired = repairTruncated(fenced ? fenced[1] : text, options.repairKeys);
    if (repaired) return repaired;
  }

  if (options.allowQuestionSentence) {
    const question = questionSentence(text);
    if (question) return { question };
  }

  throw new ExtractionError(options.repairKeys ? 'repair' : 'parse', snippet(raw), 'no JSON object found');
}

/** `extractObject` plus a schema check; a mismatch is an extraction failure too. */
export function extractWith<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>, options: ExtractOptions = {}): T {
  const obj = extractObject(raw, options);
  const result = schema.safeParse(obj);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ExtractionError('shape', snippet(raw), issues);
  }
  return result.data;
}
