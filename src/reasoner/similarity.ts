import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const stopwordsPath = path.resolve(__dirname, '../../knowledge/stopwords.json');

function loadStopwords(): Set<string> {
  const parsed: unknown = JSON.parse(fs.readFileSync(stopwordsPath, 'utf8'));
  if (!Array.isArray(parsed)) throw new Error(`Stop-word list at ${stopwordsPath} is not an array`);
  return new Set(parsed.filter((w): w is string => typeof w === 'string'));
}

const STOPWORDS = loadStopwords();

export const DEFAULT_DUPLICATE_THRESHOLD = 0.8;

function tokens(text: string): string[] {
  const words = text.toLowerCase().replace(/[^\p{L}\p{M}\p{N}\s]/gu, ' ').split(/\s+/).filter(Boolean);
  const content = words.filter(w => !STOPWORDS.has(w));
  return content.length ? content : words;
}

export function normalizeQuestion(text: string): string {
  return tokens(text).join(' ');
}

function lcsLength(a: readonly string[], b: readonly string[]): number {
  let prev = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    const cur = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j++) {
      cur[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], cur[j - 1]);
    }
    prev = cur;
  }
  return prev[b.length];
}

/**
 * 2·LCS / (|a|+|b|) over the normalized word sequences, in [0, 1]. Texts with
 * no letters or digits at all only match when they are the same text.
 */
export function similarityRatio(a: string, b: string): number {
  const x = tokens(a);
  const y = tokens(b);
  if (!x.length && !y.length) return a.trim() === b.trim() ? 1 : 0;
  return (2 * lcsLength(x, y)) / (x.length + y.length);
}

export function isDuplicate(candidate: string, history: readonly string[], threshold = DEFAULT_DUPLICATE_THRESHOLD): boolean {
  return history.some(prior => similarityRatio(candidate, prior) > threshold);
}

/** The first prior question the candidate collides with, if any. */
export function findDuplicate(candidate: string, history: readonly string[], threshold = DEFAULT_DUPLICATE_THRESHOLD): string | null {
  return history.find(prior => similarityRatio(candidate, prior) > threshold) ?? null;
}
