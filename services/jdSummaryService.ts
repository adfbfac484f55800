import type { FallbackJdSummary, JdSummary, StructuredJdSummary } from '../types';

export const FALLBACK_REQUIREMENT_LIMIT = 10;

const LEADING_BULLET_REGEX = /^[-•·‧▪●]\s*/;
const KEY_LABEL_REGEX = /^"?(company_name|role_title|requirements)"?\s*:\s*/i;
const STRUCTURAL_ONLY_REGEX = /^[[\]{}]+$/;

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asNullableString = (value: unknown): string | null => {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

const trimChar = (value: string, char: string): string => {
  let start = 0;
  let end = value.length;
  while (start < end && value[start] === char) start += 1;
  while (end > start && value[end - 1] === char) end -= 1;
  return value.slice(start, end);
};

const tryParseObject = (text: string): Record<string, unknown> | null => {
  try {
    const parsed: unknown = JSON.parse(text);
    return isObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
};

/**
 * Parses the model's JD summary reply. Code fences are stripped first; if the
 * reply still isn't a JSON object, the outermost `{...}` span is tried.
 * Returns null when neither attempt yields an object.
 */
export const parseJdSummary = (text: string): Record<string, unknown> | null => {
  if (!text) return null;

  const cleaned = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');

  const direct = tryParseObject(cleaned);
  if (direct) return direct;

  const first = cleaned.indexOf('{');
  const last = cleaned.lastIndexOf('}');
  if (first === -1 || last <= first) return null;
  return tryParseObject(cleaned.slice(first, last + 1));
};

export const fallbackRequirements = (text: string, limit = FALLBACK_REQUIREMENT_LIMIT): string[] => {
  if (!text) return [];

  const lines: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    let line = trimChar(trimChar(rawLine.trim(), ','), '"');
    line = line.replace(KEY_LABEL_REGEX, '');
    line = trimChar(trimChar(line.trim(), ','), '"').trim();
    if (!line || STRUCTURAL_ONLY_REGEX.test(line)) continue;
    lines.push(line);
  }
  return lines.slice(0, limit);
};

/** Accepts a list or a newline-separated string; anything else yields []. */
export const normalizeRequirements = (requirements: unknown): string[] => {
  let items: unknown[];
  if (Array.isArray(requirements)) {
    items = requirements;
  } else if (typeof requirements === 'string') {
    items = requirements.split(/\r?\n/);
  } else {
    items = [];
  }

  const cleaned: string[] = [];
  for (const item of items) {
    if (typeof item !== 'string') continue;
    const text = item.trim();
    if (!text) continue;
    cleaned.push(text.replace(LEADING_BULLET_REGEX, ''));
  }
  return cleaned;
};

export const toStructuredSummary = (record: Record<string, unknown>): StructuredJdSummary => ({
  kind: 'structured',
  companyName: asNullableString(record.company_name),
  roleTitle: asNullableString(record.role_title),
  requirements: normalizeRequirements(record.requirements),
});

export const toFallbackSummary = (rawReply: string): FallbackJdSummary => ({
  kind: 'fallback',
  requirements: fallbackRequirements(rawReply),
});

export const summarizeJdReply = (rawReply: string): JdSummary => {
  const parsed = parseJdSummary(rawReply);
  return parsed ? toStructuredSummary(parsed) : toFallbackSummary(rawReply);
};
