/**
 * ResponseParser
 *
 * Turns raw model output into a FinancialRecord. Tried in order:
 *   1. the whole response as JSON
 *   2. the first balanced {...} substring (doubled braces collapsed)
 *   3. "field: value" pairs for every known field spelling
 *
 * Keys go through the synonym table and numeric strings through the money
 * parser before the payload is checked against the record schema.
 */

import {
  FINANCIAL_FIELDS,
  emptyRecord,
  isFinancialField,
  resolveFieldKey,
  type FinancialField,
  type FinancialRecord,
} from '../fields';
import { parseMoney } from '../money';
import { validateRecordPayload } from '../schemas';

export type ParseMethod = 'json' | 'embedded_json' | 'key_value';

export type ParseOutcome =
  | { ok: true; record: FinancialRecord; method: ParseMethod; unknownKeys: string[] }
  | { ok: false; reason: 'unparseable' | 'schema_mismatch'; errors: string[]; method?: ParseMethod };

const NULL_WORDS: ReadonlySet<string> = new Set(['', 'null', 'none', 'n/a', 'na', '-', '--']);

type JsonObject = { [key: string]: unknown };

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function stripCodeFence(text: string): string {
  const fenced = /^```[a-z]*\s*\n?([\s\S]*?)\n?```$/i.exec(text.trim());
  return fenced ? fenced[1] : text.trim();
}

/**
 * First balanced {...} substring, skipping braces inside JSON strings.
 */
export function findBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function collapseDoubledBraces(text: string): string {
  return text.replace(/\{\{/g, '{').replace(/\}\}/g, '}');
}

function parseEmbeddedObject(text: string): unknown {
  for (const candidate of [text, collapseDoubledBraces(text)]) {
    const objectText = findBalancedObject(candidate);
    if (!objectText) continue;
    const parsed = tryParseJson(objectText);
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}

/**
 * Descend through wrappers such as {"financial_data": {...}} or a one-element
 * array until an object with recognizable field keys is reached.
 */
function unwrapPayload(value: unknown): JsonObject | null {
  let current = value;
  for (let depth = 0; depth < 3; depth++) {
    if (Array.isArray(current) && current.length === 1) {
      current = current[0];
      continue;
    }
    if (!isJsonObject(current)) return null;
    const keys = Object.keys(current);
    if (keys.some((key) => resolveFieldKey(key) !== null)) return current;
    const nested = Object.values(current).filter(isJsonObject);
    if (nested.length !== 1) return current;
    current = nested[0];
  }
  return isJsonObject(current) ? current : null;
}

function coerceValue(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  if (NULL_WORDS.has(value.trim().toLowerCase())) return null;
  const amount = parseMoney(value);
  // Unparseable strings stay as they are so schema validation reports them
  return amount ?? value;
}

/**
 * Map an object's keys onto canonical fields. Canonical keys take precedence
 * over synonyms when both are present.
 */
function normalizePayload(payload: JsonObject): { values: Map<FinancialField, unknown>; unknownKeys: string[] } {
  const values = new Map<FinancialField, unknown>();
  const unknownKeys: string[] = [];
  const keys = Object.keys(payload).sort(
    (a, b) => Number(isFinancialField(b)) - Number(isFinancialField(a))
  );

  for (const key of keys) {
    const field = resolveFieldKey(key);
    if (!field) {
      unknownKeys.push(key);
      continue;
    }
    if (!values.has(field)) {
      values.set(field, coerceValue(payload[key]));
    }
  }
  return { values, unknownKeys };
}

const KEY_VALUE_PATTERN =
  /["']?([A-Za-z][A-Za-z0-9 _&/-]*?)["']?[ \t]*[:=][ \t]*(null|"[^"\n]*"|'[^'\n]*'|\(?[-−]?[$€£¥]?\s?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?\)?-?|[^,\n}]+)/g;

function parseKeyValuePairs(text: string): Map<FinancialField, unknown> {
  const values = new Map<FinancialField, unknown>();
  for (const match of text.matchAll(KEY_VALUE_PATTERN)) {
    const field = resolveFieldKey(match[1].trim());
    if (!field || values.has(field)) continue;
    const rawValue = match[2].trim().replace(/^["']|["']$/g, '');
    if (NULL_WORDS.has(rawValue.toLowerCase())) {
      values.set(field, null);
      continue;
    }
    const amount = parseMoney(rawValue);
    if (amount !== null) values.set(field, amount);
  }
  return values;
}

function toRecordOutcome(
  values: Map<FinancialField, unknown>,
  method: ParseMethod,
  unknownKeys: string[]
): ParseOutcome {
  if (values.size === 0) {
    return { ok: false, reason: 'unparseable', errors: ['No recognized financial fields in response'], method };
  }

  const payload = Object.fromEntries(FINANCIAL_FIELDS.map((field) => [field, values.get(field) ?? null]));
  const validation = validateRecordPayload(payload);
  if (!validation.valid) {
    return { ok: false, reason: 'schema_mismatch', errors: validation.errors ?? [], method };
  }

  const record = emptyRecord();
  for (const [field, value] of values) {
    if (typeof value === 'number') record[field] = value;
  }
  return { ok: true, record, method, unknownKeys };
}

export function parseModelResponse(raw: string): ParseOutcome {
  const text = stripCodeFence(raw);
  if (!text) {
    return { ok: false, reason: 'unparseable', errors: ['Empty response'] };
  }

  const attempts: Array<[ParseMethod, () => unknown]> = [
    ['json', () => tryParseJson(text)],
    ['embedded_json', () => parseEmbeddedObject(text)],
  ];
  for (const [method, parse] of attempts) {
    const payload = unwrapPayload(parse());
    if (!payload) continue;
    const { values, unknownKeys } = normalizePayload(payload);
    if (values.size > 0) return toRecordOutcome(values, method, unknownKeys);
  }

  return toRecordOutcome(parseKeyValuePairs(text), 'key_value', []);
}
