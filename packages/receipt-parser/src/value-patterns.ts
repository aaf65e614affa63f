import { normalizeValue } from '@fiscal-intake/types';

export type ValuePatternName = 'labelled-total' | 'reais' | 'currency-code' | 'bare-brazilian' | 'bare-us';

export interface ValuePattern {
  name: ValuePatternName;
  pattern: RegExp;
}

const BRAZILIAN = String.raw`\d{1,3}(?:\.\d{3})+,\d{2}|\d+,\d{2}`;
const US = String.raw`\d{1,3}(?:,\d{3})+\.\d{2}|\d+\.\d{2}`;
// An amount neither starts nor ends inside a longer number or date.
const START = String.raw`(?<![\d.,])`;
const END = String.raw`(?!\d|[.,]\d)`;

/** Every pattern contributes its matches; the order only affects logging. */
export const VALUE_PATTERNS: readonly ValuePattern[] = [
  {
    name: 'labelled-total',
    pattern: new RegExp(String.raw`(?:TOTAL|VALUE|VALOR|BRL)[:\s]+(?:BRL\s+)?(${BRAZILIAN}|${US})${END}`, 'gi'),
  },
  { name: 'reais', pattern: new RegExp(String.raw`R\$\s*(${BRAZILIAN})${END}`, 'gi') },
  { name: 'currency-code', pattern: new RegExp(String.raw`(?:BRL|USD)\s+(${BRAZILIAN}|${US})${END}`, 'gi') },
  { name: 'bare-brazilian', pattern: new RegExp(`${START}(${BRAZILIAN})${END}`, 'g') },
  { name: 'bare-us', pattern: new RegExp(`${START}(${US})${END}`, 'g') },
];

/** Raw amount strings matched by one named pattern. */
export function matchValuePattern(name: ValuePatternName, text: string): string[] {
  const entry = VALUE_PATTERNS.find((candidate) => candidate.name === name);
  if (entry === undefined) return [];
  return Array.from(text.matchAll(entry.pattern), (match) => match[1] ?? '').filter((raw) => raw !== '');
}

/**
 * Union of all pattern matches, normalized, with non-positive values and
 * duplicates dropped, largest first.
 */
export function extractValueCandidates(text: string): number[] {
  const values = new Set<number>();
  for (const { name } of VALUE_PATTERNS) {
    for (const raw of matchValuePattern(name, text)) {
      const { value, fallback } = normalizeValue(raw);
      if (!fallback && value > 0) values.add(value);
    }
  }
  return [...values].sort((a, b) => b - a);
}
