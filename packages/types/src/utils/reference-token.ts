export interface ReferencePattern {
  label: string;
  pattern: RegExp;
}

/** Matched against upper-cased text, first match wins. */
export const REFERENCE_PATTERNS: readonly ReferencePattern[] = [
  { label: 'PI', pattern: /\bPI[:\s]+([A-Z0-9]+)/ },
  { label: 'PROCESSO', pattern: /\bPROCESSO[:\s]+([A-Z0-9]+)/ },
  { label: 'BARE', pattern: /\b([A-Z]{4}\d{7})\b/ },
];

/**
 * Finds a reference token (`PI: X`, `PROCESSO: X` or a bare `ABCD1234567`)
 * in free text. Returns null when none is present.
 */
export function extractReferenceToken(text: string | null | undefined): string | null {
  const upper = (text ?? '').toUpperCase();
  for (const { pattern } of REFERENCE_PATTERNS) {
    const token = pattern.exec(upper)?.[1];
    if (token !== undefined) return token;
  }
  return null;
}
