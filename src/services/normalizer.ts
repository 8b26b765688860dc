//text canonicalization before embedding: formatting differences must not change the vector
import type { NormalizedText } from '../models/index.js';

const MEDICATION_PATTERNS = [
  /prescribing\s+(\w+)\s+(\d+mg?)/gi,
  /(\w+)\s+(\d+mg?)\s+(once|twice|daily)/gi,
  /(\w+)\s+(\d+mg?)\s+(every\s+\d+\s+hours?)/gi,
];

//\w runs cannot cross punctuation, so a capture ends at the first sentence mark
const CONDITION_PATTERNS = [
  /patient\s+(?:has|with)\s+(\w+(?:\s+\w+)*)/gi,
  /diagnosed\s+with\s+(\w+(?:\s+\w+)*)/gi,
  /symptoms\s+of\s+(\w+(?:\s+\w+)*)/gi,
];

const ACTION_PATTERNS = [
  /schedule\s+(\w+(?:\s+\w+)*)/gi,
  /refer\s+(?:to|for)\s+(\w+(?:\s+\w+)*)/gi,
  /order\s+(\w+(?:\s+\w+)*)/gi,
];

export const MEDICAL_CONTEXT_HEADER = '\n\nMedical Context:\n';

//trim, collapse whitespace, drop spaces before punctuation, straighten curly quotes
export function normalizeText(raw: string): string {
  if (!raw) return '';
  return raw
    .trim()
    .replace(/\s+/g, ' ')
    .replace(/\s+([.,;:!?])/g, '$1')
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(/\s+/g, ' ')
    .trim();
}

function collectHints(text: string, patterns: RegExp[], label: string): string[] {
  const hints: string[] = [];
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      hints.push(`${label}: ${match.slice(1).filter(g => g !== undefined).join(' ')}`);
    }
  }
  return hints;
}

//medication, condition and action hints found in already-normalized text
export function extractMedicalHints(normalized: string): string[] {
  return [
    ...collectHints(normalized, MEDICATION_PATTERNS, 'medication'),
    ...collectHints(normalized, CONDITION_PATTERNS, 'condition'),
    ...collectHints(normalized, ACTION_PATTERNS, 'action'),
  ];
}

export function prepareText(raw: string): NormalizedText {
  const normalized = normalizeText(raw);
  const hints = extractMedicalHints(normalized);
  return { normalized, enriched: hints.length ? normalized + MEDICAL_CONTEXT_HEADER + hints.join('\n') : normalized };
}

//normalized text plus a "Medical Context" block when any hint matched
export function enrichText(raw: string): string {
  return prepareText(raw).enriched;
}
