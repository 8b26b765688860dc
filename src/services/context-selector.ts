//token-budgeted few-shot context: multi-factor scoring, greedy selection, prompt rendering
import type { ContextCandidate, ContextSubscores, ExtractionPayload, ScoredContext } from '../models/index.js';
import { jaccard } from '../utils/math.js';

//each category is worth up to 0.2 of domain relevance
const KEYWORD_CATEGORIES: Record<string, string[]> = {
  medication: ['prescribe', 'medication', 'drug', 'dosage', 'frequency', 'duration'],
  followUp: ['schedule', 'follow-up', 'appointment', 'return', 'monitor'],
  tests: ['blood work', 'lab test', 'x-ray', 'mri', 'ct scan', 'ultrasound'],
  symptoms: ['pain', 'symptom', 'condition', 'diagnosis', 'treatment'],
  vitals: ['blood pressure', 'heart rate', 'temperature', 'weight', 'height'],
};

const CORE_TERMS = /\b(medication|prescribe|dosage|schedule|test|appointment|monitor|symptom|diagnosis)\b/g;
const COMPLETENESS_TERMS = /\b(medication|prescribe|dosage|schedule|test|appointment|monitor|symptom|diagnosis|treatment)\b/g;
const ITEM_ACTION_WORDS = ['schedule', 'order', 'prescribe', 'monitor', 'test'];
const TEXT_ACTION_WORDS = [...ITEM_ACTION_WORDS, 'refer'];
const STRUCTURE_MARKS = [':', '-', '•', '*'];

export const SCORE_WEIGHTS = { similarity: 0.4, domainRelevance: 0.3, payloadQuality: 0.2, completeness: 0.1 } as const;

export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

const matchedTerms = (text: string, pattern: RegExp) => [...text.matchAll(pattern)].map(m => m[1] ?? m[0]);

export function scoreDomainRelevance(queryText: string, contextText: string): number {
  const query = queryText.toLowerCase(), context = contextText.toLowerCase();
  let score = 0;
  for (const keywords of Object.values(KEYWORD_CATEGORIES)) {
    const shared = keywords.filter(k => query.includes(k) && context.includes(k)).length;
    score += (shared / keywords.length) * 0.2;
  }
  score += jaccard(new Set(matchedTerms(query, CORE_TERMS)), new Set(matchedTerms(context, CORE_TERMS))) * 0.3;
  return Math.min(score, 1);
}

interface QualityItem { description: string; priority?: string; dueDate?: string; }

function itemScore(item: QualityItem): number {
  let score = 0;
  const description = item.description.toLowerCase();
  if (description.length > 10 && ITEM_ACTION_WORDS.some(w => description.includes(w))) score += 1;
  if (item.priority) score += 0.5;
  if (item.dueDate) score += 0.5;
  return score;
}

export function scorePayloadQuality(payload: ExtractionPayload | undefined): number {
  if (!payload) return 0;
  const categories: QualityItem[][] = [
    payload.followUpTasks,
    //medications carry no description, priority or due date, so they always add 0
    payload.medicationInstructions.map(() => ({ description: '' })),
    payload.clientReminders,
    payload.clinicianTodos,
  ];
  let score = 0;
  for (const items of categories) {
    if (items.length === 0) continue;
    score += (items.reduce((sum, item) => sum + itemScore(item), 0) / items.length) * 0.25;
  }
  return Math.min(score, 1);
}

export function scoreCompleteness(text: string): number {
  if (!text) return 0;
  let score = 0;
  if (text.length >= 100 && text.length <= 2000) score += 0.3;
  else if (text.length > 2000) score += 0.2;
  const lower = text.toLowerCase();
  const terms = matchedTerms(lower, COMPLETENESS_TERMS).length;
  if (terms > 0) score += Math.min(terms * 0.1, 0.4);
  if (STRUCTURE_MARKS.some(mark => text.includes(mark))) score += 0.2;
  if (TEXT_ACTION_WORDS.some(w => lower.includes(w))) score += 0.1;
  return Math.min(score, 1);
}

export interface ContextSelectorOptions {
  tokenBudget: number;
  minRelevanceThreshold: number;
  maxContexts: number;
  softCap: number;
  softCapRelevance: number;
  previewChars: number;
  itemsPerCategory: number;
  referenceOwnerId: string;
}

export const DEFAULT_CONTEXT_OPTIONS: ContextSelectorOptions = {
  tokenBudget: 2000, minRelevanceThreshold: 0.6, maxContexts: 5, softCap: 3, softCapRelevance: 0.9,
  previewChars: 500, itemsPerCategory: 2, referenceOwnerId: 'reference-pool',
};

export interface IContextSelector {
  score(queryText: string, candidate: ContextCandidate): ScoredContext;
  select(queryText: string, candidates: ContextCandidate[]): ScoredContext[];
  buildContext(selected: ScoredContext[]): string;
}

export class ContextSelector implements IContextSelector {
  private options: ContextSelectorOptions;

  constructor(options: Partial<ContextSelectorOptions> = {}) {
    this.options = { ...DEFAULT_CONTEXT_OPTIONS, ...options };
  }

  score(queryText: string, candidate: ContextCandidate): ScoredContext {
    const subscores: ContextSubscores = {
      similarity: candidate.similarityScore,
      domainRelevance: scoreDomainRelevance(queryText, candidate.text),
      payloadQuality: scorePayloadQuality(candidate.extractionPayload),
      completeness: scoreCompleteness(candidate.text),
    };
    const relevanceScore = subscores.similarity * SCORE_WEIGHTS.similarity + subscores.domainRelevance * SCORE_WEIGHTS.domainRelevance
      + subscores.payloadQuality * SCORE_WEIGHTS.payloadQuality + subscores.completeness * SCORE_WEIGHTS.completeness;
    return {
      candidate, relevanceScore, subscores, estimatedTokens: estimateTokens(candidate.text),
      reasoning: `Similarity: ${subscores.similarity.toFixed(3)}, Domain: ${subscores.domainRelevance.toFixed(3)}, Quality: ${subscores.payloadQuality.toFixed(3)}, Completeness: ${subscores.completeness.toFixed(3)}`,
    };
  }

  //greedy in relevance order; the first candidate that fails a limit ends the selection
  select(queryText: string, candidates: ContextCandidate[]): ScoredContext[] {
    const { tokenBudget, minRelevanceThreshold, maxContexts, softCap, softCapRelevance } = this.options;
    const scored = candidates.map(c => this.score(queryText, c)).sort((a, b) => b.relevanceScore - a.relevanceScore);

    const selected: ScoredContext[] = [];
    let totalTokens = 0;
    for (const s of scored) {
      if (s.relevanceScore < minRelevanceThreshold) break;
      if (totalTokens + s.estimatedTokens > tokenBudget) break;
      if (selected.length >= softCap && s.relevanceScore < softCapRelevance) break;
      selected.push(s);
      totalTokens += s.estimatedTokens;
      if (selected.length >= maxContexts) break;
    }
    return selected;
  }

  buildContext(selected: ScoredContext[]): string {
    if (selected.length === 0) return '';
    const { referenceOwnerId } = this.options;
    const examples = selected.filter(s => s.candidate.ownerId === referenceOwnerId);
    const visits = selected.filter(s => s.candidate.ownerId !== referenceOwnerId);

    const lines: string[] = [];
    if (examples.length) {
      lines.push('RELEVANT EXAMPLE CASES:');
      examples.forEach((s, i) => lines.push(`Example Case ${i + 1}:`, ...this.renderCase(s.candidate)));
    }
    if (visits.length) {
      lines.push('PREVIOUS VISITS:');
      visits.forEach((s, i) => lines.push(`Previous Visit ${i + 1} (Transcript ID: ${s.candidate.recordId}):`, ...this.renderCase(s.candidate)));
    }
    return lines.join('\n');
  }

  private renderCase(c: ContextCandidate): string[] {
    const { previewChars } = this.options;
    const preview = c.text.length > previewChars ? c.text.slice(0, previewChars) + '...' : c.text;
    const lines = ['TRANSCRIPT:', preview];
    if (c.extractionPayload) lines.push('EXTRACTIONS:', ...this.renderPayload(c.extractionPayload));
    lines.push('');
    return lines;
  }

  private renderPayload(p: ExtractionPayload): string[] {
    const n = this.options.itemsPerCategory;
    const na = (v: string | undefined) => v || 'N/A';
    const lines: string[] = [];
    if (p.followUpTasks.length) {
      lines.push('Follow-up Tasks:', ...p.followUpTasks.slice(0, n).map(t => `  - ${na(t.description)} (Priority: ${na(t.priority)})`));
    }
    if (p.medicationInstructions.length) {
      lines.push('Medication Instructions:', ...p.medicationInstructions.slice(0, n).map(m => `  - ${na(m.medicationName)} ${na(m.dosage)} ${na(m.frequency)}`));
    }
    if (p.clientReminders.length) {
      lines.push('Client Reminders:', ...p.clientReminders.slice(0, n).map(r => `  - ${na(r.description)} (${na(r.reminderType)})`));
    }
    if (p.clinicianTodos.length) {
      lines.push('Clinician To-Dos:', ...p.clinicianTodos.slice(0, n).map(t => `  - ${na(t.description)} (${na(t.taskType)})`));
    }
    return lines;
  }
}
