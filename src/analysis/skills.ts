import { z } from 'zod';
import lexiconSource from './skill-lexicon.json';
import { SkillFrequencyMap } from '../types/listing';

export interface SkillPattern {
  label: string;
  pattern: RegExp;
}

export type SkillLexicon = readonly SkillPattern[];

const lexiconSchema = z.record(z.string().min(1));

// `\b` only treats ASCII letters as word characters; accented letters and
// other scripts count here too, so "awsé" is not a hit for `\baws\b`
const WORD_CHAR = '[\\p{L}\\p{N}_]';
const UNICODE_BOUNDARY = `(?:(?<!${WORD_CHAR})(?=${WORD_CHAR})|(?<=${WORD_CHAR})(?!${WORD_CHAR}))`;

export function toUnicodePattern(source: string): RegExp {
  return new RegExp(source.split('\\b').join(UNICODE_BOUNDARY), 'iu');
}

/**
 * Compiles label -> pattern source into a frozen, ordered lexicon.
 * Patterns are case-insensitive and non-global, so `test()` keeps no state.
 */
export function compileLexicon(source: unknown): SkillLexicon {
  const parsed = lexiconSchema.parse(source);
  return Object.freeze(
    Object.entries(parsed).map(([label, pattern]) => Object.freeze({ label, pattern: toUnicodePattern(pattern) }))
  );
}

export const DEFAULT_LEXICON: SkillLexicon = compileLexicon(lexiconSource);

/**
 * Lower-cases and collapses every whitespace run (newlines included) to one space
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
}

export function extractSkills(text: string, lexicon: SkillLexicon = DEFAULT_LEXICON): Set<string> {
  const normalized = normalizeText(text);
  const hits = new Set<string>();
  for (const { label, pattern } of lexicon) {
    if (pattern.test(normalized)) {
      hits.add(label);
    }
  }
  return hits;
}

/**
 * Descending count, ties broken by ascending label
 */
export function sortFrequencies(counts: Map<string, number> | SkillFrequencyMap): SkillFrequencyMap {
  const entries = counts instanceof Map ? Array.from(counts.entries()) : Object.entries(counts);
  entries.sort(([labelA, countA], [labelB, countB]) => {
    if (countA !== countB) return countB - countA;
    if (labelA === labelB) return 0;
    return labelA < labelB ? -1 : 1;
  });
  return Object.fromEntries(entries);
}

/**
 * Number of documents mentioning each skill at least once.
 * Missing or blank documents are ignored.
 */
export function countSkillFrequencies(
  documents: Iterable<string | undefined>,
  lexicon: SkillLexicon = DEFAULT_LEXICON
): SkillFrequencyMap {
  const counts = new Map<string, number>();
  for (const document of documents) {
    if (!document || !document.trim()) continue;
    for (const skill of extractSkills(document, lexicon)) {
      counts.set(skill, (counts.get(skill) ?? 0) + 1);
    }
  }
  return sortFrequencies(counts);
}
