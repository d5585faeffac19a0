/**
 * Loads the suffix-credibility table, keyword sets and content-spam lexicon
 * from `config/`. Every file is validated; a malformed file is a ConfigurationError.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../shared/errors.js';
import type { ContentSpamLexicon, CredibilityTable, KeywordSets } from './types.js';

const score = z.number().min(-1).max(1);
const suffix = z
  .string()
  .min(1)
  .transform((value) => value.toLowerCase().replace(/^\./, ''));

const credibilityTableSchema = z.object({
  secondLevel: z.record(score),
  tiers: z
    .array(
      z.object({
        name: z.string().min(1),
        score,
        suffixes: z.array(suffix),
      }),
    )
    .min(1),
  lowTrust: z.record(score.max(0, 'low-trust suffixes must not add credibility')),
  validatedNonprofit: z.array(suffix),
  targetRegion: z.array(suffix),
});

const keywordList = z
  .array(z.string().trim().min(1).transform((value) => value.toLowerCase()))
  .min(1);

const keywordSetsSchema = z.object({
  funding: keywordList,
  geography: keywordList,
  organization: keywordList,
});

const contentSpamLexiconSchema = z.object({
  gambling: keywordList,
  essayMill: keywordList,
  education: keywordList,
  commonWords: keywordList,
  ignoredDomainSuffixes: z.array(suffix),
});

export const DEFAULT_CREDIBILITY_PATH = new URL('../../config/tld-credibility.json', import.meta.url);
export const DEFAULT_KEYWORDS_PATH = new URL('../../config/scoring-keywords.json', import.meta.url);
export const DEFAULT_CONTENT_SPAM_PATH = new URL('../../config/content-spam.json', import.meta.url);

function readJson(path: URL | string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read scoring data file ${String(path)}`, [
      describeError(error),
    ]);
  }
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, label: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid ${label}`,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}

export function parseCredibilityTable(data: unknown): CredibilityTable {
  return parseWith(credibilityTableSchema, data, 'suffix credibility table');
}

export function parseKeywordSets(data: unknown): KeywordSets {
  return parseWith(keywordSetsSchema, data, 'keyword sets');
}

export function parseContentSpamLexicon(data: unknown): ContentSpamLexicon {
  return parseWith(contentSpamLexiconSchema, data, 'content spam lexicon');
}

export function loadCredibilityTable(path: URL | string = DEFAULT_CREDIBILITY_PATH): CredibilityTable {
  return parseCredibilityTable(readJson(path));
}

export function loadKeywordSets(path: URL | string = DEFAULT_KEYWORDS_PATH): KeywordSets {
  return parseKeywordSets(readJson(path));
}

export function loadContentSpamLexicon(
  path: URL | string = DEFAULT_CONTENT_SPAM_PATH,
): ContentSpamLexicon {
  return parseContentSpamLexicon(readJson(path));
}

let defaultTable: CredibilityTable | undefined;
let defaultKeywords: KeywordSets | undefined;
let defaultLexicon: ContentSpamLexicon | undefined;

/** The bundled credibility table, read once per process. */
export function defaultCredibilityTable(): CredibilityTable {
  defaultTable ??= loadCredibilityTable();
  return defaultTable;
}

/** The bundled keyword sets, read once per process. */
export function defaultKeywordSets(): KeywordSets {
  defaultKeywords ??= loadKeywordSets();
  return defaultKeywords;
}

export function defaultContentSpamLexicon(): ContentSpamLexicon {
  defaultLexicon ??= loadContentSpamLexicon();
  return defaultLexicon;
}
