/**
 * Reads a batch of search results from a JSON file.
 *
 * Accepted shapes:
 *   [ { "url": "...", "title": "...", ... }, ... ]
 *   { "sessionId": "...", "results": [ ... ] }
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ValidationError, describeError } from '../shared/errors.js';
import type { SearchResult } from './types.js';

const optionalText = z.string().nullish();

const searchResultSchema = z.object({
  url: z.string(),
  title: optionalText,
  snippet: optionalText,
  engine: optionalText,
  query: optionalText,
});

const batchSchema = z.union([
  z.array(searchResultSchema),
  z.object({
    sessionId: z.string().min(1).optional(),
    results: z.array(searchResultSchema),
  }),
]);

export interface SearchResultBatch {
  sessionId?: string;
  results: SearchResult[];
}

export function parseSearchResults(data: unknown): SearchResultBatch {
  const parsed = batchSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `Invalid search result file: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape'}`,
      issue ? issue.path.join('.') : 'results',
    );
  }

  if (Array.isArray(parsed.data)) {
    return { results: parsed.data };
  }
  return parsed.data.sessionId === undefined
    ? { results: parsed.data.results }
    : { sessionId: parsed.data.sessionId, results: parsed.data.results };
}

export async function readSearchResultsFile(path: string): Promise<SearchResultBatch> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ValidationError(`Cannot read ${path}: ${describeError(error)}`, 'file', path);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`${path} is not valid JSON: ${describeError(error)}`, 'file', path);
  }
  return parseSearchResults(data);
}
