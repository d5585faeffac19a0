import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ValidationError } from '../shared/errors.js';
import { parseSearchResults, readSearchResultsFile } from './search-results-file.js';

describe('parseSearchResults', () => {
  it('accepts a bare array', () => {
    expect(parseSearchResults([{ url: 'https://example.org', title: null }])).toEqual({
      results: [{ url: 'https://example.org', title: null }],
    });
  });

  it('accepts a batch object with a session id', () => {
    expect(
      parseSearchResults({
        sessionId: 'session-1',
        results: [{ url: 'https://example.org', engine: 'brave', query: 'grants' }],
      }),
    ).toEqual({
      sessionId: 'session-1',
      results: [{ url: 'https://example.org', engine: 'brave', query: 'grants' }],
    });
  });

  it('rejects entries without a url', () => {
    expect(() => parseSearchResults([{ title: 'Grants' }])).toThrow(ValidationError);
  });

  it('rejects other shapes', () => {
    expect(() => parseSearchResults('https://example.org')).toThrow(ValidationError);
  });
});

describe('readSearchResultsFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'search-results-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads and validates a JSON file', async () => {
    const file = join(dir, 'batch.json');
    writeFileSync(file, JSON.stringify({ results: [{ url: 'https://example.org' }] }));

    expect(await readSearchResultsFile(file)).toEqual({ results: [{ url: 'https://example.org' }] });
  });

  it('reports malformed JSON', async () => {
    const file = join(dir, 'broken.json');
    writeFileSync(file, '{ "results": [');

    await expect(readSearchResultsFile(file)).rejects.toBeInstanceOf(ValidationError);
  });

  it('reports a missing file', async () => {
    await expect(readSearchResultsFile(join(dir, 'missing.json'))).rejects.toBeInstanceOf(
      ValidationError,
    );
  });
});
