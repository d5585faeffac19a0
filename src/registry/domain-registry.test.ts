import { beforeEach, describe, expect, it, vi } from 'vitest';
import { DAY_MS, HOUR_MS, WEEK_MS } from '../shared/constants.js';
import { DomainNotFoundError, ValidationError } from '../shared/errors.js';
import { TypedEventEmitter } from '../shared/events.js';
import { DomainRegistry } from './domain-registry.js';
import { InMemoryDomainRepository } from './in-memory-domain-repository.js';

describe('DomainRegistry', () => {
  let now: Date;
  let repository: InMemoryDomainRepository;
  let events: TypedEventEmitter;
  let registry: DomainRegistry;

  const advance = (ms: number): void => {
    now = new Date(now.getTime() + ms);
  };

  beforeEach(() => {
    now = new Date('2026-03-01T00:00:00.000Z');
    repository = new InMemoryDomainRepository();
    events = new TypedEventEmitter();
    registry = new DomainRegistry({ repository, now: () => now, events });
  });

  // -------------------------------------------------------------------------
  // registerDomain
  // -------------------------------------------------------------------------

  describe('registerDomain', () => {
    it('creates a DISCOVERED record with zeroed counters', async () => {
      const domain = await registry.registerDomain('example.org', 'session-1');

      expect(domain).toMatchObject({
        name: 'example.org',
        status: 'DISCOVERED',
        discoverySessionId: 'session-1',
        discoveredAt: new Date('2026-03-01T00:00:00.000Z'),
        processingCount: 0,
        highQualityCount: 0,
        lowQualityCount: 0,
        failureCount: 0,
        bestConfidenceScore: null,
      });
      expect(domain.id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    });

    it('is idempotent and leaves counters unchanged', async () => {
      const first = await registry.registerDomain('example.org', 'session-1');
      await registry.updateQuality(first.id, 0.7, true);

      const again = await registry.registerDomain('example.org', 'session-2');

      expect(again.id).toBe(first.id);
      expect(again.discoverySessionId).toBe('session-1');
      expect(again.highQualityCount).toBe(1);
      expect(again.processingCount).toBe(1);
      expect(repository.size).toBe(1);
    });

    it('returns one record when two batches register the same name at once', async () => {
      const registered = vi.fn();
      events.on('domain:registered', registered);

      const [a, b] = await Promise.all([
        registry.registerDomain('example.org', 'session-1'),
        registry.registerDomain('example.org', 'session-2'),
      ]);

      expect(b.id).toBe(a.id);
      expect(b.discoverySessionId).toBe('session-1');
      expect(repository.size).toBe(1);
      expect(registered).toHaveBeenCalledTimes(1);
    });

    it('normalizes the name', async () => {
      const domain = await registry.registerDomain('WWW.Example.ORG.', null);
      expect(domain.name).toBe('example.org');
      expect(await registry.findByName('example.org')).not.toBeNull();
    });

    it('rejects a blank name', async () => {
      await expect(registry.registerDomain('  ', null)).rejects.toBeInstanceOf(ValidationError);
    });

    it('emits domain:registered only for new records', async () => {
      const listener = vi.fn();
      events.on('domain:registered', listener);

      const domain = await registry.registerDomain('example.org', 'session-1');
      await registry.registerDomain('example.org', 'session-1');

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith({
        domainId: domain.id,
        name: 'example.org',
        sessionId: 'session-1',
      });
    });
  });

  // -------------------------------------------------------------------------
  // updateQuality
  // -------------------------------------------------------------------------

  describe('updateQuality', () => {
    it('keeps the best score and counts every call', async () => {
      const { id } = await registry.registerDomain('example.org', null);

      await registry.updateQuality(id, 0.7, true);
      await registry.updateQuality(id, 0.4, false);
      await registry.updateQuality(id, 0.9, true);
      await registry.updateQuality(id, 0.65, true);

      const domain = await registry.findById(id);
      expect(domain).toMatchObject({
        bestConfidenceScore: 0.9,
        highQualityCount: 3,
        lowQualityCount: 1,
        processingCount: 4,
        status: 'PROCESSED_HIGH_QUALITY',
        lastProcessedAt: new Date('2026-03-01T00:00:00.000Z'),
      });
    });

    it('demotes after three low outcomes with no high-quality history', async () => {
      const demoted = vi.fn();
      events.on('domain:demoted', demoted);
      const { id } = await registry.registerDomain('example.org', null);

      await registry.updateQuality(id, 0.3, false);
      await registry.updateQuality(id, 0.4, false);
      expect((await registry.findById(id))?.status).toBe('DISCOVERED');

      await registry.updateQuality(id, 0.5, false);

      expect((await registry.findById(id))?.status).toBe('PROCESSED_LOW_QUALITY');
      expect(await registry.shouldProcess('example.org')).toBe(false);
      expect(demoted).toHaveBeenCalledWith({ domainId: id, name: 'example.org', lowQualityCount: 3 });
    });

    it('never demotes after a high-quality hit (low, low, high, low)', async () => {
      const { id } = await registry.registerDomain('example.org', null);

      await registry.updateQuality(id, 0.3, false);
      await registry.updateQuality(id, 0.4, false);
      await registry.updateQuality(id, 0.8, true);
      await registry.updateQuality(id, 0.2, false);

      const domain = await registry.findById(id);
      expect(domain?.status).toBe('PROCESSED_HIGH_QUALITY');
      expect(domain?.lowQualityCount).toBe(3);
      expect(domain?.highQualityCount).toBe(1);
    });

    it('ignores unknown ids', async () => {
      await expect(registry.updateQuality('missing', 0.9, true)).resolves.toBeUndefined();
      expect(repository.size).toBe(0);
    });

    it('rejects scores outside 0..1', async () => {
      const { id } = await registry.registerDomain('example.org', null);
      await expect(registry.updateQuality(id, 1.2, true)).rejects.toBeInstanceOf(ValidationError);
      await expect(registry.updateQuality(id, Number.NaN, true)).rejects.toBeInstanceOf(ValidationError);
    });

    it('rounds stored scores to two decimals', async () => {
      const { id } = await registry.registerDomain('example.org', null);
      await registry.updateQuality(id, 0.1 + 0.2, false);
      expect((await registry.findById(id))?.bestConfidenceScore).toBe(0.3);
    });
  });

  // -------------------------------------------------------------------------
  // recordProcessingFailure
  // -------------------------------------------------------------------------

  describe('recordProcessingFailure', () => {
    it('backs off 1h, 4h, 1d, 1w, 1w', async () => {
      const { id } = await registry.registerDomain('example.org', null);
      const expected = [HOUR_MS, 4 * HOUR_MS, DAY_MS, WEEK_MS, WEEK_MS];

      for (const [index, delay] of expected.entries()) {
        await registry.recordProcessingFailure(id, 'timeout');
        const domain = await registry.findById(id);

        expect(domain?.failureCount).toBe(index + 1);
        expect(domain?.status).toBe('PROCESSING_FAILED');
        expect(domain?.retryAfter?.getTime()).toBe(now.getTime() + delay);
      }
    });

    it('blocks processing until retryAfter elapses', async () => {
      const { id } = await registry.registerDomain('example.org', null);
      await registry.recordProcessingFailure(id, 'timeout');

      expect(await registry.shouldProcess('example.org')).toBe(false);
      expect(await registry.listReadyForRetry()).toEqual([]);

      advance(HOUR_MS);

      expect(await registry.shouldProcess('example.org')).toBe(true);
      const ready = await registry.listReadyForRetry();
      expect(ready.map((d) => d.name)).toEqual(['example.org']);
    });

    it('uses a configured schedule', async () => {
      registry = new DomainRegistry({
        repository,
        now: () => now,
        events,
        failureBackoffMs: [5 * 60_000],
      });
      const { id } = await registry.registerDomain('example.org', null);
      await registry.recordProcessingFailure(id, 'timeout');
      await registry.recordProcessingFailure(id, 'timeout');

      expect((await registry.findById(id))?.retryAfter).toEqual(new Date('2026-03-01T00:05:00.000Z'));
    });

    it('emits domain:failed with the retry time', async () => {
      const failed = vi.fn();
      events.on('domain:failed', failed);
      const { id } = await registry.registerDomain('example.org', null);

      await registry.recordProcessingFailure(id, 'dns');

      expect(failed).toHaveBeenCalledWith({
        domainId: id,
        name: 'example.org',
        failureCount: 1,
        retryAfter: '2026-03-01T01:00:00.000Z',
      });
    });

    it('ignores unknown ids', async () => {
      await expect(registry.recordProcessingFailure('missing', 'x')).resolves.toBeUndefined();
    });
  });

  // -------------------------------------------------------------------------
  // blacklistDomain
  // -------------------------------------------------------------------------

  describe('blacklistDomain', () => {
    it('creates and blacklists an unknown domain', async () => {
      const listener = vi.fn();
      events.on('domain:blacklisted', listener);

      const domain = await registry.blacklistDomain('spam.example.com', 'scraper farm', 'admin-1');

      expect(domain).toMatchObject({
        name: 'spam.example.com',
        status: 'BLACKLISTED',
        blacklistReason: 'scraper farm',
        blacklistedBy: 'admin-1',
        blacklistedAt: new Date('2026-03-01T00:00:00.000Z'),
      });
      expect(listener).toHaveBeenCalledWith({
        domainId: domain.id,
        name: 'spam.example.com',
        reason: 'scraper farm',
        actorId: 'admin-1',
      });
    });

    it('preserves counters of an existing domain', async () => {
      const { id } = await registry.registerDomain('example.org', 'session-1');
      await registry.updateQuality(id, 0.8, true);
      await registry.updateQuality(id, 0.3, false);

      const domain = await registry.blacklistDomain('example.org', 'not a funder', 'admin-1');

      expect(domain.id).toBe(id);
      expect(domain.highQualityCount).toBe(1);
      expect(domain.lowQualityCount).toBe(1);
      expect(domain.bestConfidenceScore).toBe(0.8);
      expect(domain.discoverySessionId).toBe('session-1');
    });

    it('is absolute: later events never re-enable processing', async () => {
      const domain = await registry.blacklistDomain('example.org', 'not a funder', 'admin-1');

      await registry.updateQuality(domain.id, 0.95, true);
      await registry.recordProcessingFailure(domain.id, 'timeout');
      await registry.markNoFundsThisYear('example.org', 2026, 'budget spent');
      advance(2 * 365 * DAY_MS);

      expect((await registry.findById(domain.id))?.status).toBe('BLACKLISTED');
      expect(await registry.shouldProcess('example.org')).toBe(false);
      expect((await registry.listBlacklisted()).map((d) => d.name)).toEqual(['example.org']);
    });
  });

  // -------------------------------------------------------------------------
  // markNoFundsThisYear
  // -------------------------------------------------------------------------

  describe('markNoFundsThisYear', () => {
    it('blocks for the marked year and allows after rollover', async () => {
      now = new Date('2026-06-15T00:00:00.000Z');
      await registry.registerDomain('example.org', null);

      const result = await registry.markNoFundsThisYear('example.org', 2026, 'budget spent');

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.value).toMatchObject({
          status: 'NO_FUNDS_THIS_YEAR',
          noFundsYear: 2026,
          noFundsReason: 'budget spent',
        });
      }
      expect(await registry.shouldProcess('example.org')).toBe(false);

      now = new Date('2026-12-31T23:59:59.999Z');
      expect(await registry.shouldProcess('example.org')).toBe(false);

      now = new Date('2027-01-01T00:00:00.000Z');
      expect(await registry.shouldProcess('example.org')).toBe(true);
    });

    it('does not block a funder marked for a later year', async () => {
      now = new Date('2026-06-15T00:00:00.000Z');
      await registry.registerDomain('funder.org', null);

      await registry.markNoFundsThisYear('funder.org', 2027, 'next budget already spent');

      expect(await registry.shouldProcess('funder.org')).toBe(true);

      now = new Date('2027-03-01T00:00:00.000Z');
      expect(await registry.shouldProcess('funder.org')).toBe(false);
    });

    it('fails with DOMAIN_NOT_FOUND for unknown domains', async () => {
      const result = await registry.markNoFundsThisYear('unknown.org', 2026, 'budget spent');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(DomainNotFoundError);
        expect(result.error.code).toBe('DOMAIN_NOT_FOUND');
      }
      expect(repository.size).toBe(0);
    });

    it('rejects a non-integer year', async () => {
      await registry.registerDomain('example.org', null);
      const result = await registry.markNoFundsThisYear('example.org', 2026.5, 'budget spent');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ValidationError);
      }
    });
  });

  // -------------------------------------------------------------------------
  // Eligibility and queries
  // -------------------------------------------------------------------------

  describe('checkEligibility', () => {
    it('is eligible for unknown domains', async () => {
      expect(await registry.checkEligibility('new.example.org')).toEqual({ eligible: true, status: null });
      expect(await registry.shouldProcess('new.example.org')).toBe(true);
    });

    it('honours the high-quality re-check interval', async () => {
      registry = new DomainRegistry({ repository, now: () => now, events, highQualityRecheckMs: DAY_MS });
      const { id } = await registry.registerDomain('example.org', null);
      await registry.updateQuality(id, 0.9, true);

      expect(await registry.checkEligibility('example.org')).toEqual({
        eligible: false,
        status: 'PROCESSED_HIGH_QUALITY',
        reason: 'recheck-pending',
        until: new Date('2026-03-02T00:00:00.000Z'),
      });

      advance(DAY_MS);
      expect(await registry.shouldProcess('example.org')).toBe(true);
    });
  });

  describe('queries', () => {
    it('lists productive domains, most high-quality hits first', async () => {
      const a = await registry.registerDomain('a.example.org', 's1');
      const b = await registry.registerDomain('b.example.org', 's1');
      const c = await registry.registerDomain('c.example.org', 's2');
      await registry.updateQuality(a.id, 0.7, true);
      await registry.updateQuality(b.id, 0.8, true);
      await registry.updateQuality(b.id, 0.7, true);
      await registry.updateQuality(c.id, 0.3, false);

      expect((await registry.listHighQuality()).map((d) => d.name)).toEqual([
        'b.example.org',
        'a.example.org',
      ]);
      expect((await registry.listHighQuality(2)).map((d) => d.name)).toEqual(['b.example.org']);
      expect((await registry.listBySession('s1')).map((d) => d.name)).toEqual([
        'a.example.org',
        'b.example.org',
      ]);
    });

    it('counts domains per status', async () => {
      await registry.registerDomain('a.example.org', null);
      await registry.blacklistDomain('b.example.org', 'spam', 'admin-1');

      expect(await registry.countByStatus()).toEqual({
        DISCOVERED: 1,
        PROCESSING: 0,
        PROCESSED_HIGH_QUALITY: 0,
        PROCESSED_LOW_QUALITY: 0,
        NO_FUNDS_THIS_YEAR: 0,
        PROCESSING_FAILED: 0,
        BLACKLISTED: 1,
      });
    });
  });
});
