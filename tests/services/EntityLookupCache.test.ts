/**
 * Entity Lookup Cache Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import pino from 'pino';
import type { Logger } from 'pino';
import {
  EntityLookupCache,
  getSharedLookupCache,
  initializeSharedLookupCache,
  lookupCacheOptionsFromConfig,
  resetSharedLookupCache,
} from '../../src/services/EntityLookupCache.js';
import { Fields } from '../../src/repositories/EntityRepository.js';
import type { LookupRepositories, RequestContext } from '../../src/repositories/EntityRepository.js';
import { loadConfig } from '../../src/config.js';
import {
  CacheNotInitializedError,
  EntityNotFoundError,
  InvalidArgumentError,
} from '../../src/errors.js';
import type { CatalogEntity, TagLabel } from '../../src/types/entities.js';

// Mock logger
const mockLogger = {
  child: vi.fn().mockReturnThis(),
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
} as unknown as Logger;

const silentLogger = pino({ level: 'silent' });

type GetByName = (context: RequestContext | null, name: string, fields: Fields) => Promise<CatalogEntity>;

const entity = (fullyQualifiedName: string, overrides: Partial<CatalogEntity> = {}): CatalogEntity => ({
  id: `id-${fullyQualifiedName}`,
  name: fullyQualifiedName.split('.').pop() ?? fullyQualifiedName,
  fullyQualifiedName,
  ...overrides,
});

// Mock repository backed by a fixed set of entities
const createMockRepository = (kind: string, entities: CatalogEntity[]) => {
  const byName = new Map(entities.map((e) => [e.fullyQualifiedName, e]));
  const getByName = vi.fn<GetByName>(async (_context, name) => {
    const found = byName.get(name);
    if (!found) {
      throw new EntityNotFoundError(kind, name);
    }
    return found;
  });
  return { getByName };
};

const createRepositories = () => ({
  tag: createMockRepository('tag', [
    entity('PII.Sensitive', { description: 'Sensitive personal data' }),
    entity('PersonalData.Personal', { mutuallyExclusive: true }),
    entity('PersonalData.Personal.Name'),
    entity('Tier.Tier1'),
    entity('Tier.Tier2'),
    entity('Tier.Tier3'),
  ]),
  classification: createMockRepository('classification', [
    entity('PII', { mutuallyExclusive: true }),
    entity('PersonalData'),
  ]),
  glossary: createMockRepository('glossary', [entity('Business', { mutuallyExclusive: false })]),
  glossaryTerm: createMockRepository('glossaryTerm', [
    entity('Business.Revenue', { description: 'Recognized revenue', mutuallyExclusive: true }),
    entity('Business."Term.With.Dots"', { mutuallyExclusive: true }),
  ]),
});

type MockRepositories = ReturnType<typeof createRepositories>;

const calls = (mock: Mock<GetByName>): string[] => mock.mock.calls.map((call) => call[1]);

const label = (tagFQN: string, source: string): TagLabel => ({ tagFQN, source });

describe('EntityLookupCache', () => {
  let repos: MockRepositories;
  let cache: EntityLookupCache;

  beforeEach(() => {
    vi.clearAllMocks();
    repos = createRepositories();
    cache = new EntityLookupCache(repos satisfies LookupRepositories, silentLogger);
    cache.initialize();
  });

  afterEach(() => {
    cache.close();
    vi.useRealTimers();
  });

  describe('initialize', () => {
    it('should be a logged no-op when called again', () => {
      const logged = new EntityLookupCache(repos, mockLogger);
      logged.initialize();
      logged.initialize();

      expect(logged.isInitialized).toBe(true);
      expect(mockLogger.info).toHaveBeenCalledWith('Entity lookup cache is already initialized');
      logged.close();
    });

    it('should not call any repository until a lookup happens', () => {
      expect(repos.tag.getByName).not.toHaveBeenCalled();
      expect(repos.classification.getByName).not.toHaveBeenCalled();
    });

    it('should reject lookups before initialization', async () => {
      const uninitialized = new EntityLookupCache(repos, silentLogger);

      await expect(uninitialized.getTag('PII.Sensitive')).rejects.toBeInstanceOf(CacheNotInitializedError);
    });
  });

  describe('getters', () => {
    it('should return the cached instance without a second repository call', async () => {
      const first = await cache.getTag('PII.Sensitive');
      const second = await cache.getTag('PII.Sensitive');

      expect(second).toBe(first);
      expect(repos.tag.getByName).toHaveBeenCalledTimes(1);
      expect(repos.tag.getByName).toHaveBeenCalledWith(null, 'PII.Sensitive', Fields.EMPTY);
    });

    it('should resolve each entity kind through its own repository', async () => {
      expect((await cache.getClassification('PII')).id).toBe('id-PII');
      expect((await cache.getGlossary('Business')).id).toBe('id-Business');
      expect((await cache.getGlossaryTerm('Business.Revenue')).id).toBe('id-Business.Revenue');

      expect(calls(repos.classification.getByName)).toEqual(['PII']);
      expect(calls(repos.glossary.getByName)).toEqual(['Business']);
      expect(calls(repos.glossaryTerm.getByName)).toEqual(['Business.Revenue']);
      expect(repos.tag.getByName).not.toHaveBeenCalled();
    });

    it('should raise EntityNotFoundError for a missing entity', async () => {
      const error = await cache.getTag('PII.Missing').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EntityNotFoundError);
      expect(error).toMatchObject({
        entityType: 'tag',
        entityName: 'PII.Missing',
        message: 'tag instance for PII.Missing not found',
      });
    });

    it('should translate backend failures into EntityNotFoundError and retry next time', async () => {
      const failure = new Error('connection reset');
      repos.classification.getByName.mockRejectedValueOnce(failure);

      const error = await cache.getClassification('PII').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(EntityNotFoundError);
      expect(error).toMatchObject({
        message: 'classification instance for PII not found',
        cause: failure,
        recoverable: true,
      });

      const classification = await cache.getClassification('PII');
      expect(classification.fullyQualifiedName).toBe('PII');
      expect(repos.classification.getByName).toHaveBeenCalledTimes(2);
    });

    it('should reload exactly once after the TTL elapses', async () => {
      vi.useFakeTimers();
      const timed = new EntityLookupCache(repos, silentLogger, { ttlMs: 120_000 });
      timed.initialize();

      await timed.getGlossary('Business');
      vi.advanceTimersByTime(119_999);
      await timed.getGlossary('Business');
      expect(repos.glossary.getByName).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(1);
      await timed.getGlossary('Business');
      await timed.getGlossary('Business');
      expect(repos.glossary.getByName).toHaveBeenCalledTimes(2);
      timed.close();
    });

    it('should bound each cache by its configured capacity', async () => {
      const small = new EntityLookupCache(repos, silentLogger, { maxEntries: { tag: 2 } });
      small.initialize();

      await small.getTag('Tier.Tier1');
      await small.getTag('Tier.Tier2');
      await small.getTag('Tier.Tier3'); // evicts Tier1
      await small.getTag('Tier.Tier3');
      await small.getTag('Tier.Tier1');

      expect(calls(repos.tag.getByName)).toEqual(['Tier.Tier1', 'Tier.Tier2', 'Tier.Tier3', 'Tier.Tier1']);
      expect(small.getStats().tag?.size).toBe(2);
      small.close();
    });

    it('should take capacities from configuration', async () => {
      const options = lookupCacheOptionsFromConfig(loadConfig({ TAG_CACHE_MAX_ENTRIES: '1' }));
      const configured = new EntityLookupCache(repos, silentLogger, options);
      configured.initialize();

      await configured.getTag('Tier.Tier1');
      await configured.getTag('Tier.Tier2');
      await configured.getTag('Tier.Tier1');

      expect(repos.tag.getByName).toHaveBeenCalledTimes(3);
      configured.close();
    });
  });

  describe('getDescription', () => {
    it('should read tag descriptions for classification labels', async () => {
      await expect(cache.getDescription(label('PII.Sensitive', 'Classification'))).resolves.toBe(
        'Sensitive personal data'
      );
    });

    it('should read glossary term descriptions for glossary labels', async () => {
      await expect(cache.getDescription(label('Business.Revenue', 'Glossary'))).resolves.toBe(
        'Recognized revenue'
      );
    });

    it('should reject an unknown source', async () => {
      const error = await cache.getDescription(label('PII.Sensitive', 'Derived')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidArgumentError);
      expect(error).toMatchObject({ message: 'Invalid source type Derived' });
    });
  });

  describe('isMutuallyExclusive', () => {
    it('should consult the classification cache for two-part tag names', async () => {
      await expect(cache.isMutuallyExclusive(label('PII.Sensitive', 'Classification'))).resolves.toBe(true);

      expect(calls(repos.classification.getByName)).toEqual(['PII']);
      expect(repos.tag.getByName).not.toHaveBeenCalled();
    });

    it('should consult the tag cache with the parent name for deeper tags', async () => {
      await expect(
        cache.isMutuallyExclusive(label('PersonalData.Personal.Name', 'Classification'))
      ).resolves.toBe(true);

      expect(calls(repos.tag.getByName)).toEqual(['PersonalData.Personal']);
      expect(repos.classification.getByName).not.toHaveBeenCalled();
    });

    it('should consult the glossary cache for two-part glossary terms', async () => {
      await expect(cache.isMutuallyExclusive(label('Business.Revenue', 'Glossary'))).resolves.toBe(false);

      expect(calls(repos.glossary.getByName)).toEqual(['Business']);
      expect(repos.glossaryTerm.getByName).not.toHaveBeenCalled();
    });

    it('should consult the glossary term cache for nested glossary terms', async () => {
      await expect(cache.isMutuallyExclusive(label('Business.Revenue.Recurring', 'Glossary'))).resolves.toBe(
        true
      );

      expect(calls(repos.glossaryTerm.getByName)).toEqual(['Business.Revenue']);
      expect(repos.glossary.getByName).not.toHaveBeenCalled();
    });

    it('should keep quoted parts intact when computing the parent', async () => {
      await expect(
        cache.isMutuallyExclusive(label('Business."Term.With.Dots".Child', 'Glossary'))
      ).resolves.toBe(true);

      expect(calls(repos.glossaryTerm.getByName)).toEqual(['Business."Term.With.Dots"']);
    });

    it('should treat a missing flag as not mutually exclusive', async () => {
      await expect(cache.isMutuallyExclusive(label('PersonalData.Personal', 'Classification'))).resolves.toBe(
        false
      );
    });

    it('should propagate EntityNotFoundError for an unknown parent', async () => {
      await expect(
        cache.isMutuallyExclusive(label('Unknown.Child', 'Classification'))
      ).rejects.toBeInstanceOf(EntityNotFoundError);
    });

    it('should reject an unknown source', async () => {
      await expect(cache.isMutuallyExclusive(label('PII.Sensitive', 'Other'))).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
    });

    it('should reject a name without a parent', async () => {
      await expect(cache.isMutuallyExclusive(label('PII', 'Classification'))).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
      expect(repos.tag.getByName).not.toHaveBeenCalled();
    });
  });

  describe('cleanUp', () => {
    it('should mark the cache uninitialized', async () => {
      cache.cleanUp();

      expect(cache.isInitialized).toBe(false);
      await expect(cache.getTag('PII.Sensitive')).rejects.toBeInstanceOf(CacheNotInitializedError);
    });

    it('should force fresh loads after re-initialization', async () => {
      await cache.getTag('PII.Sensitive');
      await cache.getClassification('PII');
      await cache.getGlossary('Business');
      await cache.getGlossaryTerm('Business.Revenue');

      cache.cleanUp();
      cache.initialize();

      await cache.getTag('PII.Sensitive');
      await cache.getClassification('PII');
      await cache.getGlossary('Business');
      await cache.getGlossaryTerm('Business.Revenue');

      expect(repos.tag.getByName).toHaveBeenCalledTimes(2);
      expect(repos.classification.getByName).toHaveBeenCalledTimes(2);
      expect(repos.glossary.getByName).toHaveBeenCalledTimes(2);
      expect(repos.glossaryTerm.getByName).toHaveBeenCalledTimes(2);
    });
  });

  describe('getStats', () => {
    it('should report per-kind statistics', async () => {
      await cache.getTag('PII.Sensitive');
      await cache.getTag('PII.Sensitive');

      const stats = cache.getStats();
      expect(stats.tag).toMatchObject({ hits: 1, misses: 1, size: 1 });
      expect(stats.glossary).toMatchObject({ hits: 0, misses: 0, size: 0 });
    });

    it('should be empty before initialization', () => {
      expect(new EntityLookupCache(repos, silentLogger).getStats()).toEqual({});
    });
  });
});

describe('shared EntityLookupCache', () => {
  afterEach(() => {
    resetSharedLookupCache();
  });

  it('should throw before the shared instance is initialized', () => {
    expect(() => getSharedLookupCache()).toThrow(CacheNotInitializedError);
  });

  it('should construct the shared instance only once', () => {
    const first = initializeSharedLookupCache(createRepositories(), silentLogger);
    const second = initializeSharedLookupCache(createRepositories(), silentLogger);

    expect(second).toBe(first);
    expect(getSharedLookupCache()).toBe(first);
    expect(first.isInitialized).toBe(true);
  });

  it('should close the shared instance on reset', () => {
    const shared = initializeSharedLookupCache(createRepositories(), silentLogger);
    resetSharedLookupCache();

    expect(shared.isInitialized).toBe(false);
    expect(() => getSharedLookupCache()).toThrow(CacheNotInitializedError);
  });
});
