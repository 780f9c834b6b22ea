/**
 * Entity Lookup Cache
 *
 * Both glossary terms and tags are used for labelling catalog assets. This
 * service caches them, together with their classification and glossary
 * roots, for quick lookup by fully-qualified name.
 *
 * Each entity kind gets its own LoadingCache: bounded by entry count,
 * entries expire a fixed time after being loaded, and misses load through
 * the kind's repository. Any load failure surfaces as EntityNotFoundError.
 */

import type { Logger } from 'pino';
import type { Config } from '../config.js';
import {
  CacheNotInitializedError,
  EntityNotFoundError,
  InvalidArgumentError,
} from '../errors.js';
import { LoadingCache } from '../infrastructure/cache/index.js';
import type { CacheStats } from '../infrastructure/cache/index.js';
import { Fields } from '../repositories/EntityRepository.js';
import type { EntityRepository, LookupRepositories } from '../repositories/EntityRepository.js';
import {
  EntityKind,
  TagSource,
  type CatalogEntity,
  type Classification,
  type Glossary,
  type GlossaryTerm,
  type Tag,
  type TagLabel,
} from '../types/entities.js';
import * as FullyQualifiedName from '../utils/fqn.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface EntityLookupCacheOptions {
  /** Write-time expiry shared by all four caches (default: 2 minutes) */
  ttlMs?: number;
  /** Expired-entry sweep interval (default: 30 seconds) */
  cleanupIntervalMs?: number;
  /** Per-kind capacity overrides */
  maxEntries?: Partial<Record<EntityKind, number>>;
}

export const DEFAULT_MAX_ENTRIES: Record<EntityKind, number> = {
  [EntityKind.TAG]: 100,
  [EntityKind.CLASSIFICATION]: 25,
  [EntityKind.GLOSSARY]: 25,
  [EntityKind.GLOSSARY_TERM]: 100,
};

const DEFAULT_TTL_MS = 2 * 60 * 1000;

interface LookupCaches {
  tag: LoadingCache<Tag>;
  classification: LoadingCache<Classification>;
  glossary: LoadingCache<Glossary>;
  glossaryTerm: LoadingCache<GlossaryTerm>;
}

export type EntityLookupCacheStats = Record<EntityKind, CacheStats>;

/**
 * Map validated configuration onto cache options
 */
export function lookupCacheOptionsFromConfig(config: Config): EntityLookupCacheOptions {
  return {
    ttlMs: config.cacheTtlMs,
    cleanupIntervalMs: config.cacheCleanupIntervalMs,
    maxEntries: {
      [EntityKind.TAG]: config.tagCacheMaxEntries,
      [EntityKind.CLASSIFICATION]: config.classificationCacheMaxEntries,
      [EntityKind.GLOSSARY]: config.glossaryCacheMaxEntries,
      [EntityKind.GLOSSARY_TERM]: config.glossaryTermCacheMaxEntries,
    },
  };
}

// --------------------------------------------------------------------------
// Entity Lookup Cache
// --------------------------------------------------------------------------

export class EntityLookupCache {
  private readonly logger: Logger;
  private readonly log: Logger;
  private readonly repositories: LookupRepositories;
  private readonly options: EntityLookupCacheOptions;
  private caches: LookupCaches | null = null;

  constructor(
    repositories: LookupRepositories,
    logger: Logger,
    options: EntityLookupCacheOptions = {}
  ) {
    this.repositories = repositories;
    this.logger = logger;
    this.log = logger.child({ component: 'EntityLookupCache' });
    this.options = options;
  }

  get isInitialized(): boolean {
    return this.caches !== null;
  }

  /**
   * Build the four caches. Calls after the first are no-ops.
   */
  initialize(): void {
    if (this.caches) {
      this.log.info('Entity lookup cache is already initialized');
      return;
    }

    this.caches = {
      classification: this.createCache(EntityKind.CLASSIFICATION, this.repositories.classification),
      tag: this.createCache(EntityKind.TAG, this.repositories.tag),
      glossary: this.createCache(EntityKind.GLOSSARY, this.repositories.glossary),
      glossaryTerm: this.createCache(EntityKind.GLOSSARY_TERM, this.repositories.glossaryTerm),
    };

    this.log.info(
      { ttlMs: this.options.ttlMs ?? DEFAULT_TTL_MS, maxEntries: this.maxEntries() },
      'Entity lookup cache initialized'
    );
  }

  /**
   * Evict everything and mark the cache uninitialized; the next
   * initialize() builds fresh caches.
   */
  cleanUp(): void {
    if (!this.caches) {
      return;
    }

    for (const cache of Object.values(this.caches)) {
      cache.destroy();
    }
    this.caches = null;
    this.log.info('Entity lookup cache cleaned up');
  }

  /**
   * Release timers and entries on shutdown
   */
  close(): void {
    this.cleanUp();
  }

  async getClassification(classificationName: string): Promise<Classification> {
    return this.resolve(this.requireCaches().classification, EntityKind.CLASSIFICATION, classificationName);
  }

  async getTag(tagFqn: string): Promise<Tag> {
    return this.resolve(this.requireCaches().tag, EntityKind.TAG, tagFqn);
  }

  async getGlossary(glossaryName: string): Promise<Glossary> {
    return this.resolve(this.requireCaches().glossary, EntityKind.GLOSSARY, glossaryName);
  }

  async getGlossaryTerm(glossaryTermFqn: string): Promise<GlossaryTerm> {
    return this.resolve(this.requireCaches().glossaryTerm, EntityKind.GLOSSARY_TERM, glossaryTermFqn);
  }

  /**
   * Description of the tag or glossary term a label points at
   */
  async getDescription(label: TagLabel): Promise<string | undefined> {
    if (label.source === TagSource.CLASSIFICATION) {
      return (await this.getTag(label.tagFQN)).description;
    } else if (label.source === TagSource.GLOSSARY) {
      return (await this.getGlossaryTerm(label.tagFQN)).description;
    }
    throw invalidSource(label);
  }

  /**
   * Returns true if the parent of the tag label is mutually exclusive.
   *
   * A two-part FQN has a classification or glossary as parent; anything
   * deeper has a tag or glossary term as parent.
   */
  async isMutuallyExclusive(label: TagLabel): Promise<boolean> {
    const fqnParts = FullyQualifiedName.split(label.tagFQN);
    if (fqnParts.length < 2) {
      throw new InvalidArgumentError(`Tag label ${label.tagFQN} has no parent`);
    }
    const parentFqn = FullyQualifiedName.getParentFqn(fqnParts);
    const rootParent = fqnParts.length === 2;

    let parent: CatalogEntity;
    if (label.source === TagSource.CLASSIFICATION) {
      parent = rootParent ? await this.getClassification(parentFqn) : await this.getTag(parentFqn);
    } else if (label.source === TagSource.GLOSSARY) {
      parent = rootParent ? await this.getGlossary(parentFqn) : await this.getGlossaryTerm(parentFqn);
    } else {
      throw invalidSource(label);
    }

    return parent.mutuallyExclusive ?? false;
  }

  /**
   * Per-kind statistics; empty before initialize()
   */
  getStats(): Partial<EntityLookupCacheStats> {
    if (!this.caches) {
      return {};
    }
    return {
      [EntityKind.TAG]: this.caches.tag.getStats(),
      [EntityKind.CLASSIFICATION]: this.caches.classification.getStats(),
      [EntityKind.GLOSSARY]: this.caches.glossary.getStats(),
      [EntityKind.GLOSSARY_TERM]: this.caches.glossaryTerm.getStats(),
    };
  }

  private async resolve<T>(cache: LoadingCache<T>, kind: EntityKind, name: string): Promise<T> {
    const result = await cache.get(name);
    if (!result.ok) {
      throw new EntityNotFoundError(kind, name, result.error);
    }
    return result.value;
  }

  private createCache<T extends CatalogEntity>(
    kind: EntityKind,
    repository: EntityRepository<T>
  ): LoadingCache<T> {
    const loader = async (name: string): Promise<T> => {
      const entity = await repository.getByName(null, name, Fields.EMPTY);
      this.log.info({ entityType: kind, name: entity.name, id: entity.id }, `Loaded ${kind}`);
      return entity;
    };

    return new LoadingCache<T>(kind, loader, this.logger, {
      maxEntries: this.maxEntries()[kind],
      ttlMs: this.options.ttlMs ?? DEFAULT_TTL_MS,
      ...(this.options.cleanupIntervalMs !== undefined
        ? { cleanupIntervalMs: this.options.cleanupIntervalMs }
        : {}),
    });
  }

  private maxEntries(): Record<EntityKind, number> {
    return { ...DEFAULT_MAX_ENTRIES, ...this.options.maxEntries };
  }

  private requireCaches(): LookupCaches {
    if (!this.caches) {
      throw new CacheNotInitializedError('EntityLookupCache');
    }
    return this.caches;
  }
}

function invalidSource(label: TagLabel): InvalidArgumentError {
  return new InvalidArgumentError(`Invalid source type ${label.source}`);
}

// --------------------------------------------------------------------------
// Shared instance
// --------------------------------------------------------------------------

let sharedInstance: EntityLookupCache | null = null;

/**
 * Create and initialize the process-wide lookup cache. A second call returns
 * the existing instance and ignores its arguments.
 */
export function initializeSharedLookupCache(
  repositories: LookupRepositories,
  logger: Logger,
  options: EntityLookupCacheOptions = {}
): EntityLookupCache {
  if (!sharedInstance) {
    sharedInstance = new EntityLookupCache(repositories, logger, options);
  }
  sharedInstance.initialize();
  return sharedInstance;
}

export function getSharedLookupCache(): EntityLookupCache {
  if (!sharedInstance) {
    throw new CacheNotInitializedError('Shared EntityLookupCache');
  }
  return sharedInstance;
}

// For testing and shutdown - drop the shared instance
export function resetSharedLookupCache(): void {
  sharedInstance?.close();
  sharedInstance = null;
}
