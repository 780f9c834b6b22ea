/**
 * Entity Repository Port
 *
 * Lookup-by-name contract the entity caches load through. Implementations
 * live with the persistence layer; they signal a missing entity by
 * throwing EntityNotFoundError and any other failure as-is.
 */

import type { Classification, Glossary, GlossaryTerm, Tag } from '../types/entities.js';

/**
 * Caller context forwarded to the repository (tenant, user, request id)
 */
export interface RequestContext {
  requestId?: string;
  userName?: string;
}

/**
 * Relation fields to populate on a fetched entity
 */
export class Fields {
  static readonly EMPTY = new Fields([]);

  readonly names: ReadonlySet<string>;

  constructor(names: Iterable<string>) {
    this.names = new Set(names);
  }
}

export interface EntityRepository<T> {
  getByName(context: RequestContext | null, name: string, fields: Fields): Promise<T>;
}

/**
 * The four repositories the lookup cache binds to
 */
export interface LookupRepositories {
  tag: EntityRepository<Tag>;
  classification: EntityRepository<Classification>;
  glossary: EntityRepository<Glossary>;
  glossaryTerm: EntityRepository<GlossaryTerm>;
}
