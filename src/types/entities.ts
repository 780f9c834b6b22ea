/**
 * Catalog entity shapes read by the lookup cache.
 *
 * Only the fields this package consumes are modelled; repositories may
 * return richer records.
 */

export const EntityKind = {
  TAG: 'tag',
  CLASSIFICATION: 'classification',
  GLOSSARY: 'glossary',
  GLOSSARY_TERM: 'glossaryTerm',
} as const;

export type EntityKind = (typeof EntityKind)[keyof typeof EntityKind];

/**
 * Fields common to every labelling entity
 */
export interface CatalogEntity {
  id: string;
  name: string;
  fullyQualifiedName: string;
  description?: string;
  mutuallyExclusive?: boolean;
}

export interface Classification extends CatalogEntity {
  provider?: 'system' | 'user';
}

export interface Tag extends CatalogEntity {
  classification?: string;
  parent?: string;
  deprecated?: boolean;
}

export interface Glossary extends CatalogEntity {
  reviewers?: string[];
}

export interface GlossaryTerm extends CatalogEntity {
  glossary?: string;
  parent?: string;
  synonyms?: string[];
}

// --------------------------------------------------------------------------
// Tag labels
// --------------------------------------------------------------------------

export const TagSource = {
  CLASSIFICATION: 'Classification',
  GLOSSARY: 'Glossary',
} as const;

export type TagSource = (typeof TagSource)[keyof typeof TagSource];

/**
 * A label attached to a catalog asset. `source` arrives from serialized
 * payloads, so it is typed as an open string and checked at use.
 */
export interface TagLabel {
  tagFQN: string;
  source: TagSource | string;
  description?: string;
  labelType?: 'Manual' | 'Propagated' | 'Automated' | 'Derived';
  state?: 'Suggested' | 'Confirmed';
}
