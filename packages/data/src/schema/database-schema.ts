import type { ColumnType, Generated } from 'kysely';

/**
 * Kysely table types for the tagstore schema. Column names are snake_case to
 * match the database exactly.
 */

// Written as ISO 8601 strings; pg hands timestamps back as Date
export type DateTime = ColumnType<Date | string, string, string>;

export interface TaxonomyTable {
  id: string;
  source: string;
  description: string;
}

export interface ConceptTable {
  id: string;
  label: string;
  taxonomy: string;
  source: string;
  description: string;
}

export interface ConfidenceTable {
  id: string;
  label: string;
  description: string;
  level: number;
}

export interface TagpackTable {
  id: string;
  title: string;
  description: string;
  creator: string;
  uri: string | null;
  is_public: boolean;
}

export interface TagTable {
  id: Generated<number>;
  label: string;
  source: string;
  category: string | null;
  abuse: string | null;
  address: string;
  currency: string;
  is_cluster_definer: boolean | null;
  confidence: string | null;
  lastmod: DateTime;
  context: string | null;
  tagpack: string;
}

export interface AddressTable {
  currency: string;
  address: string;
  is_mapped: Generated<boolean>;
}

export interface ActorpackTable {
  id: string;
  title: string;
  creator: string;
  description: string;
  is_public: boolean;
  uri: string | null;
}

export interface ActorTable {
  id: string;
  label: string;
  uri: string | null;
  lastmod: DateTime;
  actorpack: string;
}

export interface ActorCategoriesTable {
  actor_id: string;
  category_id: string;
}

export interface ActorJurisdictionsTable {
  actor_id: string;
  country_id: string;
}

export interface AddressClusterMappingTable {
  address: string;
  currency: string;
  gs_cluster_id: number;
  gs_cluster_def_addr: string;
  gs_cluster_no_addr: number;
}

export interface AddressQualityTable {
  currency: string;
  address: string;
  quality: number;
}

export interface TagstoreSchema {
  taxonomy: TaxonomyTable;
  concept: ConceptTable;
  confidence: ConfidenceTable;
  tagpack: TagpackTable;
  tag: TagTable;
  address: AddressTable;
  actorpack: ActorpackTable;
  actor: ActorTable;
  actor_categories: ActorCategoriesTable;
  actor_jurisdictions: ActorJurisdictionsTable;
  address_cluster_mapping: AddressClusterMappingTable;
  address_quality: AddressQualityTable;
}

/**
 * Materialized views refreshed by the maintenance engine, in refresh order.
 */
export const MATERIALIZED_VIEWS = [
  'label',
  'statistics',
  'tag_count_by_cluster',
  'cluster_defining_tags_by_frequency_and_maxconfidence',
] as const;

export type MaterializedView = (typeof MATERIALIZED_VIEWS)[number];
