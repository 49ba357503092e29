import {
  normalizeAddress,
  PackHeaderSchema,
  ValidationError,
  type ActorRecord,
  type PackHeader,
  type PackContents,
  type TagRecord,
  type Taxonomy,
} from '@tagstore/core';
import type { TagstoreSchema } from '@tagstore/data';
import type { Insertable } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

export type TaxonomyRow = Insertable<TagstoreSchema['taxonomy']>;
export type ConceptRow = Insertable<TagstoreSchema['concept']>;
export type ConfidenceRow = Insertable<TagstoreSchema['confidence']>;
export type TagpackRow = Insertable<TagstoreSchema['tagpack']>;
export type TagRow = Insertable<TagstoreSchema['tag']>;
export type AddressRow = Insertable<TagstoreSchema['address']>;
export type ActorpackRow = Insertable<TagstoreSchema['actorpack']>;
export type ActorRow = Insertable<TagstoreSchema['actor']>;
export type ActorCategoryRow = Insertable<TagstoreSchema['actor_categories']>;
export type ActorJurisdictionRow = Insertable<TagstoreSchema['actor_jurisdictions']>;

export interface PackRowParams {
  id: string;
  isPublic: boolean;
  uri: string;
}

function toTimestamp(value: string | Date | undefined, importedAt: Date): string {
  if (value === undefined) return importedAt.toISOString();
  return value instanceof Date ? value.toISOString() : value;
}

function parseHeader(contents: PackContents, packId: string): Result<PackHeader, ValidationError> {
  const result = PackHeaderSchema.safeParse(contents);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message).join(', ');
    return err(new ValidationError(`Invalid header in ${packId}: ${issues}`, { packId }));
  }
  return ok(result.data);
}

export function toTaxonomyRow(taxonomy: Taxonomy, importedAt: Date): TaxonomyRow {
  return {
    description: `Imported at ${importedAt.toISOString()}`,
    id: taxonomy.key,
    source: taxonomy.uri,
  };
}

export function toConceptRows(taxonomy: Taxonomy): ConceptRow[] {
  return taxonomy.concepts.map((concept) => ({
    description: concept.description,
    id: concept.id,
    label: concept.label,
    source: concept.uri,
    taxonomy: taxonomy.key,
  }));
}

/**
 * Every confidence scale entry must carry a numeric level.
 */
export function toConfidenceRows(scale: Taxonomy): Result<ConfidenceRow[], ValidationError> {
  const rows: ConfidenceRow[] = [];
  for (const concept of scale.concepts) {
    if (concept.level === undefined) {
      return err(new ValidationError(`Confidence level missing for ${concept.id}`, { id: concept.id }));
    }
    rows.push({ description: concept.description, id: concept.id, label: concept.label, level: concept.level });
  }
  return ok(rows);
}

export function toTagpackRow(contents: PackContents, params: PackRowParams): Result<TagpackRow, ValidationError> {
  return parseHeader(contents, params.id).map((header) => ({
    creator: header.creator,
    description: header.description,
    id: params.id,
    is_public: params.isPublic,
    title: header.title,
    uri: params.uri,
  }));
}

export function toActorpackRow(
  contents: PackContents,
  params: PackRowParams
): Result<ActorpackRow, ValidationError> {
  return parseHeader(contents, params.id).map((header) => ({
    creator: header.creator,
    description: header.description,
    id: params.id,
    is_public: params.isPublic,
    title: header.title,
    uri: params.uri,
  }));
}

/**
 * Builds the tag row and the address row it references. The address is
 * stored in canonical form in both.
 */
export function toTagRows(
  tag: TagRecord,
  tagpackId: string,
  importedAt: Date
): Result<{ address: AddressRow; tag: TagRow }, Error> {
  return normalizeAddress(tag.currency, tag.address).map((address) => ({
    address: { address, currency: tag.currency },
    tag: {
      abuse: tag.abuse ?? null,
      address,
      category: tag.category ?? null,
      confidence: tag.confidence ?? null,
      context: tag.context ?? null,
      currency: tag.currency,
      is_cluster_definer: tag.isClusterDefiner ?? null,
      label: tag.label.toLowerCase().trim(),
      lastmod: toTimestamp(tag.lastmod, importedAt),
      source: tag.source,
      tagpack: tagpackId,
    },
  }));
}

export function toActorRows(
  actor: ActorRecord,
  actorpackId: string,
  importedAt: Date
): { actor: ActorRow; categories: ActorCategoryRow[]; jurisdictions: ActorJurisdictionRow[] } {
  return {
    actor: {
      actorpack: actorpackId,
      id: actor.id,
      label: actor.label.trim(),
      lastmod: toTimestamp(actor.lastmod, importedAt),
      uri: actor.uri?.trim() ?? null,
    },
    categories: (actor.categories ?? []).map((category) => ({ actor_id: actor.id, category_id: category })),
    jurisdictions: (actor.jurisdictions ?? []).map((country) => ({ actor_id: actor.id, country_id: country })),
  };
}
