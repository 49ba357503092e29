import { z } from 'zod';

export const PACK_DESCRIPTION_DEFAULT = 'not provided';

/**
 * Header shared by tagpacks and actorpacks.
 */
export const PackHeaderSchema = z.object({
  title: z.string({ required_error: 'title is required' }),
  creator: z.string({ required_error: 'creator is required' }),
  description: z.string().default(PACK_DESCRIPTION_DEFAULT),
});

/** ISO 8601 string or a parsed date. */
export type Timestamp = string | Date;

/**
 * One attribution tag as handed over by the tagpack parser, after pack-level
 * deduplication.
 */
export interface TagRecord {
  label: string;
  source: string;
  category?: string | undefined;
  abuse?: string | undefined;
  address: string;
  currency: string;
  isClusterDefiner?: boolean | undefined;
  confidence?: string | undefined;
  lastmod?: Timestamp | undefined;
  context?: string | undefined;
}

export interface ActorRecord {
  id: string;
  label: string;
  uri?: string | undefined;
  lastmod?: Timestamp | undefined;
  categories?: string[] | undefined;
  jurisdictions?: string[] | undefined;
}

/** Top-level fields of a pack file as parsed; the header is validated on insert. */
export type PackContents = Readonly<Record<string, unknown>>;
export type PackHeader = z.infer<typeof PackHeaderSchema>;

/**
 * A parsed tagpack. `getUniqueTags` yields the tags left after pack-level
 * deduplication.
 */
export interface TagpackSource {
  contents: PackContents;
  uri: string;
  getUniqueTags(): Iterable<TagRecord>;
}

export interface ActorpackSource {
  contents: PackContents;
  uri: string;
  getUniqueActors(): Iterable<ActorRecord>;
}
