/**
 * Taxonomy key routed to the confidence scale table instead of the generic
 * taxonomy/concept tables.
 */
export const CONFIDENCE_TAXONOMY_KEY = 'confidence';

export interface ConceptRecord {
  id: string;
  label: string;
  uri: string;
  description: string;
  /** Only confidence scale entries carry a level. */
  level?: number | undefined;
}

export interface Taxonomy {
  key: string;
  uri: string;
  concepts: ConceptRecord[];
}
