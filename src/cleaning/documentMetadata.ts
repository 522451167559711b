/**
 * Structured metadata carried by every cleaned document. The key set is fixed;
 * a value that could not be located is UNKNOWN, never absent.
 */

export const UNKNOWN = 'unknown';

export const METADATA_KEYS = [
  'title',
  'category',
  'time_period',
  'year',
  'document_number',
  'document_type',
  'enacted_date',
  'coming_into_force_date',
  'subtitle',
  'isbn',
  'extent',
  'embedding_quality',
] as const;

export type MetadataKey = (typeof METADATA_KEYS)[number];

export type DocumentMetadata = Record<MetadataKey, string>;

export function emptyMetadata(): DocumentMetadata {
  return {
    title: UNKNOWN,
    category: UNKNOWN,
    time_period: UNKNOWN,
    year: UNKNOWN,
    document_number: UNKNOWN,
    document_type: UNKNOWN,
    enacted_date: UNKNOWN,
    coming_into_force_date: UNKNOWN,
    subtitle: UNKNOWN,
    isbn: UNKNOWN,
    extent: UNKNOWN,
    embedding_quality: UNKNOWN,
  };
}

/**
 * A heading-delimited part of the clean text
 */
export interface DocumentSection {
  index: number;
  /** part, chapter, section, regulation, article, schedule, level_N or preamble */
  sectionType: string;
  number: string;
  title: string;
  content: string;
}
