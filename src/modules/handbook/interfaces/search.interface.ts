/** Fields of a document in the handbook index. */
export interface HandbookDocument {
  chunk_id?: string;
  parent_id?: string;
  content?: string;
  title?: string;
  url?: string;
  filepath?: string;
  contentVector?: number[];
}

export const RESULT_FIELDS = [
  'chunk_id',
  'content',
  'title',
  'url',
  'filepath',
  'parent_id',
] as const;

export type ResultField = (typeof RESULT_FIELDS)[number];

export type HandbookSearchResult = { score: number } & Partial<
  Record<ResultField, string>
>;

/** Hybrid search parameters (keyword text + query vector). */
export interface HybridSearchQuery {
  text: string;
  vector: number[];
  top: number;
  filter?: string; // OData filter expression
}
