/**
 * Core types for the space news notifier
 */

/**
 * Unresolved pointer to an article, as produced by a source adapter
 */
export interface CandidateReference {
  url: string;
  /** Teaser text shipped with the listing (feed snippet); may be empty */
  inlineText: string;
}

/**
 * Deterministic fingerprint of an article URL
 */
export type ArticleIdentity = string;

export type SeenSet = Set<ArticleIdentity>;

export interface ResolvedArticle {
  title: string;
  preview: string;
}

export interface PipelineResult {
  candidates: number;
  duplicates: number;
  posted: number;
  failed: number;
  emptySources: number;
  sourceErrors: number;
  durationMs: number;
}
