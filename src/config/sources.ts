/**
 * News source definitions
 *
 * Selectors and labels here track the live markup of each site and break
 * whenever a site is redesigned.
 */

export const SOURCE_NAMES = ['iceye', 'rocketlab', 'capella', 'spacewatch', 'capella-media'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export interface FeedSourceDefinition {
  kind: 'feed';
  feedUrl: string;
}

export interface LinkTextSourceDefinition {
  kind: 'link-text';
  pageUrl: string;
  /** Anchor text must start or end with this label */
  label: string;
  match: 'startsWith' | 'endsWith';
}

export interface BrowserSourceDefinition {
  kind: 'browser';
  pageUrl: string;
  linkSelector: string;
  loadMoreLabel?: string;
  maxLoadMoreClicks: number;
  clickWaitMs: number;
}

export type SourceDefinition =
  | FeedSourceDefinition
  | LinkTextSourceDefinition
  | BrowserSourceDefinition;

export const SOURCE_DEFINITIONS: Record<SourceName, SourceDefinition> = {
  iceye: {
    kind: 'link-text',
    pageUrl: 'https://www.iceye.com/newsroom/press-releases',
    label: 'Read more',
    match: 'startsWith',
  },
  rocketlab: {
    kind: 'link-text',
    pageUrl: 'https://rocketlabcorp.com/updates/',
    label: 'Read more',
    match: 'endsWith',
  },
  capella: {
    kind: 'feed',
    feedUrl: 'https://www.capellaspace.com/media/feed/',
  },
  spacewatch: {
    kind: 'feed',
    feedUrl: 'https://spacewatch.global/news/feed/',
  },
  'capella-media': {
    kind: 'browser',
    pageUrl: 'https://www.capellaspace.com/media',
    linkSelector:
      "a[href^='/'][href*='press-'], a[href^='/'][href*='blog-'], a[href^='/'][href*='in-the-news-']",
    loadMoreLabel: 'Load More',
    maxLoadMoreClicks: 20,
    clickWaitMs: 800,
  },
};

export const DEFAULT_ENABLED_SOURCES: SourceName[] = ['iceye', 'rocketlab', 'capella', 'spacewatch'];
