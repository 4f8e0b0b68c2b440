export {
  createArticleResolver,
  firstWords,
  terminatePreview,
  FALLBACK_TITLE,
  NO_PREVIEW,
  ELLIPSIS,
  type ArticleResolver,
  type ResolverOptions,
} from './article-resolver.js';
