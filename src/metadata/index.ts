/**
 * Metadata
 *
 * Meta tags, SERP previews, sitemaps and content identifiers built around the
 * analysis results.
 */

export {
  buildMetaTags,
  renderMetaTags,
  type MetaTags,
  type MetaTagsInput,
  type MetaWarning,
  type OpenGraphTags,
} from './meta-tags.js';

export {
  buildSerpSnippet,
  formatDisplayUrl,
  type SerpSnippet,
  type SerpSnippetInput,
} from './serp-snippet.js';

export {
  SITEMAP_MAX_URLS,
  SITEMAP_NAMESPACE,
  SitemapIndexEntrySchema,
  SitemapUrlSchema,
  buildSitemap,
  buildSitemapIndex,
  buildSitemaps,
  type BuildSitemapsOptions,
  type SitemapFile,
  type SitemapIndexEntry,
  type SitemapSet,
  type SitemapUrl,
} from './sitemap.js';

export {
  CONTENT_ID_NAMESPACE,
  canonicalJson,
  deriveContentId,
  type ContentIdKind,
  type JsonValue,
} from './content-id.js';

export { ELLIPSIS, escapeHtml, truncate, type Truncated } from './text.js';
