/**
 * Metadata - Meta Tags
 *
 * Builds the head tags for a page from raw strings, enforcing the shared
 * title and description limits.
 */

import { z } from 'zod';
import type { AnalysisConfig } from '../config/schema.js';
import { DEFAULT_CONFIG } from '../config/schema.js';
import { ValidationError } from '../analysis/errors.js';
import { charLength, normalize } from '../analysis/normalizer.js';
import { escapeHtml, truncate } from './text.js';

// =============================================================================
// Types
// =============================================================================

export type MetaWarning =
  | 'title_empty'
  | 'title_truncated'
  | 'description_empty'
  | 'description_too_short'
  | 'description_truncated';

const MetaTagsInputSchema = z.object({
  title: z.string(),
  description: z.string(),
  canonicalUrl: z.string().url().optional(),
  keywords: z.array(z.string()).default([]),
  robots: z.string().default('index, follow'),
  locale: z.string().default('en_US'),
  siteName: z.string().optional(),
  imageUrl: z.string().url().optional(),
  type: z.enum(['website', 'article', 'product']).default('website'),
});

export type MetaTagsInput = z.input<typeof MetaTagsInputSchema>;

export interface OpenGraphTags {
  title: string;
  description: string;
  type: 'website' | 'article' | 'product';
  locale: string;
  url?: string;
  siteName?: string;
  image?: string;
}

export interface MetaTags {
  title: string;
  description: string;
  canonical?: string;
  robots: string;
  keywords: string;
  openGraph: OpenGraphTags;
  warnings: MetaWarning[];
}

// =============================================================================
// Builders
// =============================================================================

export function buildMetaTags(input: MetaTagsInput, config: AnalysisConfig = DEFAULT_CONFIG): MetaTags {
  const parsed = MetaTagsInputSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod('meta tags input', parsed.error);
  }
  const meta = parsed.data;
  const { limits } = config;
  const warnings: MetaWarning[] = [];

  const title = truncate(meta.title, limits.titleMaxLength);
  if (title.value.length === 0) warnings.push('title_empty');
  if (title.truncated) warnings.push('title_truncated');

  const description = truncate(meta.description, limits.descriptionMaxLength);
  const descriptionLength = charLength(description.value);
  if (descriptionLength === 0) {
    warnings.push('description_empty');
  } else if (descriptionLength < limits.descriptionMinLength) {
    warnings.push('description_too_short');
  }
  if (description.truncated) warnings.push('description_truncated');

  const keywords = Array.from(new Set(meta.keywords.map(normalize).filter(k => k.length > 0)));

  const openGraph: OpenGraphTags = {
    title: title.value,
    description: description.value,
    type: meta.type,
    locale: meta.locale,
  };
  if (meta.canonicalUrl) openGraph.url = meta.canonicalUrl;
  if (meta.siteName) openGraph.siteName = meta.siteName;
  if (meta.imageUrl) openGraph.image = meta.imageUrl;

  return {
    title: title.value,
    description: description.value,
    canonical: meta.canonicalUrl,
    robots: meta.robots,
    keywords: keywords.join(', '),
    openGraph,
    warnings,
  };
}

/**
 * Render tags as HTML head lines
 */
export function renderMetaTags(tags: MetaTags): string {
  const lines: string[] = [];

  lines.push(`<title>${escapeHtml(tags.title)}</title>`);
  lines.push(`<meta name="description" content="${escapeHtml(tags.description)}">`);
  lines.push(`<meta name="robots" content="${escapeHtml(tags.robots)}">`);
  if (tags.keywords) {
    lines.push(`<meta name="keywords" content="${escapeHtml(tags.keywords)}">`);
  }
  if (tags.canonical) {
    lines.push(`<link rel="canonical" href="${escapeHtml(tags.canonical)}">`);
  }

  const og = tags.openGraph;
  const ogPairs: Array<[string, string | undefined]> = [
    ['og:title', og.title],
    ['og:description', og.description],
    ['og:type', og.type],
    ['og:locale', og.locale],
    ['og:url', og.url],
    ['og:site_name', og.siteName],
    ['og:image', og.image],
  ];
  for (const [property, content] of ogPairs) {
    if (content) {
      lines.push(`<meta property="${property}" content="${escapeHtml(content)}">`);
    }
  }

  return lines.join('\n');
}
