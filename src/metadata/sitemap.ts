/**
 * Metadata - Sitemap Emitter
 *
 * Serializes URL records to the sitemaps.org protocol. A single file holds at
 * most 50,000 URLs; larger sets are split and tied together by an index.
 */

import xml2js from 'xml2js';
import { z } from 'zod';
import type { AnalysisConfig } from '../config/schema.js';
import { DEFAULT_CONFIG } from '../config/schema.js';
import { ValidationError } from '../analysis/errors.js';

// =============================================================================
// Types
// =============================================================================

export const SITEMAP_NAMESPACE = 'http://www.sitemaps.org/schemas/sitemap/0.9';
export const SITEMAP_MAX_URLS = 50_000;
const MAX_LOC_LENGTH = 2048;

// W3C datetime: date, or date and time with a zone designator
const W3C_DATETIME = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2}))?$/;

const LocSchema = z
  .string()
  .max(MAX_LOC_LENGTH)
  .url()
  .refine(loc => /^https?:\/\//i.test(loc), { message: 'loc must be an http(s) URL' });

const LastmodSchema = z.union([z.date(), z.string().regex(W3C_DATETIME, 'lastmod must be a W3C datetime')]);

export const SitemapUrlSchema = z.object({
  loc: LocSchema,
  lastmod: LastmodSchema.optional(),
  changefreq: z.enum(['always', 'hourly', 'daily', 'weekly', 'monthly', 'yearly', 'never']).optional(),
  priority: z.number().min(0).max(1).optional(),
});

export const SitemapIndexEntrySchema = z.object({
  loc: LocSchema,
  lastmod: LastmodSchema.optional(),
});

export type SitemapUrl = z.infer<typeof SitemapUrlSchema>;
export type SitemapIndexEntry = z.infer<typeof SitemapIndexEntrySchema>;

export interface SitemapFile {
  filename: string;
  xml: string;
  urlCount: number;
}

export interface SitemapSet {
  /** Present only when the URLs were split across several files */
  index: SitemapFile | null;
  sitemaps: SitemapFile[];
}

export interface BuildSitemapsOptions {
  /** Public URL of the directory the files are served from */
  baseUrl: string;
  maxUrlsPerFile?: number;
  lastmod?: Date | string;
}

// =============================================================================
// Serialization
// =============================================================================

function createBuilder() {
  return new xml2js.Builder({ xmldec: { version: '1.0', encoding: 'UTF-8' } });
}

function formatLastmod(lastmod: Date | string): string {
  return typeof lastmod === 'string' ? lastmod : lastmod.toISOString();
}

function toUrlElement(url: SitemapUrl): Record<string, string> {
  const element: Record<string, string> = { loc: url.loc };
  if (url.lastmod !== undefined) element.lastmod = formatLastmod(url.lastmod);
  if (url.changefreq !== undefined) element.changefreq = url.changefreq;
  if (url.priority !== undefined) element.priority = url.priority.toFixed(1);
  return element;
}

function parseList<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, items: unknown[], subject: string): T[] {
  const result = z.array(schema).safeParse(items);
  if (!result.success) {
    throw ValidationError.fromZod(subject, result.error);
  }
  return result.data;
}

/**
 * One `urlset` document. Rejects more URLs than the protocol allows per file.
 */
export function buildSitemap(urls: SitemapUrl[]): string {
  if (urls.length > SITEMAP_MAX_URLS) {
    throw new ValidationError('sitemap', [
      { path: 'urls', message: `${urls.length} URLs exceed the ${SITEMAP_MAX_URLS} per-file limit` },
    ]);
  }
  const entries = parseList(SitemapUrlSchema, urls, 'sitemap');

  return createBuilder().buildObject({
    urlset: {
      $: { xmlns: SITEMAP_NAMESPACE },
      url: entries.map(toUrlElement),
    },
  });
}

export function buildSitemapIndex(entries: SitemapIndexEntry[]): string {
  const sitemaps = parseList(SitemapIndexEntrySchema, entries, 'sitemap index');

  return createBuilder().buildObject({
    sitemapindex: {
      $: { xmlns: SITEMAP_NAMESPACE },
      sitemap: sitemaps.map(entry => {
        const element: Record<string, string> = { loc: entry.loc };
        if (entry.lastmod !== undefined) element.lastmod = formatLastmod(entry.lastmod);
        return element;
      }),
    },
  });
}

/**
 * Emit `sitemap.xml` alone when everything fits, otherwise numbered files
 * `sitemap-1.xml`... plus a `sitemap.xml` index pointing at them.
 */
export function buildSitemaps(
  urls: SitemapUrl[],
  options: BuildSitemapsOptions,
  config: AnalysisConfig = DEFAULT_CONFIG
): SitemapSet {
  const perFile = Math.min(options.maxUrlsPerFile ?? config.sitemap.maxUrlsPerFile, SITEMAP_MAX_URLS);
  if (!Number.isInteger(perFile) || perFile < 1) {
    throw new ValidationError('sitemap options', [
      { path: 'maxUrlsPerFile', message: 'Must be a positive integer' },
    ]);
  }

  if (urls.length <= perFile) {
    return {
      index: null,
      sitemaps: [{ filename: 'sitemap.xml', xml: buildSitemap(urls), urlCount: urls.length }],
    };
  }

  const base = options.baseUrl.replace(/\/+$/, '');
  const sitemaps: SitemapFile[] = [];
  for (let start = 0; start < urls.length; start += perFile) {
    const chunk = urls.slice(start, start + perFile);
    sitemaps.push({
      filename: `sitemap-${sitemaps.length + 1}.xml`,
      xml: buildSitemap(chunk),
      urlCount: chunk.length,
    });
  }

  const indexXml = buildSitemapIndex(
    sitemaps.map(file => ({
      loc: `${base}/${file.filename}`,
      ...(options.lastmod !== undefined ? { lastmod: options.lastmod } : {}),
    }))
  );

  return {
    index: { filename: 'sitemap.xml', xml: indexXml, urlCount: sitemaps.length },
    sitemaps,
  };
}
