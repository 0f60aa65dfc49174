import { describe, it, expect } from 'vitest';
import {
  SITEMAP_NAMESPACE,
  buildSitemap,
  buildSitemapIndex,
  buildSitemaps,
  type SitemapUrl,
} from '../../src/metadata/index.js';
import { ValidationError } from '../../src/analysis/index.js';
import { ConfigLoader } from '../../src/config/index.js';

function pages(count: number): SitemapUrl[] {
  return Array.from({ length: count }, (_, i) => ({ loc: `https://example.com/p/${i + 1}` }));
}

function fieldOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.field;
    throw error;
  }
  return undefined;
}

describe('buildSitemap', () => {
  it('should emit a urlset with every optional field', () => {
    const xml = buildSitemap([
      { loc: 'https://example.com/', lastmod: '2024-05-01', changefreq: 'weekly', priority: 0.8 },
    ]);

    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
    expect(xml).toContain(`<urlset xmlns="${SITEMAP_NAMESPACE}">`);
    expect(xml).toContain('<loc>https://example.com/</loc>');
    expect(xml).toContain('<lastmod>2024-05-01</lastmod>');
    expect(xml).toContain('<changefreq>weekly</changefreq>');
    expect(xml).toContain('<priority>0.8</priority>');
  });

  it('should format dates and priorities', () => {
    const xml = buildSitemap([
      { loc: 'https://example.com/a', lastmod: new Date('2024-05-01T10:00:00Z'), priority: 1 },
    ]);

    expect(xml).toContain('<lastmod>2024-05-01T10:00:00.000Z</lastmod>');
    expect(xml).toContain('<priority>1.0</priority>');
    expect(xml).not.toContain('<changefreq>');
  });

  it('should escape special characters in URLs', () => {
    const xml = buildSitemap([{ loc: 'https://example.com/?a=1&b=2' }]);
    expect(xml).toContain('<loc>https://example.com/?a=1&amp;b=2</loc>');
  });

  it('should reject invalid entries by path', () => {
    expect(fieldOf(() => buildSitemap([{ loc: 'ftp://example.com/file' }]))).toBe('0.loc');
    expect(fieldOf(() => buildSitemap([{ loc: 'https://example.com/', priority: 1.5 }]))).toBe('0.priority');
    expect(fieldOf(() => buildSitemap([{ loc: 'https://example.com/', lastmod: 'yesterday' }]))).toBe('0.lastmod');
  });

  it('should refuse more than 50,000 URLs in one file', () => {
    expect(fieldOf(() => buildSitemap(pages(50_001)))).toBe('urls');
  });
});

describe('buildSitemapIndex', () => {
  it('should list child sitemaps', () => {
    const xml = buildSitemapIndex([
      { loc: 'https://example.com/sitemap-1.xml', lastmod: '2024-05-01' },
    ]);

    expect(xml).toContain(`<sitemapindex xmlns="${SITEMAP_NAMESPACE}">`);
    expect(xml).toContain('<loc>https://example.com/sitemap-1.xml</loc>');
    expect(xml).toContain('<lastmod>2024-05-01</lastmod>');
  });
});

describe('buildSitemaps', () => {
  it('should emit a single file when everything fits', () => {
    const set = buildSitemaps(pages(3), { baseUrl: 'https://example.com' });

    expect(set.index).toBeNull();
    expect(set.sitemaps).toHaveLength(1);
    expect(set.sitemaps[0].filename).toBe('sitemap.xml');
    expect(set.sitemaps[0].urlCount).toBe(3);
  });

  it('should split into numbered files tied together by an index', () => {
    const set = buildSitemaps(pages(5), {
      baseUrl: 'https://example.com/sitemaps/',
      maxUrlsPerFile: 2,
      lastmod: '2024-05-01',
    });

    expect(set.sitemaps.map(file => [file.filename, file.urlCount])).toEqual([
      ['sitemap-1.xml', 2],
      ['sitemap-2.xml', 2],
      ['sitemap-3.xml', 1],
    ]);
    expect(set.sitemaps[2].xml).toContain('<loc>https://example.com/p/5</loc>');
    expect(set.sitemaps[2].xml).not.toContain('<loc>https://example.com/p/4</loc>');

    expect(set.index?.filename).toBe('sitemap.xml');
    expect(set.index?.urlCount).toBe(3);
    expect(set.index?.xml).toContain('<loc>https://example.com/sitemaps/sitemap-3.xml</loc>');
    expect(set.index?.xml).toContain('<lastmod>2024-05-01</lastmod>');
  });

  it('should take the per-file limit from configuration', () => {
    const config = ConfigLoader.parse({ sitemap: { maxUrlsPerFile: 2 } });
    const set = buildSitemaps(pages(3), { baseUrl: 'https://example.com' }, config);

    expect(set.sitemaps).toHaveLength(2);
    expect(set.index?.xml).toContain('<loc>https://example.com/sitemap-2.xml</loc>');
  });

  it('should reject a non-positive per-file limit', () => {
    expect(fieldOf(() => buildSitemaps(pages(1), { baseUrl: 'https://example.com', maxUrlsPerFile: 0 }))).toBe('maxUrlsPerFile');
  });
});
