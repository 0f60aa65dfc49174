/**
 * Content Analysis - HTML helpers
 */

export interface HeadingCounts {
  h1: number;
  h2: number;
  h3: number;
  h4: number;
  h5: number;
  h6: number;
}

const TAG_PATTERN = /<\/?[a-z][^>]*>/i;

export function looksLikeHtml(content: string): boolean {
  return TAG_PATTERN.test(content);
}

/**
 * Visible text of an HTML fragment, whitespace collapsed.
 */
export function stripHtml(html: string): string {
  return html
    .replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '')
    .replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '')
    .replace(/<!--[\s\S]*?-->/g, '')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/\s+/g, ' ')
    .trim();
}

export function countHeadings(html: string): HeadingCounts {
  const counts: HeadingCounts = { h1: 0, h2: 0, h3: 0, h4: 0, h5: 0, h6: 0 };
  const headingRegex = /<h([1-6])\b[^>]*>/gi;

  let match;
  while ((match = headingRegex.exec(html)) !== null) {
    switch (match[1]) {
      case '1': counts.h1++; break;
      case '2': counts.h2++; break;
      case '3': counts.h3++; break;
      case '4': counts.h4++; break;
      case '5': counts.h5++; break;
      case '6': counts.h6++; break;
    }
  }

  return counts;
}
