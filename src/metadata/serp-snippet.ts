/**
 * Metadata - SERP Snippet Preview
 */

import type { AnalysisConfig } from '../config/schema.js';
import { DEFAULT_CONFIG } from '../config/schema.js';
import { ValidationError } from '../analysis/errors.js';
import { truncate } from './text.js';

export interface SerpSnippetInput {
  title: string;
  description: string;
  url: string;
}

export interface SerpSnippet {
  title: string;
  description: string;
  /** Host and path segments as a result page shows them, e.g. "example.com › shoes › red" */
  displayUrl: string;
  url: string;
  titleTruncated: boolean;
  descriptionTruncated: boolean;
}

const BREADCRUMB_SEPARATOR = ' › ';

export function buildSerpSnippet(input: SerpSnippetInput, config: AnalysisConfig = DEFAULT_CONFIG): SerpSnippet {
  let parsed: URL;
  try {
    parsed = new URL(input.url);
  } catch {
    throw new ValidationError('SERP snippet input', [{ path: 'url', message: 'Invalid url' }]);
  }

  const title = truncate(input.title, config.limits.snippetTitleMaxLength);
  const description = truncate(input.description, config.limits.snippetDescriptionMaxLength);

  return {
    title: title.value,
    description: description.value,
    displayUrl: formatDisplayUrl(parsed),
    url: parsed.href,
    titleTruncated: title.truncated,
    descriptionTruncated: description.truncated,
  };
}

export function formatDisplayUrl(url: URL): string {
  const segments = url.pathname.split('/').filter(segment => segment.length > 0);
  return [url.hostname, ...segments].join(BREADCRUMB_SEPARATOR);
}
