export interface Truncated {
  value: string;
  truncated: boolean;
}

export const ELLIPSIS = '…';

/**
 * Collapse whitespace and cut to `max` code points, the last one being an
 * ellipsis when anything was removed.
 */
export function truncate(text: string, max: number): Truncated {
  const chars = Array.from(text.replace(/\s+/g, ' ').trim());
  if (chars.length <= max) {
    return { value: chars.join(''), truncated: false };
  }
  const cut = chars.slice(0, Math.max(0, max - 1)).join('').trimEnd();
  return { value: `${cut}${ELLIPSIS}`, truncated: true };
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}
