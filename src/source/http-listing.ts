/**
 * Helpers for the Argo artifact file server.
 *
 * A file comes back as a download with a Content-Disposition header; a
 * directory comes back as a bare HTML index of links.
 */

const ANCHOR_HREF = /<a\s[^>]*?href\s*=\s*(?:"([^"]*)"|'([^']*)')/gi;
const HAS_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

/** A child of a directory index. `name` is decoded and never contains a path step. */
export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

/**
 * Children of an HTML directory index, in document order. Links that leave
 * the directory (parent, self, absolute paths, other schemes, fragments)
 * are dropped.
 */
export function parseDirectoryListing(html: string): DirectoryEntry[] {
  const entries: DirectoryEntry[] = [];
  for (const match of html.matchAll(ANCHOR_HREF)) {
    const href = (match[1] ?? match[2] ?? '').trim();
    if (href === '' || HAS_SCHEME.test(href) || /^[/?#]/.test(href)) continue;

    const isDirectory = href.endsWith('/');
    const name = safeDecode(href.replace(/\/+$/, ''));
    if (name === '' || name === '.' || name === '..' || name.includes('/')) continue;
    entries.push({ name, isDirectory });
  }
  return entries;
}

/** File name announced by a Content-Disposition header, if any. */
export function parseDispositionFileName(header: string): string | undefined {
  const extended = /filename\*\s*=\s*(?:UTF-8'')?([^;]+)/i.exec(header);
  if (extended) {
    return safeDecode(extended[1].trim().replace(/^"|"$/g, ''));
  }
  const plain = /filename\s*=\s*(?:"([^"]*)"|([^;]+))/i.exec(header);
  const value = plain?.[1] ?? plain?.[2]?.trim();
  return value ? value : undefined;
}

/** Content-Length as a number, or undefined when absent or malformed. */
export function parseContentLength(header: string | null): number | undefined {
  if (header === null || header.trim() === '') return undefined;
  const parsed = Number(header);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

export function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}
