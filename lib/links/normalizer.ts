/**
 * URL Normalizer
 *
 * Turns free chat text into the list of distinct absolute URLs it mentions.
 * Invalid candidates are dropped silently: absence from the output is the
 * only signal.
 */

import { z } from 'zod';

/**
 * Structured link span attached to a chat message
 */
export interface LinkAnnotation {
  type: 'url' | 'text_link';
  /** Offset in UTF-16 code units */
  offset: number;
  length: number;
  /** Target of a text_link */
  url?: string;
}

const URL_PATTERN = /https?:\/\/[^\s]+/gi;
const SCHEME_PATTERN = /^https?:\/\//i;
const LEADING_PUNCTUATION = /^[(<"'[{]+/;
const TRAILING_PUNCTUATION = '.,;:!?)>"\']}';

const IPV4_HOST = /^(?:(?:25[0-5]|2[0-4]\d|1?\d?\d)\.){3}(?:25[0-5]|2[0-4]\d|1?\d?\d)$/;
const HOST_LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;
const TOP_LEVEL_LABEL = /^(?:[a-z]{2,63}|xn--[a-z0-9-]{1,59})$/;

function isValidHostname(hostname: string): boolean {
  if (IPV4_HOST.test(hostname)) return true;
  if (hostname.startsWith('[') && hostname.endsWith(']')) return true;
  if (hostname.length > 253) return false;

  const labels = hostname.split('.');
  if (labels.length < 2) return false;

  const tld = labels[labels.length - 1];
  return TOP_LEVEL_LABEL.test(tld) && labels.every((label) => HOST_LABEL.test(label));
}

/**
 * Strict absolute URL: http(s) with a real-looking host. Userinfo is kept
 * as-is (`https://brand.example@evil.example/`).
 * Output is the WHATWG serialization, so equal URLs compare equal.
 */
export const absoluteUrlSchema = z.string().transform((value, ctx) => {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.invalid_string, validation: 'url', message: 'Invalid URL' });
    return z.NEVER;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'URL must use http or https' });
    return z.NEVER;
  }
  if (!isValidHostname(url.hostname)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'URL host is not a valid domain or IP address' });
    return z.NEVER;
  }

  return url.href;
});

function count(value: string, char: string): number {
  return value.split(char).length - 1;
}

/**
 * Drop trailing punctuation. A `]` stays while it closes an opening `[`,
 * as in a bracketed IPv6 host.
 */
function trimTrailing(candidate: string): string {
  let end = candidate.length;
  while (end > 0) {
    const char = candidate[end - 1];
    if (!TRAILING_PUNCTUATION.includes(char)) break;
    if (char === ']') {
      const head = candidate.slice(0, end);
      if (count(head, '[') >= count(head, ']')) break;
    }
    end--;
  }
  return candidate.slice(0, end);
}

/**
 * Clean and validate one candidate; null when it is not a usable URL
 */
export function normalizeCandidate(raw: string): string | null {
  let candidate = raw.trim().replace(/\[\.\]/g, '.');
  candidate = trimTrailing(candidate.replace(LEADING_PUNCTUATION, ''));

  if (!candidate) return null;

  if (!SCHEME_PATTERN.test(candidate)) {
    candidate = `http://${candidate}`;
  }

  const result = absoluteUrlSchema.safeParse(candidate);
  return result.success ? result.data : null;
}

/**
 * Raw candidates from annotations and the fallback pattern scan,
 * in order of their position in the text
 */
export function extractCandidates(text: string, links: LinkAnnotation[] = []): string[] {
  const found: Array<{ position: number; value: string }> = [];

  for (const link of links) {
    if (link.type === 'text_link') {
      if (link.url) found.push({ position: link.offset, value: link.url });
      continue;
    }
    const value = text.slice(link.offset, link.offset + link.length);
    if (value) found.push({ position: link.offset, value });
  }

  for (const match of text.matchAll(URL_PATTERN)) {
    found.push({ position: match.index ?? 0, value: match[0] });
  }

  return found.sort((a, b) => a.position - b.position).map((c) => c.value);
}

/**
 * Distinct valid URLs in first-seen order
 */
export function normalize(text: string, links: LinkAnnotation[] = []): string[] {
  const urls = new Set<string>();

  for (const candidate of extractCandidates(text, links)) {
    const url = normalizeCandidate(candidate);
    if (url) urls.add(url);
  }

  return [...urls];
}

/**
 * Lowercase host of a URL, or null when it does not parse
 */
export function extractDomain(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}
