/**
 * Website Email Extraction
 *
 * Finds a contact address on an organisation's home page. This is a
 * best-effort supplement: any failure yields an empty string.
 *
 * @module enrichment/email-extractor
 */

import { TIMEOUTS } from '../config/index.js';
import { describeError } from '../places/client.js';
import { silentLogger, type Logger } from '../logger.js';

/** Sent with scrape requests; some sites reject unknown agents */
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

/** Address fragments that never reach a person */
export const EXCLUDED_EMAIL_PATTERNS = [
  'noreply@',
  'no-reply@',
  'donotreply@',
  'support@google',
  'webmaster@',
  'admin@',
  'postmaster@',
] as const;

const MAILTO_PATTERN = /mailto:([a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,})/g;
const BARE_EMAIL_PATTERN = /\b[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}\b/g;

/** Retina asset names such as `logo@2x.png` look like addresses */
const IMAGE_SUFFIX = /\.(png|jpe?g|gif|svg|webp|bmp|ico)$/;

export interface ExtractOptions {
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Whether an address is worth returning.
 */
export function isUsableEmail(email: string): boolean {
  const lower = email.toLowerCase();
  if (IMAGE_SUFFIX.test(lower)) {
    return false;
  }
  return !EXCLUDED_EMAIL_PATTERNS.some((pattern) => lower.includes(pattern));
}

/**
 * Pick a contact address out of an HTML page.
 *
 * `mailto:` links are preferred over addresses found in the page text. The
 * page is lowercased first, so the result is always lowercase.
 *
 * @returns The address, or an empty string
 *
 * @example
 * ```typescript
 * extractEmailFromHtml('<a href="mailto:Info@Pantry.org">Email us</a>'); // 'info@pantry.org'
 * ```
 */
export function extractEmailFromHtml(html: string): string {
  const content = html.toLowerCase();

  for (const match of content.matchAll(MAILTO_PATTERN)) {
    const email = match[1];
    if (email && isUsableEmail(email)) {
      return email;
    }
  }

  for (const match of content.matchAll(BARE_EMAIL_PATTERN)) {
    if (isUsableEmail(match[0])) {
      return match[0];
    }
  }

  return '';
}

/**
 * Fetch a website and extract a contact address from it.
 *
 * Only http(s) URLs are fetched. Network errors, timeouts and non-2xx
 * responses are logged at debug level and yield an empty string.
 */
export async function extractEmailFromWebsite(url: string, options: ExtractOptions = {}): Promise<string> {
  const logger = options.logger ?? silentLogger;
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.scrape;

  if (!/^https?:\/\//i.test(url)) {
    return '';
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      headers: { 'User-Agent': BROWSER_USER_AGENT },
      signal: controller.signal,
    });

    if (!response.ok) {
      logger.debug(`Email scrape of ${url} returned HTTP ${response.status}`);
      return '';
    }

    return extractEmailFromHtml(await response.text());
  } catch (error) {
    const reason = error instanceof Error && error.name === 'AbortError' ? `timed out after ${timeoutMs}ms` : describeError(error);
    logger.debug(`Email scrape of ${url} failed: ${reason}`);
    return '';
  } finally {
    clearTimeout(timeoutId);
  }
}
