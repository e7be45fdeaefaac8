import { writeFile } from 'node:fs/promises';
import type { Cookie } from 'playwright';

export type JarCookie = Pick<Cookie, 'name' | 'value' | 'domain' | 'path' | 'expires' | 'secure'>;

const ONE_YEAR_SECONDS = 31_536_000;

const HEADER = [
  '# Netscape HTTP Cookie File',
  '# https://curl.haxx.se/rfc/cookie_spec.html',
  '# This is a generated file! Do not edit.',
  '',
];

/**
 * Serialize browser cookies to the Netscape format yt-dlp reads.
 *
 * Domains always get a leading dot so the cookie also applies to subdomains
 * (the CDN and player hosts). Session cookies (`expires` <= 0) would be dropped
 * by the reader, so they are given an expiry one year from `now`.
 */
export function serializeNetscapeCookies(cookies: readonly JarCookie[], now: number = Date.now()): string {
  const lines = [...HEADER];
  const fallbackExpiry = Math.floor(now / 1000) + ONE_YEAR_SECONDS;

  for (const cookie of cookies) {
    const domain = cookie.domain.startsWith('.') ? cookie.domain : `.${cookie.domain}`;
    const includeSubdomains = domain.startsWith('.') ? 'TRUE' : 'FALSE';
    const expiry = cookie.expires > 0 ? Math.floor(cookie.expires) : fallbackExpiry;

    lines.push(
      [
        domain,
        includeSubdomains,
        cookie.path || '/',
        cookie.secure ? 'TRUE' : 'FALSE',
        String(expiry),
        cookie.name,
        cookie.value,
      ].join('\t'),
    );
  }

  return `${lines.join('\n')}\n`;
}

export async function writeNetscapeCookies(path: string, cookies: readonly JarCookie[]): Promise<void> {
  await writeFile(path, serializeNetscapeCookies(cookies), 'utf-8');
}
