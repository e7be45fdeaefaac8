import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { formatZodError } from '../config/config-schema.js';
import { errorMessage } from '../errors/custom-errors.js';

/**
 * Browser cookie as saved between runs
 */
export const StoredCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string(),
  expires: z.number(),
  httpOnly: z.boolean(),
  secure: z.boolean(),
  sameSite: z.enum(['Strict', 'Lax', 'None']),
});

export type StoredCookie = z.infer<typeof StoredCookieSchema>;

export type StoredCookiesResult =
  | { status: 'loaded'; cookies: StoredCookie[] }
  | { status: 'missing' }
  | { status: 'invalid'; reason: string };

/**
 * Read cookies saved by an earlier run
 */
export async function readStoredCookies(path: string): Promise<StoredCookiesResult> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { status: 'missing' };
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return { status: 'invalid', reason: errorMessage(error) };
  }

  const result = z.array(StoredCookieSchema).safeParse(parsed);
  if (!result.success) {
    return { status: 'invalid', reason: formatZodError(result.error) };
  }
  return { status: 'loaded', cookies: result.data };
}

export async function writeStoredCookies(path: string, cookies: readonly StoredCookie[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, `${JSON.stringify(cookies, null, 2)}\n`, 'utf-8');
}
