import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { createOutputDir, removeOutputDir } from '../test-helpers.js';
import { type JarCookie, serializeNetscapeCookies, writeNetscapeCookies } from './netscape-cookies.js';

const NOW = Date.UTC(2025, 0, 1);

const cookie = (overrides: Partial<JarCookie>): JarCookie => ({
  name: 'session_id',
  value: 'test-session',
  domain: 'learn.example.test',
  path: '/',
  expires: 1_800_000_000,
  secure: true,
  ...overrides,
});

describe('serializeNetscapeCookies', () => {
  it('should write the header followed by one tab separated line per cookie', () => {
    const output = serializeNetscapeCookies([cookie({})], NOW);

    expect(output.split('\n')).toEqual([
      '# Netscape HTTP Cookie File',
      '# https://curl.haxx.se/rfc/cookie_spec.html',
      '# This is a generated file! Do not edit.',
      '',
      '.learn.example.test\tTRUE\t/\tTRUE\t1800000000\tsession_id\ttest-session',
      '',
    ]);
  });

  it('should keep an existing leading dot on the domain', () => {
    const output = serializeNetscapeCookies([cookie({ domain: '.example.test', secure: false })], NOW);

    expect(output.split('\n')[4]).toBe('.example.test\tTRUE\t/\tFALSE\t1800000000\tsession_id\ttest-session');
  });

  it('should give session cookies an expiry one year ahead', () => {
    const output = serializeNetscapeCookies([cookie({ expires: -1 }), cookie({ name: 'csrf', expires: 0 })], NOW);
    const expiry = String(NOW / 1000 + 31_536_000);

    const lines = output.split('\n');
    expect(lines[4]?.split('\t')[4]).toBe(expiry);
    expect(lines[5]?.split('\t')[4]).toBe(expiry);
  });

  it('should truncate fractional expiry timestamps', () => {
    const output = serializeNetscapeCookies([cookie({ expires: 1_800_000_000.75, path: '' })], NOW);

    expect(output.split('\n')[4]).toBe('.learn.example.test\tTRUE\t/\tTRUE\t1800000000\tsession_id\ttest-session');
  });
});

describe('writeNetscapeCookies', () => {
  it('should write the jar to disk', async () => {
    const dir = await createOutputDir();
    try {
      const path = join(dir, 'cookies.txt');
      await writeNetscapeCookies(path, [cookie({})]);

      const content = await readFile(path, 'utf-8');
      expect(content.startsWith('# Netscape HTTP Cookie File\n')).toBe(true);
      expect(content).toContain('\tsession_id\ttest-session\n');
    } finally {
      await removeOutputDir(dir);
    }
  });
});
