import { describe, expect, it, vi } from 'vitest';
import { cli } from './app.js';
import { main } from './index.js';

const { mockRun } = vi.hoisted(() => ({
  mockRun: vi.fn(async () => {}),
}));

vi.mock('cmd-ts', async (importOriginal) => ({
  ...(await importOriginal<typeof import('cmd-ts')>()),
  run: mockRun,
}));

describe('main', () => {
  it('should run the CLI with the provided arguments', async () => {
    await main(['--start', '1', '--end', '3', '--headless']);

    expect(mockRun).toHaveBeenCalledWith(cli, ['--start', '1', '--end', '3', '--headless']);
  });
});
