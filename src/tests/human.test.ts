import { describe, expect, it, vi } from 'vitest';
import { openBrowser } from '../agent/human';

const launch = vi.hoisted(() =>
  vi.fn(async () => ({
    newContext: async () => ({ setDefaultNavigationTimeout: () => {} }),
  })),
);

vi.mock('playwright-core', () => ({ chromium: { launch } }));

describe('openBrowser', () => {
  it('deixa SIGINT, SIGTERM e SIGHUP com o processo', async () => {
    await openBrowser({ headless: true, navTimeoutMs: 1000, proxy: 'http://proxy.local:3128' });
    expect(launch).toHaveBeenCalledWith(
      expect.objectContaining({
        headless: true,
        proxy: { server: 'http://proxy.local:3128' },
        handleSIGINT: false,
        handleSIGTERM: false,
        handleSIGHUP: false,
      }),
    );
  });
});
