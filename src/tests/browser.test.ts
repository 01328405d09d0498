import { errors } from 'playwright-core';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { FetchError } from '../engine/errors';
import { createBrowserFetcher } from '../scrapers/browser';
import type { PortalProfile } from '../scrapers/types';
import { ZapProfile } from '../scrapers/zap';

const fake = vi.hoisted(() => {
  const state: { status: number; hasCards: boolean; html: string; gotoError: Error | null; launchError: Error | null } = {
    status: 200,
    hasCards: true,
    html: '<html></html>',
    gotoError: null,
    launchError: null,
  };
  const page = {
    goto: async () => {
      if (state.gotoError) throw state.gotoError;
      return { status: () => state.status };
    },
    locator: () => ({
      first: () => ({
        waitFor: async () => {
          if (!state.hasCards) throw new Error('nenhum card');
        },
      }),
    }),
    content: async () => state.html,
  };
  const context = { newPage: async () => page, close: async () => {} };
  const browser = { close: async () => {} };
  return { state, context, browser };
});

vi.mock('../agent/human', () => ({
  openBrowser: vi.fn(async () => {
    if (fake.state.launchError) throw fake.state.launchError;
    return { browser: fake.browser, context: fake.context };
  }),
  humanDelay: async () => {},
  scrollIncremental: async () => {},
  tryClosePopups: async () => {},
}));

const profile: PortalProfile = {
  ...ZapProfile,
  collectRecords: async () => [{ fields: { id: 'z1', price: 'R$ 1.000' } }],
};

function fetcher() {
  return createBrowserFetcher(profile, { headless: true, navTimeoutMs: 1000, pageDelayMs: { min: 0, max: 0 } });
}

async function failureKind(promise: Promise<unknown>) {
  const e = await promise.then(
    () => null,
    (err: unknown) => err,
  );
  if (!(e instanceof FetchError)) throw new Error(`esperava FetchError, veio ${String(e)}`);
  return e.kind;
}

describe('createBrowserFetcher', () => {
  beforeEach(() => {
    Object.assign(fake.state, { status: 200, hasCards: true, html: '<html></html>', gotoError: null, launchError: null });
  });

  it('devolve os cards da página', async () => {
    expect(await fetcher().fetch(1)).toEqual([{ fields: { id: 'z1', price: 'R$ 1.000' } }]);
  });

  it('HTTP 401 é permanente', async () => {
    fake.state.status = 401;
    expect(await failureKind(fetcher().fetch(1))).toBe('permanent');
  });

  it('HTTP 403 vira permanente no terceiro seguido', async () => {
    fake.state.status = 403;
    const f = fetcher();
    expect(await failureKind(f.fetch(1))).toBe('transient');
    expect(await failureKind(f.fetch(1))).toBe('transient');
    expect(await failureKind(f.fetch(1))).toBe('permanent');
  });

  it('resposta sem 403 zera a contagem de bloqueios', async () => {
    const f = fetcher();
    fake.state.status = 403;
    expect(await failureKind(f.fetch(1))).toBe('transient');
    expect(await failureKind(f.fetch(1))).toBe('transient');
    fake.state.status = 200;
    expect(await f.fetch(1)).toHaveLength(1);
    fake.state.status = 403;
    expect(await failureKind(f.fetch(2))).toBe('transient');
    expect(await failureKind(f.fetch(2))).toBe('transient');
  });

  it.each([429, 500, 503])('HTTP %i é temporário', async status => {
    fake.state.status = status;
    expect(await failureKind(fetcher().fetch(1))).toBe('transient');
  });

  it('timeout de navegação é temporário', async () => {
    fake.state.gotoError = new errors.TimeoutError('Timeout 1000ms exceeded');
    expect(await failureKind(fetcher().fetch(1))).toBe('transient');
  });

  it('captcha sem cards é temporário', async () => {
    fake.state.hasCards = false;
    fake.state.html = '<div class="g-recaptcha">Não sou um robô</div>';
    expect(await failureKind(fetcher().fetch(1))).toBe('transient');
  });

  it('página sem cards e sem captcha devolve lista vazia', async () => {
    fake.state.hasCards = false;
    expect(await fetcher().fetch(1)).toEqual([]);
  });

  it('falha ao abrir o navegador é permanente', async () => {
    fake.state.launchError = new Error('Executable doesn\'t exist');
    expect(await failureKind(fetcher().fetch(1))).toBe('permanent');
  });
});
