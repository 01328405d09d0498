import { errors, type Browser, type BrowserContext, type Page } from 'playwright-core';
import { humanDelay, openBrowser, scrollIncremental, tryClosePopups } from '../agent/human';
import { errorMessage, FetchError } from '../engine/errors';
import { silentLogger, type Logger } from '../utils/logger';
import type { PageFetcher, PortalProfile, RawRecord } from './types';

export type BrowserFetcherOptions = {
  searchUrl?: string | null;
  headless: boolean;
  navTimeoutMs: number;
  cardTimeoutMs?: number;
  pageDelayMs: { min: number; max: number };
  channel?: string | null;
  executablePath?: string | null;
  proxy?: string | null;
  defaults?: { city?: string; state?: string };
  /** 403 seguidos antes de tratar o bloqueio como permanente. */
  blockedLimit?: number;
  logger?: Logger;
};

const WALL = /captcha|recaptcha|verify you are a human|n[ãa]o sou um rob[ôo]/i;

/**
 * Uma sessão de navegador por coleta, aberta na primeira página e reaproveitada.
 * O ritmo entre páginas (espera aleatória, rolagem) é política daqui, não do motor.
 */
export function createBrowserFetcher(profile: PortalProfile, opts: BrowserFetcherOptions): PageFetcher {
  const logger = opts.logger ?? silentLogger;
  const searchUrl = opts.searchUrl || profile.defaultSearchUrl;
  const blockedLimit = opts.blockedLimit ?? 3;
  let session: { browser: Browser; context: BrowserContext; page: Page } | null = null;
  let fetched = 0;
  let blockedStreak = 0;

  async function currentPage(): Promise<Page> {
    if (session) return session.page;
    try {
      const { browser, context } = await openBrowser({
        headless: opts.headless,
        navTimeoutMs: opts.navTimeoutMs,
        channel: opts.channel,
        executablePath: opts.executablePath,
        proxy: opts.proxy,
        logger,
      });
      const page = await context.newPage();
      session = { browser, context, page };
      return page;
    } catch (e) {
      throw FetchError.permanent(`Navegador não abriu: ${errorMessage(e)}`, { cause: e });
    }
  }

  return {
    portal: profile.portal,
    profile: {
      portal: profile.portal,
      locationFormat: profile.locationFormat,
      defaults: { ...profile.defaults, ...opts.defaults },
    },

    async fetch(pageIndex: number): Promise<RawRecord[]> {
      if (fetched++ > 0) await humanDelay(opts.pageDelayMs.min, opts.pageDelayMs.max);
      const page = await currentPage();
      const url = profile.pageUrl(searchUrl, pageIndex);
      logger.info({ page: pageIndex, url }, `Acessando página ${pageIndex}`);

      const response = await page.goto(url, { waitUntil: 'domcontentloaded' }).catch((e: unknown) => {
        const kind = e instanceof errors.TimeoutError ? 'timeout' : 'erro de navegação';
        throw FetchError.transient(`${kind}: ${errorMessage(e)}`, { pageIndex, cause: e });
      });

      const status = response ? response.status() : 0;
      if (status === 401) throw FetchError.permanent('HTTP 401: acesso não autorizado', { pageIndex });
      if (status === 403) {
        blockedStreak++;
        const kind = blockedStreak >= blockedLimit ? 'permanent' : 'transient';
        throw new FetchError(kind, `HTTP 403: bloqueado (${blockedStreak}x seguidas)`, { pageIndex });
      }
      blockedStreak = 0;
      if (status === 429 || status >= 500) throw FetchError.transient(`HTTP ${status}`, { pageIndex });

      await tryClosePopups(page, logger);
      const hasCards = await page
        .locator(profile.selectors.card)
        .first()
        .waitFor({ timeout: opts.cardTimeoutMs ?? 10000 })
        .then(() => true, () => false);
      if (!hasCards) {
        if (WALL.test(await page.content())) {
          throw FetchError.transient('Captcha/bloqueio detectado', { pageIndex });
        }
        logger.warn({ page: pageIndex }, `Página ${pageIndex} sem cards`);
        return [];
      }

      await scrollIncremental(page, 3);
      const records = await profile.collectRecords(page);
      logger.info({ page: pageIndex, cards: records.length }, `Página ${pageIndex}: ${records.length} cards encontrados`);
      return records;
    },

    async close() {
      if (!session) return;
      const { context, browser } = session;
      session = null;
      await context.close();
      await browser.close();
    },
  };
}
