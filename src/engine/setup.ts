import { createBrowserFetcher } from '../scrapers/browser';
import { loadFixtureFetcher } from '../scrapers/fixture';
import { PORTALS, type PortalKey } from '../scrapers';
import type { PageFetcher } from '../scrapers/types';
import type { AppConfig } from '../utils/config';
import type { Logger } from '../utils/logger';
import { FileCheckpointStore, type CheckpointStore } from './checkpoint';
import { CollectionEngine, type EngineProgress } from './collector';
import { errorMessage } from './errors';

export type RunOptions = {
  portal?: PortalKey;
  fixture?: string | null;
  maxPages?: number;
  targetCount?: number | null;
  emptyPageLimit?: number;
  headless?: boolean;
  neighborhoods?: string[];
};

export type RunDeps = {
  logger: Logger;
  onProgress?: (p: EngineProgress) => void;
  fetcher?: PageFetcher;
};

export type RunSetup = {
  engine: CollectionEngine;
  fetcher: PageFetcher;
  store: FileCheckpointStore;
  portal: PortalKey;
};

/** Monta fetcher, checkpoint e motor a partir da configuração e das opções da execução. */
export async function setupRun(config: AppConfig, opts: RunOptions, deps: RunDeps): Promise<RunSetup> {
  const portal = opts.portal ?? config.portal;
  const profile = PORTALS[portal];
  const extractProfile = {
    portal: profile.portal,
    locationFormat: profile.locationFormat,
    defaults: { ...profile.defaults, ...config.defaults },
  };

  let fetcher: PageFetcher;
  if (deps.fetcher) fetcher = deps.fetcher;
  else if (opts.fixture) fetcher = await loadFixtureFetcher(opts.fixture, { profile: extractProfile });
  else {
    fetcher = createBrowserFetcher(profile, {
      searchUrl: config.searchUrl,
      headless: opts.headless ?? config.headless,
      navTimeoutMs: config.navTimeoutMs,
      pageDelayMs: config.pageDelayMs,
      channel: config.browserChannel,
      executablePath: config.browserPath,
      proxy: config.proxy,
      defaults: config.defaults,
      logger: deps.logger,
    });
  }

  // replays não disputam o checkpoint da coleta real
  const key = opts.fixture ? `${portal}-fixture` : portal;
  const store = new FileCheckpointStore({ dir: config.checkpointDir, key, logger: deps.logger });
  const targetCount = opts.targetCount !== undefined ? opts.targetCount : config.targetCount;

  const engine = new CollectionEngine({
    fetcher,
    store,
    maxRetries: config.maxRetries,
    retryBaseMs: config.retryBaseMs,
    retryMaxMs: config.retryMaxMs,
    emptyPageLimit: opts.emptyPageLimit ?? config.emptyPageLimit,
    targetCount: targetCount ?? undefined,
    maxPages: opts.maxPages ?? config.maxPages,
    neighborhoods: opts.neighborhoods ?? config.neighborhoods,
    allowHashIds: config.allowHashIds,
    logger: deps.logger,
    onProgress: deps.onProgress,
  });
  return { engine, fetcher, store, portal };
}

/** Arquiva o checkpoint atual como `reset`, para a próxima coleta começar do zero. */
export async function resetCheckpoint(store: CheckpointStore, logger: Logger): Promise<string | null> {
  const sessionId = await store.load().then(
    s => s?.session_id,
    (e: unknown) => {
      logger.warn({ err: errorMessage(e) }, 'Checkpoint ilegível, arquivando assim mesmo');
      return undefined;
    },
  );
  const archived = await store.archive('reset', sessionId);
  if (archived) logger.info({ archived }, 'Checkpoint anterior arquivado');
  return archived;
}
