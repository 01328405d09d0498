import { z } from 'zod';
import type { CollectionEngine, RunSummary } from '../engine/collector';
import { errorMessage } from '../engine/errors';
import { resetCheckpoint, setupRun } from '../engine/setup';
import type { Listing } from '../schemas/listing';
import { PORTAL_KEYS } from '../scrapers';
import type { PageFetcher } from '../scrapers/types';
import type { AppConfig } from '../utils/config';
import type { Logger } from '../utils/logger';
import { ProgressStore } from '../utils/progress';

export const RunBodySchema = z.object({
  portal: z.enum(PORTAL_KEYS).optional(),
  maxPages: z.number().int().positive().optional(),
  targetCount: z.number().int().positive().nullable().optional(),
  emptyPageLimit: z.number().int().positive().optional(),
  neighborhoods: z.array(z.string().min(1)).optional(),
  headless: z.boolean().optional(),
  reset: z.boolean().optional(),
});

export type RunBody = z.infer<typeof RunBodySchema>;

export type ManagerDeps = {
  config: AppConfig;
  logger: Logger;
  progress?: ProgressStore;
  /** Substitui o navegador (testes, replays). */
  fetcherFactory?: (body: RunBody) => PageFetcher;
};

/** Uma coleta por vez, disparada pelo painel HTTP. */
export class RunManager {
  readonly progress: ProgressStore;
  private engine: CollectionEngine | null = null;
  private portal: string | null = null;
  private running = false;
  private lastSummary: RunSummary | null = null;

  constructor(private deps: ManagerDeps) {
    this.progress = deps.progress ?? new ProgressStore();
  }

  getData(): Listing[] { return this.engine?.getResults() ?? []; }
  getPortal() { return this.portal; }
  getSummary() { return this.lastSummary; }
  isRunning() { return this.running; }

  requestStop(): boolean {
    if (!this.engine || !this.running) return false;
    this.engine.requestStop();
    return true;
  }

  async run(body: RunBody): Promise<RunSummary> {
    if (this.running) throw new Error('Coleta já em execução');
    this.running = true;
    const { config, logger } = this.deps;
    try {
      const setup = await setupRun(
        config,
        {
          portal: body.portal,
          maxPages: body.maxPages,
          targetCount: body.targetCount,
          emptyPageLimit: body.emptyPageLimit,
          neighborhoods: body.neighborhoods,
          headless: body.headless,
        },
        {
          logger,
          onProgress: p => this.progress.track(p),
          fetcher: this.deps.fetcherFactory?.(body),
        },
      );
      this.engine = setup.engine;
      this.portal = setup.portal;
      this.progress.reset();
      this.progress.set({
        running: true,
        status: 'running',
        portal: setup.portal,
        maxPages: body.maxPages ?? config.maxPages,
        targetCount: body.targetCount ?? config.targetCount,
      });
      logger.info({ body }, `Iniciando coleta: ${setup.portal}`);

      if (body.reset) await resetCheckpoint(setup.store, logger);
      try {
        this.lastSummary = await setup.engine.run();
      } finally {
        await setup.fetcher.close().catch((e: unknown) => logger.warn({ err: errorMessage(e) }, 'Falha ao fechar navegador'));
      }
      this.progress.set({ running: false, summary: this.lastSummary });
      return this.lastSummary;
    } finally {
      this.running = false;
    }
  }
}
