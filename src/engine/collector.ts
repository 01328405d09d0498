import dayjs from 'dayjs';
import { extractListing } from '../extractors/listing';
import { emptyStats, type CollectionState, type Failure, type Listing } from '../schemas/listing';
import type { PageFetcher, RawRecord } from '../scrapers/types';
import { silentLogger, type Logger } from '../utils/logger';
import type { CheckpointStore } from './checkpoint';
import { errorMessage, FetchError, PersistenceError } from './errors';
import { DedupLedger } from './ledger';

export type EngineStatus = 'idle' | 'running' | 'completed' | 'failed' | 'paused';

export type EndReason =
  | 'empty_pages'
  | 'target_reached'
  | 'max_pages'
  | 'stopped'
  | 'fetch_failed'
  | 'persistence_failed'
  | 'unexpected_error';

export type EngineOptions = {
  fetcher: PageFetcher;
  store: CheckpointStore;
  maxRetries?: number;
  retryBaseMs?: number;
  retryMaxMs?: number;
  emptyPageLimit?: number;
  targetCount?: number;
  maxPages?: number;
  neighborhoods?: string[];
  allowHashIds?: boolean;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: (progress: EngineProgress) => void;
};

export type EngineProgress = {
  status: EngineStatus;
  sessionId: string | null;
  page: number;
  lastPageCompleted: number;
  collected: number;
  newThisRun: number;
  lastListing: Listing | null;
};

export type RunSummary = {
  status: Exclude<EngineStatus, 'idle' | 'running'>;
  reason: EndReason;
  sessionId: string | null;
  lastPageCompleted: number;
  pagesProcessed: number;
  pagesFailed: number;
  retries: number;
  listingsCollected: number;
  newListings: number;
  rejected: number;
  duplicates: number;
  failures: Failure[];
  archivedTo: string | null;
  error: string | null;
  startedAt: string;
  finishedAt: string;
};

function failureReason(e: unknown): EndReason {
  if (e instanceof FetchError) return 'fetch_failed';
  if (e instanceof PersistenceError) return 'persistence_failed';
  return 'unexpected_error';
}

const defaultSleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

/**
 * Percorre as páginas em ordem: busca → extrai → deduplica → acumula → checkpoint.
 * Uma página que admite ao menos um anúncio avança `last_page_completed`; páginas sem anúncio novo
 * contam para o limite de páginas vazias e são revisitadas numa retomada.
 */
export class CollectionEngine {
  private fetcher: PageFetcher;
  private store: CheckpointStore;
  private logger: Logger;
  private now: () => Date;
  private sleep: (ms: number) => Promise<void>;
  private limits: { maxRetries: number; retryBaseMs: number; retryMaxMs: number; emptyPageLimit: number; targetCount: number; maxPages: number };
  private opts: EngineOptions;

  private status: EngineStatus = 'idle';
  private stopRequested = false;
  private state: CollectionState | null = null;
  private newThisRun = 0;
  private lastListing: Listing | null = null;

  constructor(opts: EngineOptions) {
    this.opts = opts;
    this.fetcher = opts.fetcher;
    this.store = opts.store;
    this.logger = opts.logger ?? silentLogger;
    this.now = opts.now ?? (() => new Date());
    this.sleep = opts.sleep ?? defaultSleep;
    this.limits = {
      maxRetries: opts.maxRetries ?? 3,
      retryBaseMs: opts.retryBaseMs ?? 2000,
      retryMaxMs: opts.retryMaxMs ?? 30000,
      emptyPageLimit: Math.max(1, opts.emptyPageLimit ?? 3),
      targetCount: opts.targetCount ?? Infinity,
      maxPages: opts.maxPages ?? Infinity,
    };
  }

  getStatus() { return this.status; }
  getResults(): Listing[] { return this.state?.results ?? []; }
  isRunning() { return this.status === 'running'; }

  /**
   * Observado entre páginas; a página em andamento termina e é salva antes de pausar.
   * Um pedido feito antes de `run()` vale para a próxima execução.
   */
  requestStop() { this.stopRequested = true; }

  async run(): Promise<RunSummary> {
    if (this.status === 'running') throw new Error('Coleta já em execução');
    this.status = 'running';
    this.newThisRun = 0;
    this.lastListing = null;
    this.state = null;
    const startedAt = this.now();

    let state: CollectionState;
    try {
      const loaded = await this.store.load();
      state = loaded ?? this.freshState(startedAt);
      if (loaded) {
        this.logger.info(
          { session: state.session_id, page: state.last_page_completed, total: state.results.length },
          `Checkpoint carregado: continuando da página ${state.last_page_completed + 1}`,
        );
      } else {
        this.logger.info({ session: state.session_id }, 'Nenhum checkpoint: iniciando coleta do zero');
      }
    } catch (e) {
      this.logger.error({ err: errorMessage(e) }, 'Falha ao carregar checkpoint');
      return this.finish('failed', 'persistence_failed', startedAt, e);
    }
    this.state = state;

    const ledger = new DedupLedger(state.seen_ids);
    let pageIndex = state.last_page_completed + 1;
    let emptyStreak = 0;
    let archivedTo: string | null = null;

    try {
      for (;;) {
        const reason = this.terminationReason(state, emptyStreak, pageIndex);
        if (reason) {
          await this.checkpoint(state, ledger);
          archivedTo = await this.store.archive('completed', state.session_id);
          return this.finish('completed', reason, startedAt, null, archivedTo);
        }
        if (this.stopRequested) {
          await this.checkpoint(state, ledger);
          this.logger.info({ page: state.last_page_completed }, 'Parada solicitada: progresso salvo');
          return this.finish('paused', 'stopped', startedAt);
        }

        const records = await this.fetchWithRetry(pageIndex, state);
        const admitted = this.absorbPage(records, pageIndex, state, ledger);
        state.stats.pages_processed++;
        if (admitted > 0) {
          state.last_page_completed = pageIndex;
          emptyStreak = 0;
          this.logger.info({ page: pageIndex, admitted, total: state.results.length }, `Página ${pageIndex}: ${admitted} imóveis novos`);
        } else {
          emptyStreak++;
          this.logger.warn({ page: pageIndex, emptyStreak }, `Página ${pageIndex} sem dados novos`);
        }
        await this.checkpoint(state, ledger);
        this.report(pageIndex);
        pageIndex++;
      }
    } catch (e) {
      if (e instanceof FetchError) {
        state.stats.pages_failed++;
        state.stats.failures.push({ page: pageIndex, error: e.message, at: dayjs(this.now()).toISOString() });
      }
      this.logger.error({ page: pageIndex, err: errorMessage(e) }, 'Coleta interrompida por erro');
      await this.checkpoint(state, ledger).catch((saveErr: unknown) => {
        this.logger.error({ err: errorMessage(saveErr) }, 'Checkpoint final não pôde ser salvo');
      });
      return this.finish('failed', failureReason(e), startedAt, e);
    }
  }

  private freshState(at: Date): CollectionState {
    return {
      session_id: dayjs(at).format('YYYYMMDD_HHmmss'),
      last_page_completed: 0,
      seen_ids: [],
      results: [],
      run_started_at: dayjs(at).toISOString(),
      last_checkpoint_at: null,
      stats: emptyStats(),
    };
  }

  private terminationReason(state: CollectionState, emptyStreak: number, pageIndex: number): EndReason | null {
    if (emptyStreak >= this.limits.emptyPageLimit) return 'empty_pages';
    if (state.results.length >= this.limits.targetCount) return 'target_reached';
    if (pageIndex > this.limits.maxPages) return 'max_pages';
    return null;
  }

  private async fetchWithRetry(pageIndex: number, state: CollectionState): Promise<RawRecord[]> {
    const { maxRetries, retryBaseMs, retryMaxMs } = this.limits;
    let lastError: unknown = null;
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await this.fetcher.fetch(pageIndex);
      } catch (e) {
        if (e instanceof FetchError && e.kind === 'permanent') throw e;
        lastError = e;
        if (attempt < maxRetries) {
          const delay = Math.min(retryBaseMs * 2 ** attempt, retryMaxMs);
          state.stats.retries++;
          this.logger.warn(
            { page: pageIndex, attempt: attempt + 1, delay, err: errorMessage(e) },
            `Falha temporária na página ${pageIndex}, nova tentativa em ${delay}ms`,
          );
          await this.sleep(delay);
        }
      }
    }
    state.stats.pages_failed++;
    state.stats.failures.push({ page: pageIndex, error: errorMessage(lastError), at: dayjs(this.now()).toISOString() });
    this.logger.error({ page: pageIndex, attempts: maxRetries + 1 }, `Página ${pageIndex} falhou após todas as tentativas`);
    return [];
  }

  private absorbPage(records: RawRecord[], pageIndex: number, state: CollectionState, ledger: DedupLedger): number {
    const now = this.now();
    let admitted = 0;
    for (const raw of records) {
      const result = extractListing(raw, {
        ...this.fetcher.profile,
        pageIndex,
        now,
        neighborhoods: this.opts.neighborhoods,
        allowHashIds: this.opts.allowHashIds,
      });
      if (!result.ok) {
        state.stats.rejected++;
        this.logger.debug({ page: pageIndex, reason: result.reason }, 'Card descartado');
        continue;
      }
      if (!ledger.admit(result.listing.id)) {
        state.stats.duplicates++;
        continue;
      }
      state.results.push(result.listing);
      this.lastListing = result.listing;
      this.newThisRun++;
      admitted++;
    }
    return admitted;
  }

  private async checkpoint(state: CollectionState, ledger: DedupLedger): Promise<void> {
    state.seen_ids = ledger.toArray();
    state.last_checkpoint_at = dayjs(this.now()).toISOString();
    await this.store.save(state);
  }

  private report(page: number) {
    this.opts.onProgress?.({
      status: this.status,
      sessionId: this.state?.session_id ?? null,
      page,
      lastPageCompleted: this.state?.last_page_completed ?? 0,
      collected: this.state?.results.length ?? 0,
      newThisRun: this.newThisRun,
      lastListing: this.lastListing,
    });
  }

  private finish(
    status: RunSummary['status'],
    reason: EndReason,
    startedAt: Date,
    error: unknown = null,
    archivedTo: string | null = null,
  ): RunSummary {
    this.status = status;
    this.stopRequested = false;
    const state = this.state;
    const stats = state?.stats ?? emptyStats();
    const summary: RunSummary = {
      status,
      reason,
      sessionId: state?.session_id ?? null,
      lastPageCompleted: state?.last_page_completed ?? 0,
      pagesProcessed: stats.pages_processed,
      pagesFailed: stats.pages_failed,
      retries: stats.retries,
      listingsCollected: state?.results.length ?? 0,
      newListings: this.newThisRun,
      rejected: stats.rejected,
      duplicates: stats.duplicates,
      failures: stats.failures,
      archivedTo,
      error: error === null ? null : errorMessage(error),
      startedAt: dayjs(startedAt).toISOString(),
      finishedAt: dayjs(this.now()).toISOString(),
    };
    const line = `Coleta ${status} (${reason}): ${summary.pagesProcessed} páginas, ${summary.listingsCollected} imóveis, ${summary.pagesFailed} falhas`;
    if (status === 'failed') this.logger.error(summary, line);
    else this.logger.info(summary, line);
    this.report(summary.lastPageCompleted);
    return summary;
  }
}
