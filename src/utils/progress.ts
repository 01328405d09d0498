import type { Listing } from '../schemas/listing';
import type { EngineProgress, EngineStatus, RunSummary } from '../engine/collector';

export type Progress = {
  running: boolean;
  status: EngineStatus;
  portal: string | null;
  sessionId: string | null;
  maxPages: number | null;
  targetCount: number | null;
  currentPage: number;
  lastPageCompleted: number;
  listingsCollected: number;
  newThisRun: number;
  percent: number; // 0-100, em relação à meta de anúncios ou ao máximo de páginas
  currentItem: Listing | null;
  summary: RunSummary | null;
};

const initial = (): Progress => ({
  running: false,
  status: 'idle',
  portal: null,
  sessionId: null,
  maxPages: null,
  targetCount: null,
  currentPage: 0,
  lastPageCompleted: 0,
  listingsCollected: 0,
  newThisRun: 0,
  percent: 0,
  currentItem: null,
  summary: null,
});

export class ProgressStore {
  private state: Progress = initial();

  get() { return this.state; }
  set(p: Partial<Progress>) { this.state = { ...this.state, ...p }; }
  reset() { this.state = initial(); }

  /** Ligado em `onProgress` do motor. */
  track(p: EngineProgress) {
    const { targetCount, maxPages } = this.state;
    const percent = targetCount
      ? (p.collected / targetCount) * 100
      : maxPages
        ? (p.page / maxPages) * 100
        : 0;
    this.set({
      status: p.status,
      running: p.status === 'running',
      sessionId: p.sessionId,
      currentPage: p.page,
      lastPageCompleted: p.lastPageCompleted,
      listingsCollected: p.collected,
      newThisRun: p.newThisRun,
      percent: Math.min(100, Math.floor(percent)),
      currentItem: p.lastListing,
    });
  }
}
