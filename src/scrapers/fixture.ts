import fs from 'fs/promises';
import { z } from 'zod';
import { FetchError, type FetchErrorKind } from '../engine/errors';
import type { ExtractProfile, PageFetcher, RawRecord } from './types';

export const RawRecordSchema = z.object({
  fields: z.record(z.string().nullable().optional()),
  text: z.string().nullable().optional(),
});

export const FixturePagesSchema = z.array(z.array(RawRecordSchema));

export type FixtureFailure = { page: number; kind: FetchErrorKind; times?: number };

export type FixtureOptions = {
  profile?: Partial<ExtractProfile>;
  /** Falhas roteirizadas: a página `page` falha `times` vezes (sempre, se omitido). */
  failures?: FixtureFailure[];
};

export type FixtureFetcher = PageFetcher & { calls: number[] };

/** Reproduz páginas gravadas: página N → `pages[N-1]`, além do fim → `[]`. */
export function createFixtureFetcher(pages: RawRecord[][], opts: FixtureOptions = {}): FixtureFetcher {
  const profile: ExtractProfile = {
    portal: opts.profile?.portal ?? 'fixture',
    locationFormat: opts.profile?.locationFormat ?? 'street-neighborhood-city',
    defaults: opts.profile?.defaults,
  };
  const remaining = new Map<number, { kind: FetchErrorKind; times: number }>();
  for (const f of opts.failures ?? []) remaining.set(f.page, { kind: f.kind, times: f.times ?? Infinity });
  const calls: number[] = [];

  return {
    portal: profile.portal,
    profile,
    calls,
    async fetch(pageIndex: number) {
      calls.push(pageIndex);
      const failure = remaining.get(pageIndex);
      if (failure && failure.times > 0) {
        failure.times--;
        throw new FetchError(failure.kind, `falha simulada na página ${pageIndex}`, { pageIndex });
      }
      return (pages[pageIndex - 1] ?? []).map(r => ({ fields: { ...r.fields }, text: r.text }));
    },
    async close() {},
  };
}

export async function loadFixtureFetcher(file: string, opts: FixtureOptions = {}): Promise<FixtureFetcher> {
  const raw = await fs.readFile(file, 'utf-8');
  const pages = FixturePagesSchema.parse(JSON.parse(raw));
  return createFixtureFetcher(pages, opts);
}
