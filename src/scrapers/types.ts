import type { Page } from 'playwright-core';
import type { LocationFormat } from '../extractors/normalize';

/** Um card de anúncio como veio da página: campos rotulados e/ou o texto inteiro. */
export type RawRecord = {
  fields: Record<string, string | null | undefined>;
  text?: string | null;
};

export type ExtractProfile = {
  portal: string;
  locationFormat: LocationFormat;
  defaults?: { city?: string; state?: string };
};

/**
 * Única fronteira com rede/navegador. `fetch` devolve os cards da página `pageIndex` (1-based)
 * ou rejeita com `FetchError`.
 */
export type PageFetcher = {
  portal: string;
  profile: ExtractProfile;
  fetch: (pageIndex: number) => Promise<RawRecord[]>;
  close: () => Promise<void>;
};

export type PortalProfile = ExtractProfile & {
  name: string;
  homeUrl: string;
  defaultSearchUrl: string;
  selectors: { card: string } & Record<string, string>;
  pageUrl: (searchUrl: string, pageIndex: number) => string;
  collectRecords: (page: Page) => Promise<RawRecord[]>;
};
