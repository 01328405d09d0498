import { z } from 'zod';
import { PORTAL_KEYS, type PortalKey } from '../scrapers';

const TRUTHY = ['1', 'true', 'yes', 'y', 'on', 'sim'];

const flag = z
  .union([z.boolean(), z.string()])
  .transform(v => (typeof v === 'boolean' ? v : TRUTHY.includes(v.trim().toLowerCase())));

const ms = z.coerce.number().int().nonnegative();

const EnvSchema = z.object({
  PORTAL: z.enum(PORTAL_KEYS).default('olx'),
  SEARCH_URL: z.string().url().optional(),
  CHECKPOINT_DIR: z.string().default('checkpoints'),
  DATA_DIR: z.string().default('.data'),
  LOGS_DIR: z.string().default('logs'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MAX_PAGES: z.coerce.number().int().positive().default(80),
  TARGET_COUNT: z.coerce.number().int().positive().optional(),
  EMPTY_PAGE_LIMIT: z.coerce.number().int().positive().default(3),
  MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  RETRY_BASE_MS: ms.default(2000),
  RETRY_MAX_MS: ms.default(30000),
  NAV_TIMEOUT_MS: ms.default(60000),
  PAGE_DELAY_MIN_MS: ms.default(5000),
  PAGE_DELAY_MAX_MS: ms.default(10000),
  HEADLESS: flag.default(true),
  BROWSER_CHANNEL: z.string().optional(),
  BROWSER_PATH: z.string().optional(),
  PROXY: z.string().optional(),
  CITY: z.string().optional(),
  STATE: z.string().optional(),
  NEIGHBORHOODS: z.string().optional(),
  ALLOW_HASH_IDS: flag.default(true),
  PORT: z.coerce.number().int().positive().default(8000),
});

export type AppConfig = {
  portal: PortalKey;
  searchUrl: string | null;
  checkpointDir: string;
  dataDir: string;
  logsDir: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  maxPages: number;
  targetCount: number | null;
  emptyPageLimit: number;
  maxRetries: number;
  retryBaseMs: number;
  retryMaxMs: number;
  navTimeoutMs: number;
  pageDelayMs: { min: number; max: number };
  headless: boolean;
  browserChannel: string | null;
  browserPath: string | null;
  proxy: string | null;
  defaults: { city?: string; state?: string };
  neighborhoods: string[];
  allowHashIds: boolean;
  port: number;
};

export function parseList(v: string | undefined | null): string[] {
  return v ? v.split(',').map(s => s.trim()).filter(Boolean) : [];
}

/** Lê o ambiente (carregado do `.env` pelo ponto de entrada); variáveis vazias contam como ausentes. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new Error(`Configuração inválida: ${parsed.error.message}`);
  }
  const e = parsed.data;
  const defaults: AppConfig['defaults'] = {};
  if (e.CITY) defaults.city = e.CITY;
  if (e.STATE) defaults.state = e.STATE;

  return {
    portal: e.PORTAL,
    searchUrl: e.SEARCH_URL ?? null,
    checkpointDir: e.CHECKPOINT_DIR,
    dataDir: e.DATA_DIR,
    logsDir: e.LOGS_DIR,
    logLevel: e.LOG_LEVEL,
    maxPages: e.MAX_PAGES,
    targetCount: e.TARGET_COUNT ?? null,
    emptyPageLimit: e.EMPTY_PAGE_LIMIT,
    maxRetries: e.MAX_RETRIES,
    retryBaseMs: e.RETRY_BASE_MS,
    retryMaxMs: e.RETRY_MAX_MS,
    navTimeoutMs: e.NAV_TIMEOUT_MS,
    pageDelayMs: { min: e.PAGE_DELAY_MIN_MS, max: Math.max(e.PAGE_DELAY_MIN_MS, e.PAGE_DELAY_MAX_MS) },
    headless: e.HEADLESS,
    browserChannel: e.BROWSER_CHANNEL ?? null,
    browserPath: e.BROWSER_PATH ?? null,
    proxy: e.PROXY ?? null,
    defaults,
    neighborhoods: parseList(e.NEIGHBORHOODS),
    allowHashIds: e.ALLOW_HASH_IDS,
    port: e.PORT,
  };
}
