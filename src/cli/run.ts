import { Command, InvalidArgumentError, Option } from 'commander';
import type { RunSummary } from '../engine/collector';
import { errorMessage } from '../engine/errors';
import { resetCheckpoint, setupRun } from '../engine/setup';
import { PORTAL_KEYS, type PortalKey } from '../scrapers';
import { loadConfig, parseList } from '../utils/config';
import { exportCSV, exportJSON } from '../utils/exporter';
import { createLogger } from '../utils/logger';

type CliOptions = {
  portal?: PortalKey;
  maxPages?: number;
  target?: number;
  emptyLimit?: number;
  fixture?: string;
  reset?: boolean;
  export: 'json' | 'csv' | 'both' | 'none';
  headed?: boolean;
  neighborhoods?: string;
};

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('esperado inteiro positivo');
  return n;
}

function buildProgram() {
  return new Command()
    .name('coletor-imoveis')
    .description('Coleta incremental de anúncios de imóveis, com checkpoint e retomada')
    .addOption(new Option('-p, --portal <portal>', 'portal a coletar').choices(PORTAL_KEYS))
    .option('--max-pages <n>', 'última página a visitar', positiveInt)
    .option('--target <n>', 'encerra ao atingir N anúncios', positiveInt)
    .option('--empty-limit <n>', 'páginas seguidas sem dados novos antes de encerrar', positiveInt)
    .option('--fixture <file>', 'reproduz páginas gravadas (JSON) em vez de abrir o navegador')
    .option('--neighborhoods <lista>', 'bairros aceitos, separados por vírgula')
    .option('--reset', 'arquiva o checkpoint atual e começa do zero')
    .addOption(new Option('--export <formato>', 'formato de saída').choices(['json', 'csv', 'both', 'none']).default('both'))
    .option('--headed', 'abre o navegador visível');
}

/**
 * Executa uma coleta e devolve o código de saída: 0 para concluída ou pausada, 1 para falha.
 */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const opts = buildProgram().parse(argv).opts<CliOptions>();
  const config = loadConfig(env);
  const { logger, logfile } = createLogger({ level: config.logLevel, logsDir: config.logsDir });
  if (logfile) logger.info({ logfile }, 'Log da execução');

  const { engine, fetcher, store, portal } = await setupRun(
    config,
    {
      portal: opts.portal,
      fixture: opts.fixture ?? null,
      maxPages: opts.maxPages,
      targetCount: opts.target,
      emptyPageLimit: opts.emptyLimit,
      headless: opts.headed ? false : undefined,
      neighborhoods: opts.neighborhoods !== undefined ? parseList(opts.neighborhoods) : undefined,
    },
    { logger },
  );

  if (opts.reset) await resetCheckpoint(store, logger);

  const stop = () => {
    logger.warn('Interrompido pelo usuário: salvando progresso...');
    engine.requestStop();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  let summary: RunSummary;
  try {
    summary = await engine.run();
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
    await fetcher.close().catch((e: unknown) => logger.warn({ err: errorMessage(e) }, 'Falha ao fechar navegador'));
  }

  const results = engine.getResults();
  if (results.length && summary.sessionId && opts.export !== 'none') {
    if (opts.export !== 'csv') logger.info({ file: exportJSON(config.dataDir, portal, summary.sessionId, results) }, 'JSON salvo');
    if (opts.export !== 'json') logger.info({ file: exportCSV(config.dataDir, portal, summary.sessionId, results) }, 'CSV salvo');
  }
  if (summary.status === 'paused') logger.info('Coleta pausada: execute novamente para retomar');
  return summary.status === 'failed' ? 1 : 0;
}
