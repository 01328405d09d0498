import 'dotenv/config';
import { loadConfig } from '../utils/config';
import { createLogger, memlog } from '../utils/logger';
import { createApp } from './app';
import { RunManager } from './manager';

const config = loadConfig();
const { logger } = createLogger({ level: config.logLevel, logsDir: config.logsDir });
const manager = new RunManager({ config, logger });
const app = createApp(manager, memlog, config.dataDir);

app.listen(config.port, () => {
  logger.info(`Painel pronto em http://localhost:${config.port}`);
});
