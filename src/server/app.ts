import express from 'express';
import { errorMessage } from '../engine/errors';
import { exportCSV, exportJSON } from '../utils/exporter';
import type { MemoryLog } from '../utils/logger';
import { RunBodySchema, type RunManager } from './manager';

export function createApp(manager: RunManager, memlog: MemoryLog, dataDir: string) {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/data', (_req, res) => {
    res.json({ items: manager.getData() });
  });

  app.post('/run', (req, res) => {
    const parsed = RunBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).json({ error: 'VALIDATION_ERROR', details: parsed.error.flatten() });
    if (manager.isRunning()) return res.status(409).json({ error: 'Coleta em execução' });
    memlog.clear();
    // dispara e responde; o andamento sai em /status
    manager.run(parsed.data).catch((e: unknown) => memlog.push('error', `Coleta falhou: ${errorMessage(e)}`));
    return res.status(202).json({ ok: true });
  });

  app.get('/status', (_req, res) => {
    res.json({ ...manager.progress.get(), logs: memlog.list() });
  });

  app.get('/export', (req, res) => {
    const format = req.query.format === 'csv' ? 'csv' : 'json';
    const data = manager.getData();
    const portal = manager.getPortal();
    const session = manager.progress.get().sessionId;
    if (!portal || !session || data.length === 0) return res.status(400).json({ error: 'Nada para exportar' });
    const file = format === 'csv' ? exportCSV(dataDir, portal, session, data) : exportJSON(dataDir, portal, session, data);
    return res.json({ ok: true, file });
  });

  app.post('/stop', (_req, res) => {
    res.json({ ok: manager.requestStop() });
  });

  return app;
}
