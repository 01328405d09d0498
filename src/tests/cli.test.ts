import fs from 'fs/promises';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { runCli } from '../cli/run';
import { tmpDir } from './helpers';

const fixture = path.join(__dirname, 'fixtures', 'pages.json');

describe('runCli', () => {
  it('reproduz páginas gravadas, exporta CSV e arquiva o checkpoint', async () => {
    const root = await tmpDir();
    const env = {
      CHECKPOINT_DIR: path.join(root, 'checkpoints'),
      DATA_DIR: path.join(root, 'data'),
      LOGS_DIR: path.join(root, 'logs'),
      LOG_LEVEL: 'silent',
    };

    const code = await runCli(
      ['node', 'coletor-imoveis', '--portal', 'zap', '--fixture', fixture, '--empty-limit', '1', '--export', 'csv'],
      env,
    );
    expect(code).toBe(0);

    const [csv] = await fs.readdir(env.DATA_DIR);
    expect(csv).toMatch(/-zap-\d{8}_\d{6}\.csv$/);
    const lines = (await fs.readFile(path.join(env.DATA_DIR, csv), 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(4);
    expect(lines.slice(1).map(l => l.split(',')[0])).toEqual(['2700000001', '2700000002', '2700000003']);

    const archived = await fs.readdir(path.join(env.CHECKPOINT_DIR, 'archive'));
    expect(archived).toHaveLength(1);
    expect(archived[0]).toMatch(/^completed-zap-fixture-\d{8}_\d{6}\.json$/);
  });
});
