import fsp from 'fs/promises';
import path from 'path';
import dayjs from 'dayjs';
import { type CollectionState, CollectionStateSchema } from '../schemas/listing';
import { errorMessage, PersistenceError } from './errors';
import { silentLogger, type Logger } from '../utils/logger';

export type ArchiveLabel = 'completed' | 'reset';

export type CheckpointStore = {
  location: string;
  load: () => Promise<CollectionState | null>;
  save: (state: CollectionState) => Promise<void>;
  /** Move o checkpoint para o histórico. `null` quando não há checkpoint. */
  archive: (label: ArchiveLabel, sessionId?: string) => Promise<string | null>;
};

export type CheckpointFs = Pick<typeof fsp, 'mkdir' | 'open' | 'readFile' | 'rename' | 'rm'>;

export type FileCheckpointStoreOptions = {
  dir: string;
  key: string;
  fs?: CheckpointFs;
  logger?: Logger;
};

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Checkpoint em `<dir>/<key>.checkpoint.json`. Grava num temporário, faz fsync e renomeia por cima,
 * então um processo morto no meio do `save` deixa o arquivo anterior intacto.
 */
export class FileCheckpointStore implements CheckpointStore {
  readonly location: string;
  private dir: string;
  private key: string;
  private fs: CheckpointFs;
  private logger: Logger;

  constructor(opts: FileCheckpointStoreOptions) {
    this.dir = opts.dir;
    this.key = opts.key;
    this.location = path.join(opts.dir, `${opts.key}.checkpoint.json`);
    this.fs = opts.fs ?? fsp;
    this.logger = opts.logger ?? silentLogger;
  }

  async load(): Promise<CollectionState | null> {
    let raw: string;
    try {
      raw = await this.fs.readFile(this.location, 'utf-8');
    } catch (e) {
      if (isNotFound(e)) return null;
      throw new PersistenceError(`Falha ao ler checkpoint: ${errorMessage(e)}`, this.location, { cause: e });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (e) {
      throw new PersistenceError(`Checkpoint corrompido: ${errorMessage(e)}`, this.location, { cause: e });
    }
    const parsed = CollectionStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceError(`Checkpoint inválido: ${parsed.error.message}`, this.location);
    }
    return parsed.data;
  }

  async save(state: CollectionState): Promise<void> {
    const body = JSON.stringify(state, null, 2);
    const tmp = `${this.location}.${process.pid}.tmp`;
    try {
      await this.fs.mkdir(this.dir, { recursive: true });
      const handle = await this.fs.open(tmp, 'w');
      try {
        await handle.writeFile(body, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await this.fs.rename(tmp, this.location);
    } catch (e) {
      await this.fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
        this.logger.warn({ tmp, err: errorMessage(rmErr) }, 'Temporário de checkpoint não removido');
      });
      throw new PersistenceError(`Falha ao salvar checkpoint: ${errorMessage(e)}`, this.location, { cause: e });
    }
    this.logger.debug({ page: state.last_page_completed, total: state.results.length }, 'Checkpoint salvo');
  }

  async archive(label: ArchiveLabel, sessionId?: string): Promise<string | null> {
    const archiveDir = path.join(this.dir, 'archive');
    const stamp = sessionId ?? dayjs().format('YYYYMMDD_HHmmss');
    const target = path.join(archiveDir, `${label}-${this.key}-${stamp}.json`);
    try {
      await this.fs.mkdir(archiveDir, { recursive: true });
      await this.fs.rename(this.location, target);
    } catch (e) {
      if (isNotFound(e)) return null;
      throw new PersistenceError(`Falha ao arquivar checkpoint: ${errorMessage(e)}`, this.location, { cause: e });
    }
    this.logger.info({ target }, 'Checkpoint movido para o histórico');
    return target;
  }
}
