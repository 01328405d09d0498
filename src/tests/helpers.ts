import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { RawRecord } from '../scrapers/types';

export async function tmpDir(prefix = 'coletor-') {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function card(id: string, price: string | null = 'R$ 100.000', extra: Record<string, string> = {}): RawRecord {
  return {
    fields: {
      id,
      price,
      title: `Apartamento ${id}`,
      location: 'Rua A, Centro, São José dos Campos',
      ...extra,
    },
  };
}

export function cards(prefix: string, n: number): RawRecord[] {
  return Array.from({ length: n }, (_, i) => card(`${prefix}${i + 1}`));
}
