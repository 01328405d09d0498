/**
 * Ids já admitidos na coleta. Reconstruído a partir de `seen_ids` de um checkpoint,
 * responde igual a uma execução sem interrupção.
 */
export class DedupLedger {
  private seen: Set<string>;

  constructor(seen: Iterable<string> = []) {
    this.seen = new Set(seen);
  }

  admit(id: string): boolean {
    if (this.seen.has(id)) return false;
    this.seen.add(id);
    return true;
  }

  has(id: string) { return this.seen.has(id); }

  get size() { return this.seen.size; }

  toArray(): string[] { return Array.from(this.seen); }
}
