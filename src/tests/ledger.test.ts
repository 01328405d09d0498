import { describe, expect, it } from 'vitest';
import { DedupLedger } from '../engine/ledger';

describe('DedupLedger', () => {
  it('admite cada id uma única vez', () => {
    const ledger = new DedupLedger();
    expect(ledger.admit('a')).toBe(true);
    expect(ledger.admit('b')).toBe(true);
    expect(ledger.admit('a')).toBe(false);
    expect(ledger.size).toBe(2);
    expect(ledger.toArray()).toEqual(['a', 'b']);
  });

  it('reconstruído de seen_ids responde igual ao original', () => {
    const original = new DedupLedger();
    ['a', 'b', 'c'].forEach(id => original.admit(id));
    const restored = new DedupLedger(original.toArray());
    expect(restored.has('b')).toBe(true);
    expect(restored.admit('c')).toBe(false);
    expect(restored.admit('d')).toBe(true);
  });
});
