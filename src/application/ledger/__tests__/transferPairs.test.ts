import { describe, it, expect } from 'vitest';
import { TransferPairRegistry } from '../transferPairs.js';

describe('TransferPairRegistry', () => {
  it('should match an IN record against a recorded OUT leg once', () => {
    const pairs = new TransferPairRegistry();
    pairs.recordOut('Alice', 'Bob', 4000);

    expect(pairs.claimIn('Bob', 'Alice', 4000)).toBe(true);
    expect(pairs.claimIn('Bob', 'Alice', 4000)).toBe(false);
    expect(pairs.pending()).toEqual([]);
  });

  it('should respect direction and amount', () => {
    const pairs = new TransferPairRegistry();
    pairs.recordOut('Alice', 'Bob', 4000);

    expect(pairs.claimIn('Alice', 'Bob', 4000)).toBe(false);
    expect(pairs.claimIn('Bob', 'Alice', 3999)).toBe(false);
    expect(pairs.claimIn('Carol', 'Alice', 4000)).toBe(false);
    expect(pairs.pending()).toEqual([{ from: 'Alice', to: 'Bob', amountCents: 4000 }]);
  });

  it('should count repeated OUT legs separately', () => {
    const pairs = new TransferPairRegistry();
    pairs.recordOut('Alice', 'Bob', 1000);
    pairs.recordOut('Alice', 'Bob', 1000);
    pairs.recordOut('Bob', 'Carol', 500);

    expect(pairs.pending()).toEqual([
      { from: 'Alice', to: 'Bob', amountCents: 1000 },
      { from: 'Alice', to: 'Bob', amountCents: 1000 },
      { from: 'Bob', to: 'Carol', amountCents: 500 },
    ]);

    expect(pairs.claimIn('Bob', 'Alice', 1000)).toBe(true);
    expect(pairs.pending()).toHaveLength(2);
    expect(pairs.claimIn('Bob', 'Alice', 1000)).toBe(true);
    expect(pairs.claimIn('Bob', 'Alice', 1000)).toBe(false);
  });

  it('should not confuse owners that contain separator characters', () => {
    const pairs = new TransferPairRegistry();
    pairs.recordOut('A|B', 'C', 100);

    expect(pairs.claimIn('B|C', 'A', 100)).toBe(false);
    expect(pairs.claimIn('C', 'A|B', 100)).toBe(true);
  });
});
