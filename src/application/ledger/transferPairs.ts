export interface PendingTransfer {
  readonly from: string;
  readonly to: string;
  readonly amountCents: number;
}

interface PairSlot extends PendingTransfer {
  awaiting: number;
}

/**
 * Tracks TRANSFER_OUT legs applied in a batch so that the matching
 * TRANSFER_IN record is recognised as already materialised.
 *
 * Pairs move through: no pair -> OUT applied, awaiting IN -> IN matched.
 * Each OUT satisfies at most one IN.
 */
export class TransferPairRegistry {
  private readonly slots = new Map<string, PairSlot>();

  /**
   * Record an applied OUT leg from `from` to `to`.
   */
  recordOut(from: string, to: string, amountCents: number): void {
    const key = pairKey(from, to, amountCents);
    const slot = this.slots.get(key);
    if (slot) {
      slot.awaiting += 1;
      return;
    }
    this.slots.set(key, { from, to, amountCents, awaiting: 1 });
  }

  /**
   * Claim the OUT leg that an incoming record on `owner` from `counterparty`
   * would pair with. Returns false when no such leg is awaiting.
   */
  claimIn(owner: string, counterparty: string, amountCents: number): boolean {
    const key = pairKey(counterparty, owner, amountCents);
    const slot = this.slots.get(key);
    if (!slot) {
      return false;
    }

    slot.awaiting -= 1;
    if (slot.awaiting === 0) {
      this.slots.delete(key);
    }
    return true;
  }

  /**
   * OUT legs whose IN record has not been seen, one entry per leg.
   */
  pending(): PendingTransfer[] {
    const result: PendingTransfer[] = [];
    for (const { from, to, amountCents, awaiting } of this.slots.values()) {
      for (let i = 0; i < awaiting; i++) {
        result.push({ from, to, amountCents });
      }
    }
    return result;
  }
}

function pairKey(from: string, to: string, amountCents: number): string {
  return JSON.stringify([from, to, amountCents]);
}
