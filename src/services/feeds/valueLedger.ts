import { InsufficientValueError } from '../../middleware/errorHandler';

export type ForwardTarget = 'calculated' | 'indexed';

export interface ValueForward {
  target: ForwardTarget;
  feedId?: string;
  amount: bigint;
}

/**
 * Transferable balance held by the registry while a payable call runs.
 * Value attached to a call is credited, then forwarded to collaborators.
 */
export class ValueLedger {
  private balance = 0n;
  private forwards: ValueForward[] = [];

  get available(): bigint {
    return this.balance;
  }

  credit(amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError('credit amount must not be negative');
    }
    this.balance += amount;
  }

  /** Debits `amount` for a collaborator call and returns it as the value to forward. */
  forward(amount: bigint, target: ForwardTarget, feedId?: string): bigint {
    if (amount > this.balance) {
      throw new InsufficientValueError(amount, this.balance);
    }
    this.balance -= amount;
    this.forwards.push({ target, feedId, amount });
    return amount;
  }

  /** Forwards everything that is left. */
  forwardAll(target: ForwardTarget): bigint {
    return this.forward(this.balance, target);
  }

  /** Forwards recorded since the last call, clearing the record. */
  takeForwards(): ValueForward[] {
    const forwards = this.forwards;
    this.forwards = [];
    return forwards;
  }

  snapshot(): { balance: bigint; forwards: number } {
    return { balance: this.balance, forwards: this.forwards.length };
  }

  restore(snapshot: { balance: bigint; forwards: number }): void {
    this.balance = snapshot.balance;
    this.forwards = this.forwards.slice(0, snapshot.forwards);
  }
}
