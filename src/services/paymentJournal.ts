import { logger } from '../utils/logger';
import { ValueForward } from './feeds/valueLedger';

export type PaymentOperation =
  | 'getFeedById'
  | 'getFeedsById'
  | 'getFeedByIdInWei'
  | 'getFeedsByIdInWei'
  | 'getFeedByIndex'
  | 'getFeedsByIndex'
  | 'getFeedByIndexInWei'
  | 'getFeedsByIndexInWei';

export interface PaymentRecord {
  id: string;
  operation: PaymentOperation;
  feedIds?: string[];
  indices?: number[];
  valueReceived: bigint;
  forwarded: ValueForward[];
  timestamp: string;
}

export interface PaymentStats {
  totalPayments: number;
  totalReceived: bigint;
  forwardedToCalculated: bigint;
  forwardedToIndexed: bigint;
}

/**
 * Bounded, newest-first record of the value each payable fetch received and
 * where it was forwarded.
 */
export class PaymentJournal {
  private payments: PaymentRecord[] = [];
  private sequence = 0;

  constructor(private readonly maxPayments: number = 100) {}

  record(payment: Omit<PaymentRecord, 'id' | 'timestamp'>): PaymentRecord {
    const entry: PaymentRecord = {
      ...payment,
      id: this.generateId(),
      timestamp: new Date().toISOString()
    };

    this.payments.unshift(entry);
    if (this.payments.length > this.maxPayments) {
      this.payments = this.payments.slice(0, this.maxPayments);
    }

    logger.debug('Fee payment recorded', {
      id: entry.id,
      operation: entry.operation,
      valueReceived: entry.valueReceived,
      forwards: entry.forwarded.length
    });

    return entry;
  }

  getRecentPayments(limit: number = 20, operation?: PaymentOperation): PaymentRecord[] {
    const filtered = operation
      ? this.payments.filter(payment => payment.operation === operation)
      : this.payments;
    return filtered.slice(0, limit);
  }

  getPaymentById(id: string): PaymentRecord | null {
    return this.payments.find(payment => payment.id === id) || null;
  }

  getPaymentStats(): PaymentStats {
    const stats: PaymentStats = {
      totalPayments: this.payments.length,
      totalReceived: 0n,
      forwardedToCalculated: 0n,
      forwardedToIndexed: 0n
    };
    for (const payment of this.payments) {
      stats.totalReceived += payment.valueReceived;
      for (const forward of payment.forwarded) {
        if (forward.target === 'calculated') {
          stats.forwardedToCalculated += forward.amount;
        } else {
          stats.forwardedToIndexed += forward.amount;
        }
      }
    }
    return stats;
  }

  private generateId(): string {
    this.sequence++;
    return `pay_${Date.now()}_${this.sequence}`;
  }
}
