/**
 * Concurrency Manager for the ledger node
 * Serialises every ledger mutation (transaction admission, block acceptance)
 * while reads and the proof-of-work search run alongside
 */

export interface QueuedOperation {
  run: () => Promise<void>;
  cancel: (error: Error) => void;
}

export interface ConcurrencyStatus {
  queueLength: number;
  isProcessing: boolean;
}

export class ConcurrencyManager {
  private ledgerQueue: QueuedOperation[] = [];
  private isProcessing = false;

  /**
   * Queue a ledger mutation to ensure sequential execution
   * @param operation The function to execute once every earlier mutation settled
   * @returns Promise that resolves when the operation completes
   */
  async queueLedgerOperation<T>(operation: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.ledgerQueue.push({
        run: async () => {
          try {
            resolve(await operation());
          } catch (error) {
            reject(error instanceof Error ? error : new Error(String(error)));
          }
        },
        cancel: reject
      });

      void this.processQueue();
    });
  }

  /**
   * Process the queue of ledger operations sequentially
   */
  private async processQueue(): Promise<void> {
    if (this.isProcessing || this.ledgerQueue.length === 0) {
      return;
    }

    this.isProcessing = true;

    try {
      while (this.ledgerQueue.length > 0) {
        const queuedOperation = this.ledgerQueue.shift();

        if (queuedOperation) {
          await queuedOperation.run();
        }
      }
    } finally {
      this.isProcessing = false;
    }
  }

  getStatus(): ConcurrencyStatus {
    return {
      queueLength: this.ledgerQueue.length,
      isProcessing: this.isProcessing
    };
  }

  /**
   * Reject every queued operation (used on shutdown)
   */
  clearQueue(): void {
    const error = new Error('Queue cleared - operation cancelled');

    while (this.ledgerQueue.length > 0) {
      const operation = this.ledgerQueue.shift();
      if (operation) {
        operation.cancel(error);
      }
    }
  }
}

// Singleton instance for application-wide use
export const concurrencyManager = new ConcurrencyManager();
