/**
 * Runs operations one at a time in submission order. A rejected operation
 * rejects its own caller and does not block the ones queued after it.
 */
export class OperationQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.tail.then(operation);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
