import { OperationQueue } from '../../services/feeds/operationQueue';

describe('OperationQueue', () => {
  it('should run operations one at a time in submission order', async () => {
    const queue = new OperationQueue();
    const log: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });

    const first = queue.run(async () => {
      log.push('first:start');
      await gate;
      log.push('first:end');
      return 1;
    });
    const second = queue.run(async () => {
      log.push('second');
      return 2;
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(log).toEqual(['first:start']);

    release();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should keep running after an operation rejects', async () => {
    const queue = new OperationQueue();

    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});
