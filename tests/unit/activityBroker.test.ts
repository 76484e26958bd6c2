import { describe, it, expect, vi } from 'vitest';
import { ActivityBroker, type DispatchFailure } from '../../src/services/activityBroker/ActivityBroker.js';
import type { Activity } from '../../src/clients/shared/interfaces.js';
import { buildActivity, OTHER_WALLET, TARGET_WALLET } from '../fixtures/activities.js';
import { createMockLogger } from '../mocks/logger.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('ActivityBroker', () => {
  const createBroker = (maxWorkers = 4) => new ActivityBroker({ maxWorkers, log: createMockLogger() });

  it('should reject a non-positive worker count', () => {
    expect(() => new ActivityBroker({ maxWorkers: 0, log: createMockLogger() })).toThrow(
      'maxWorkers must be a positive integer, got 0'
    );
  });

  it('should dispatch nothing for an empty batch', async () => {
    const broker = createBroker();
    const callback = vi.fn();
    broker.subscribe(TARGET_WALLET, callback);

    const receipt = broker.publish(TARGET_WALLET, []);

    expect(receipt.dispatched).toBe(0);
    expect(await receipt.settled).toEqual([]);
    expect(callback).not.toHaveBeenCalled();
  });

  it('should dispatch nothing for a wallet without subscribers', async () => {
    const broker = createBroker();
    const receipt = broker.publish(OTHER_WALLET, [buildActivity()]);

    expect(receipt.dispatched).toBe(0);
    expect(broker.getStats().batchesPublished).toBe(0);
  });

  it('should deliver each batch to every subscriber of the wallet', async () => {
    const broker = createBroker();
    const first = vi.fn();
    const second = vi.fn();
    const unrelated = vi.fn();
    broker.subscribe(TARGET_WALLET, first, 'first');
    broker.subscribe(TARGET_WALLET, second, 'second');
    broker.subscribe(OTHER_WALLET, unrelated);

    const batch = [buildActivity()];
    const receipt = broker.publish(TARGET_WALLET, batch);
    const outcomes = await receipt.settled;

    expect(receipt.dispatched).toBe(2);
    expect(outcomes.map((outcome) => [outcome.subscriber, outcome.ok])).toEqual([
      ['first', true],
      ['second', true],
    ]);
    expect(first).toHaveBeenCalledWith(batch, TARGET_WALLET);
    expect(second).toHaveBeenCalledWith(batch, TARGET_WALLET);
    expect(unrelated).not.toHaveBeenCalled();
  });

  it('should match wallets case-insensitively', async () => {
    const broker = createBroker();
    const callback = vi.fn();
    broker.subscribe(TARGET_WALLET.replace('aa', 'AA'), callback);

    const receipt = broker.publish(TARGET_WALLET, [buildActivity()]);
    await receipt.settled;

    expect(receipt.dispatched).toBe(1);
    expect(broker.subscriberCount(TARGET_WALLET.replace('aa', 'AA'))).toBe(1);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('should isolate a failing subscriber from the others', async () => {
    const broker = createBroker();
    const failures: DispatchFailure[] = [];
    broker.on('dispatchFailed', (failure: DispatchFailure) => failures.push(failure));

    const healthy = vi.fn();
    broker.subscribe(
      TARGET_WALLET,
      () => {
        throw new Error('subscriber exploded');
      },
      'broken'
    );
    broker.subscribe(TARGET_WALLET, healthy, 'healthy');

    const outcomes = await broker.publish(TARGET_WALLET, [buildActivity(), buildActivity()]).settled;

    expect(outcomes[0]?.ok).toBe(false);
    expect(outcomes[1]?.ok).toBe(true);
    expect(healthy).toHaveBeenCalledTimes(1);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.subscriber).toBe('broken');
    expect(failures[0]?.batchSize).toBe(2);
    expect(broker.getStats().dispatchFailures).toBe(1);
  });

  it('should keep dispatching when a dispatchFailed listener throws', async () => {
    const log = createMockLogger();
    const broker = new ActivityBroker({ maxWorkers: 2, log });
    broker.on('dispatchFailed', () => {
      throw new Error('listener exploded');
    });

    const seen: string[] = [];
    let calls = 0;
    broker.subscribe(TARGET_WALLET, (batch) => {
      calls++;
      if (calls === 1) {
        throw new Error('subscriber exploded');
      }
      seen.push(...batch.map((activity) => activity.transactionHash));
    });

    const first = broker.publish(TARGET_WALLET, [buildActivity()]);
    const later = buildActivity();
    const second = broker.publish(TARGET_WALLET, [later]);

    expect((await first.settled)[0]?.ok).toBe(false);
    expect((await second.settled)[0]?.ok).toBe(true);
    await broker.drain();

    expect(seen).toEqual([later.transactionHash]);
    expect(log.error).toHaveBeenCalledWith(
      'dispatchFailed listener threw',
      expect.objectContaining({ error: 'listener exploded' })
    );
    expect(broker.getStats().dispatchFailures).toBe(1);
  });

  it('should keep publish order per subscriber even when earlier batches are slower', async () => {
    const broker = createBroker();
    const gate = deferred();
    const seen: string[] = [];

    broker.subscribe(TARGET_WALLET, async (batch) => {
      const hash = batch[0]?.transactionHash ?? 'none';
      if (seen.length === 0) {
        await gate.promise;
      }
      seen.push(hash);
    });

    const batches = [buildActivity(), buildActivity(), buildActivity()];
    const receipts = batches.map((activity) => broker.publish(TARGET_WALLET, [activity]));

    gate.resolve();
    await Promise.all(receipts.map((receipt) => receipt.settled));

    expect(seen).toEqual(batches.map((activity) => activity.transactionHash));
  });

  it('should return from publish before subscribers finish', async () => {
    const broker = createBroker();
    const gate = deferred();
    let finished = false;
    broker.subscribe(TARGET_WALLET, async () => {
      await gate.promise;
      finished = true;
    });

    const receipt = broker.publish(TARGET_WALLET, [buildActivity()]);
    expect(receipt.dispatched).toBe(1);
    expect(finished).toBe(false);

    gate.resolve();
    await receipt.settled;
    expect(finished).toBe(true);
  });

  it('should never run more units than the worker pool allows', async () => {
    const broker = createBroker(2);
    const gate = deferred();
    let running = 0;
    let peak = 0;

    for (let i = 0; i < 3; i++) {
      broker.subscribe(TARGET_WALLET, async () => {
        running++;
        peak = Math.max(peak, running);
        await gate.promise;
        running--;
      });
    }

    const receipt = broker.publish(TARGET_WALLET, [buildActivity()]);

    await vi.waitFor(() => {
      expect(broker.getStats().activeWorkers).toBe(2);
    });
    expect(broker.getStats().pendingWorkers).toBe(1);

    gate.resolve();
    await receipt.settled;

    expect(peak).toBe(2);
    expect(broker.getStats().activeWorkers).toBe(0);
  });

  it('should stop delivering after unsubscribe', async () => {
    const broker = createBroker();
    const callback = vi.fn();
    const subscription = broker.subscribe(TARGET_WALLET, callback);

    subscription.unsubscribe();
    const receipt = broker.publish(TARGET_WALLET, [buildActivity()]);

    expect(receipt.dispatched).toBe(0);
    expect(broker.subscriberCount(TARGET_WALLET)).toBe(0);
    expect(callback).not.toHaveBeenCalled();
  });

  it('should only deliver to subscribers present when the batch was published', async () => {
    const broker = createBroker();
    const early = vi.fn();
    const late = vi.fn();
    broker.subscribe(TARGET_WALLET, early);

    const receipt = broker.publish(TARGET_WALLET, [buildActivity()]);
    broker.subscribe(TARGET_WALLET, late);
    await receipt.settled;

    expect(early).toHaveBeenCalledTimes(1);
    expect(late).not.toHaveBeenCalled();
  });

  it('should finish queued work on shutdown and ignore later publishes', async () => {
    const broker = createBroker(1);
    const delivered: Activity[][] = [];
    broker.subscribe(TARGET_WALLET, async (batch) => {
      await Promise.resolve();
      delivered.push([...batch]);
    });

    broker.publish(TARGET_WALLET, [buildActivity()]);
    broker.publish(TARGET_WALLET, [buildActivity()]);
    await broker.shutdown();

    expect(delivered).toHaveLength(2);
    expect(broker.isClosed).toBe(true);

    const receipt = broker.publish(TARGET_WALLET, [buildActivity()]);
    expect(receipt.dispatched).toBe(0);
    expect(broker.getStats()).toMatchObject({ batchesPublished: 2, unitsDispatched: 2, closed: true });
  });
});
