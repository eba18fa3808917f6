/**
 * Unit tests for the watchdog poller
 */

import { createAlertDispatcher } from '../notifications/dispatcher';
import { createNotificationRouter } from '../notifications/router';
import { createFakeClock, createTestLogger } from '../test-utils';
import { createWatchdog } from '../watchdog/watchdog';
import { createWatchdogPoller } from './poller';
import type { ChannelNotifier } from '../notifications/types';
import type { Watchdog } from '../watchdog/types';
import type { TimerAPI } from './types';

interface Deferred {
  promise: Promise<boolean>;
  resolve(value: boolean): void;
}

function deferred(): Deferred {
  let resolve: (value: boolean) => void = () => undefined;
  const promise = new Promise<boolean>((r) => { resolve = r; });
  return { promise: promise, resolve: resolve };
}

function createFakeTimer() {
  const callbacks = new Map<number, () => void>();
  let next = 1;
  const set = vi.fn((_ms: number, _repeat: boolean, callback: () => void): number => {
    const handle = next++;
    callbacks.set(handle, callback);
    return handle;
  });
  const clear = vi.fn((handle: number): void => {
    callbacks.delete(handle);
  });
  const timer: TimerAPI = { set: set, clear: clear };
  return {
    timer: timer,
    set: set,
    clear: clear,
    fire: () => callbacks.forEach((cb) => cb()),
    scheduled: () => callbacks.size
  };
}

function createStubWatchdog(pollResults: boolean[], notifyResult: () => Promise<boolean>) {
  const poll = vi.fn(() => pollResults.shift() ?? false);
  const notify = vi.fn(notifyResult);
  const watchdog: Watchdog = {
    feed: () => true,
    poll: poll,
    notify: notify,
    manualStop: () => false,
    isRunning: () => true,
    timeoutOccurred: () => false,
    currentTimeoutMs: () => 1000,
    snapshot: () => ({ running: true, timeoutMs: 1000, lastFeedTime: 0, startInfo: '', timeoutOccurred: false })
  };
  return { watchdog: watchdog, poll: poll, notify: notify };
}

describe('createWatchdogPoller', () => {
  it('should schedule a repeating tick at the configured interval', () => {
    const fake = createFakeTimer();
    const { watchdog } = createStubWatchdog([], async () => true);
    const poller = createWatchdogPoller(watchdog, fake.timer, { intervalMs: 250 }, createTestLogger().logger);

    poller.start();

    expect(fake.set).toHaveBeenCalledWith(250, true, expect.any(Function));
    expect(poller.isActive()).toBe(true);
  });

  it('should start only once', () => {
    const fake = createFakeTimer();
    const { watchdog } = createStubWatchdog([], async () => true);
    const poller = createWatchdogPoller(watchdog, fake.timer, { intervalMs: 250 }, createTestLogger().logger);

    poller.start();
    poller.start();

    expect(fake.set).toHaveBeenCalledTimes(1);
  });

  it('should poll without notifying while healthy', async () => {
    const fake = createFakeTimer();
    const { watchdog, poll, notify } = createStubWatchdog([false], async () => true);
    const poller = createWatchdogPoller(watchdog, fake.timer, { intervalMs: 250 }, createTestLogger().logger);

    await poller.tick();

    expect(poll).toHaveBeenCalledTimes(1);
    expect(notify).not.toHaveBeenCalled();
  });

  it('should notify when poll reports a timeout', async () => {
    const fake = createFakeTimer();
    const { watchdog, notify } = createStubWatchdog([true], async () => true);
    const poller = createWatchdogPoller(watchdog, fake.timer, { intervalMs: 250 }, createTestLogger().logger);

    await poller.tick();

    expect(notify).toHaveBeenCalledTimes(1);
  });

  it('should run a tick when the timer fires', async () => {
    const fake = createFakeTimer();
    const { watchdog, poll } = createStubWatchdog([], async () => true);
    const poller = createWatchdogPoller(watchdog, fake.timer, { intervalMs: 250 }, createTestLogger().logger);
    poller.start();

    fake.fire();
    await poller.stop();

    expect(poll).toHaveBeenCalledTimes(1);
  });

  it('should poll on every tick while a timeout alert is still being delivered', async () => {
    const fake = createFakeTimer();
    const gate = deferred();
    const { watchdog, poll, notify } = createStubWatchdog([true, true], () => gate.promise);
    const poller = createWatchdogPoller(watchdog, fake.timer, { intervalMs: 250 }, createTestLogger().logger);

    const first = poller.tick();
    const second = poller.tick();

    expect(poll).toHaveBeenCalledTimes(2);
    expect(notify).toHaveBeenCalledTimes(2);

    gate.resolve(true);
    await Promise.all([first, second]);
  });

  it('should detect a re-armed episode while the first alert is undelivered', async () => {
    const fake = createFakeTimer();
    const clock = createFakeClock(0);
    const log = createTestLogger();
    const gate = deferred();
    const sent: string[] = [];
    const notifier: ChannelNotifier = {
      channel: 'slack',
      sendMessage: (text) => {
        sent.push(text.split('\n')[0]);
        return gate.promise;
      }
    };
    const router = createNotificationRouter(
      { defaultNotificationChannel: () => 'slack', enabledChannels: () => ['slack'] },
      () => notifier,
      log.logger
    );
    const alerts = createAlertDispatcher(router, log.logger);
    const watchdog = createWatchdog({ clock: clock.now, alerts: alerts, logger: log.logger });
    const poller = createWatchdogPoller(watchdog, fake.timer, { intervalMs: 100 }, log.logger);

    watchdog.feed(1000, 'first');
    clock.set(1100);
    const firstTick = poller.tick();
    expect(watchdog.isRunning()).toBe(false);

    watchdog.feed(500, 'second');
    clock.set(2000);
    const poll = vi.spyOn(watchdog, 'poll');
    const secondTick = poller.tick();

    expect(poll).toHaveReturnedWith(true);
    expect(watchdog.isRunning()).toBe(false);

    gate.resolve(true);
    await Promise.all([firstTick, secondTick, poller.stop()]);
    await alerts.drain();

    expect(sent).toEqual([
      '[WATCHDOG] Auto-Started',
      '[WATCHDOG] Timeout Alert!',
      '[WATCHDOG] Auto-Stopped',
      '[WATCHDOG] Auto-Started',
      '[WATCHDOG] Timeout Alert!',
      '[WATCHDOG] Auto-Stopped'
    ]);
  });

  it('should warn when the timeout alert was not delivered', async () => {
    const fake = createFakeTimer();
    const log = createTestLogger();
    const { watchdog } = createStubWatchdog([true], async () => false);
    const poller = createWatchdogPoller(watchdog, fake.timer, { intervalMs: 250 }, log.logger);

    await poller.tick();

    expect(log.linesAt(2)).toEqual(['Watchdog timeout alert was not delivered by any channel']);
  });

  it('should log and survive a failing check', async () => {
    const fake = createFakeTimer();
    const log = createTestLogger();
    const { watchdog } = createStubWatchdog([true], async () => {
      throw new Error('queue closed');
    });
    const poller = createWatchdogPoller(watchdog, fake.timer, { intervalMs: 250 }, log.logger);

    await expect(poller.tick()).resolves.toBeUndefined();

    expect(log.linesAt(2)).toEqual(['Watchdog poll error: Error: queue closed']);
  });

  it('should cancel the timer and wait for the pending delivery on stop', async () => {
    const fake = createFakeTimer();
    const gate = deferred();
    const { watchdog } = createStubWatchdog([true], () => gate.promise);
    const poller = createWatchdogPoller(watchdog, fake.timer, { intervalMs: 250 }, createTestLogger().logger);
    poller.start();
    const tick = poller.tick();

    let stopped = false;
    const stopping = poller.stop().then(() => { stopped = true; });
    await Promise.resolve();

    expect(fake.scheduled()).toBe(0);
    expect(poller.isActive()).toBe(false);
    expect(stopped).toBe(false);

    gate.resolve(true);
    await stopping;
    await tick;
    expect(stopped).toBe(true);
  });
});
