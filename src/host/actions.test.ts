/**
 * Unit tests for the watchdog trigger actions
 */

import { createFakeClock, createTestLogger } from '../test-utils';
import { createWatchdog } from '../watchdog/watchdog';
import { createWatchdogActions } from './actions';
import type { Watchdog } from '../watchdog/types';

function setup() {
  const clock = createFakeClock(0);
  const log = createTestLogger();
  const alerts = { enqueue: vi.fn<(text: string) => void>(), dispatch: vi.fn(async (_text: string) => true) };
  const watchdog = createWatchdog({ clock: clock.now, alerts: alerts, logger: log.logger });
  const actions = createWatchdogActions(watchdog, log.logger);
  return { watchdog: watchdog, actions: actions, log: log, clock: clock };
}

describe('createWatchdogActions', () => {
  describe('feed', () => {
    it('should arm the watchdog from a JSON parameter', () => {
      const { watchdog, actions } = setup();

      expect(actions.feed('{"timeout_ms":1000,"info":"job"}')).toEqual({ success: true });

      expect(watchdog.snapshot()).toMatchObject({ running: true, timeoutMs: 1000, startInfo: 'job' });
    });

    it('should arm with the default threshold from a plain string', () => {
      const { watchdog, actions } = setup();

      actions.feed('job');

      expect(watchdog.currentTimeoutMs()).toBe(30000);
      expect(watchdog.snapshot().startInfo).toBe('job');
    });

    it('should fail and log at DEBUG for an invalid timeout', () => {
      const { watchdog, actions, log } = setup();

      expect(actions.feed({ timeout_ms: -5 })).toEqual({ success: false });

      expect(watchdog.isRunning()).toBe(false);
      expect(log.linesAt(0)).toContain('Watchdog feed action rejected: timeout_ms must be a non-negative integer, got -5');
    });

    it('should fail when the watchdog throws', () => {
      const { log } = setup();
      const watchdog: Watchdog = {
        feed: () => { throw new Error('boom'); },
        poll: () => false,
        notify: async () => false,
        manualStop: () => false,
        isRunning: () => false,
        timeoutOccurred: () => false,
        currentTimeoutMs: () => 0,
        snapshot: () => ({ running: false, timeoutMs: 0, lastFeedTime: null, startInfo: '', timeoutOccurred: false })
      };
      const actions = createWatchdogActions(watchdog, log.logger);

      expect(actions.feed('x')).toEqual({ success: false });
      expect(log.linesAt(0)).toContain('Watchdog feed action exception: Error: boom');
    });

    it('should log the raw parameter at DEBUG', () => {
      const { actions, log } = setup();

      actions.feed('job');

      expect(log.linesAt(0)[0]).toBe('Watchdog feed action param: "job" (string)');
    });
  });

  describe('stop', () => {
    it('should fail when the watchdog is idle', () => {
      const { actions } = setup();

      expect(actions.stop('done')).toEqual({ success: false });
    });

    it('should stop a running watchdog', () => {
      const { watchdog, actions } = setup();
      actions.feed('job');

      expect(actions.stop('{"info":"done"}')).toEqual({ success: true });

      expect(watchdog.isRunning()).toBe(false);
    });
  });
});
