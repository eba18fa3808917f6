/**
 * Tests for CLI parsing and formatting
 */

import { InvalidArgumentError } from 'commander';

import {
  buildTestMessage,
  executeCommand,
  formatDispatchReport,
  formatStatus,
  formatValidation,
  parseCommandLine,
  parseIntervalOption
} from './cli';
import type { WatchdogActions } from '../host/types';

const AT = new Date(2024, 0, 15, 9, 30, 5).getTime();

function createActions(success: boolean) {
  const feed = vi.fn<WatchdogActions['feed']>(() => ({ success: success }));
  const stop = vi.fn<WatchdogActions['stop']>(() => ({ success: success }));
  const actions: WatchdogActions = { feed: feed, stop: stop };
  return { actions: actions, feed: feed, stop: stop };
}

describe('parseIntervalOption', () => {
  it('should parse a positive integer', () => {
    expect(parseIntervalOption('250')).toBe(250);
  });

  it.each(['0', '-5', '1.5', 'fast'])('should reject %s', (value) => {
    expect(() => parseIntervalOption(value)).toThrow(InvalidArgumentError);
  });
});

describe('parseCommandLine', () => {
  it('should parse a bare feed', () => {
    expect(parseCommandLine('feed')).toEqual({ kind: 'feed', param: undefined });
  });

  it('should keep the rest of the line as the parameter', () => {
    expect(parseCommandLine('  FEED {"timeout_ms": 5000, "info": "a b"}  '))
      .toEqual({ kind: 'feed', param: '{"timeout_ms": 5000, "info": "a b"}' });
  });

  it('should parse stop and status', () => {
    expect(parseCommandLine('stop job done')).toEqual({ kind: 'stop', param: 'job done' });
    expect(parseCommandLine('status')).toEqual({ kind: 'status' });
  });

  it('should mark blank lines and unknown commands', () => {
    expect(parseCommandLine('   ')).toEqual({ kind: 'empty' });
    expect(parseCommandLine('pet now')).toEqual({ kind: 'unknown', name: 'pet' });
  });
});

describe('executeCommand', () => {
  it('should feed with the parameter', () => {
    const { actions, feed } = createActions(true);

    expect(executeCommand({ kind: 'feed', param: 'job' }, actions, () => '')).toEqual({ ok: true, text: 'fed' });
    expect(feed).toHaveBeenCalledWith('job');
  });

  it('should report a rejected feed', () => {
    const { actions } = createActions(false);

    expect(executeCommand({ kind: 'feed', param: '{"timeout_ms":-1}' }, actions, () => ''))
      .toEqual({ ok: false, text: 'feed rejected' });
  });

  it('should report stop results', () => {
    expect(executeCommand({ kind: 'stop', param: undefined }, createActions(true).actions, () => ''))
      .toEqual({ ok: true, text: 'stopped' });
    expect(executeCommand({ kind: 'stop', param: undefined }, createActions(false).actions, () => ''))
      .toEqual({ ok: false, text: 'not running' });
  });

  it('should print the status line', () => {
    expect(executeCommand({ kind: 'status' }, createActions(true).actions, () => 'idle | timeout: 0ms'))
      .toEqual({ ok: true, text: 'idle | timeout: 0ms' });
  });

  it('should ignore blank lines and flag unknown commands', () => {
    const { actions } = createActions(true);

    expect(executeCommand({ kind: 'empty' }, actions, () => '')).toBeNull();
    expect(executeCommand({ kind: 'unknown', name: 'pet' }, actions, () => ''))
      .toEqual({ ok: false, text: 'Unknown command: pet (expected feed, stop, status)' });
  });
});

describe('formatStatus', () => {
  it('should describe an idle watchdog', () => {
    const snapshot = { running: false, timeoutMs: 1000, lastFeedTime: null, startInfo: '', timeoutOccurred: false };

    expect(formatStatus(snapshot, AT)).toBe('idle | timeout: 1000ms');
  });

  it('should describe a running watchdog', () => {
    const snapshot = { running: true, timeoutMs: 1000, lastFeedTime: AT, startInfo: 'job', timeoutOccurred: true };

    expect(formatStatus(snapshot, AT + 1250)).toBe(
      'running | timeout: 1000ms | last feed: 2024-01-15 09:30:05 (1250.0ms ago) | info: job | timeout signaled: yes'
    );
  });
});

describe('buildTestMessage', () => {
  it('should tag and timestamp the message', () => {
    expect(buildTestMessage(AT)).toBe('[WATCHDOG] Test Message\n\nTime: 2024-01-15 09:30:05');
  });
});

describe('formatDispatchReport', () => {
  it('should list attempts and the delivering channel', () => {
    const lines = formatDispatchReport({
      delivered: true,
      channel: 'slack',
      attempts: [
        { channel: 'telegram', ok: false, reason: 'rejected by channel' },
        { channel: 'slack', ok: true }
      ]
    });

    expect(lines).toEqual([
      { ok: false, text: 'telegram: failed (rejected by channel)' },
      { ok: true, text: 'slack: ok' },
      { ok: true, text: 'Delivered via slack' }
    ]);
  });

  it('should explain an empty dispatch', () => {
    expect(formatDispatchReport({ delivered: false, channel: null, attempts: [] })).toEqual([
      { ok: false, text: 'No notification channel is enabled' },
      { ok: false, text: 'Not delivered' }
    ]);
  });
});

describe('formatValidation', () => {
  it('should list errors, warnings and the verdict', () => {
    const lines = formatValidation({
      valid: false,
      errors: [{ field: 'POLL_INTERVAL_MS', message: 'too small' }],
      warnings: [{ field: 'CHANNELS', message: 'none enabled' }]
    });

    expect(lines).toEqual([
      { ok: false, text: 'error   [POLL_INTERVAL_MS]: too small' },
      { ok: true, text: 'warning [CHANNELS]: none enabled' },
      { ok: false, text: 'Configuration is invalid' }
    ]);
  });

  it('should report a valid configuration', () => {
    expect(formatValidation({ valid: true, errors: [], warnings: [] })).toEqual([{ ok: true, text: 'Configuration is valid' }]);
  });
});
