import { idleFor, isIdle, paneStatus, summarizeStatus } from '../../src/capture/detector.js';
import type { PaneRecord } from '../../src/types/index.js';

const NOW = new Date('2026-03-01T12:00:00Z');
const TEN_MINUTES = 10 * 60 * 1000;

function pane(id: string, msAgo: number): PaneRecord {
  return {
    id,
    command: 'claude',
    processId: '1',
    workingDirectory: '/w',
    lastOutputSnapshot: '',
    lastChangeAt: new Date(NOW.getTime() - msAgo),
  };
}

describe('idleFor', () => {
  it('measures time since the last output change', () => {
    expect(idleFor(pane('%1', 42_000), NOW)).toBe(42_000);
  });
});

describe('isIdle', () => {
  it('is false below the threshold', () => {
    expect(isIdle(pane('%1', TEN_MINUTES - 1), TEN_MINUTES, NOW)).toBe(false);
  });

  it('counts the exact threshold as idle', () => {
    expect(isIdle(pane('%1', TEN_MINUTES), TEN_MINUTES, NOW)).toBe(true);
  });

  it('is true past the threshold', () => {
    expect(isIdle(pane('%1', TEN_MINUTES + 5_000), TEN_MINUTES, NOW)).toBe(true);
  });

  it('treats a zero threshold as always idle', () => {
    expect(isIdle(pane('%1', 0), 0, NOW)).toBe(true);
  });
});

describe('paneStatus', () => {
  it('maps idleness to a status label', () => {
    expect(paneStatus(pane('%1', 1_000), TEN_MINUTES, NOW)).toBe('active');
    expect(paneStatus(pane('%2', TEN_MINUTES * 2), TEN_MINUTES, NOW)).toBe('idle');
  });
});

describe('summarizeStatus', () => {
  it('counts active and idle panes', () => {
    const panes = [pane('%1', 0), pane('%2', 60_000), pane('%3', 120_000), pane('%4', TEN_MINUTES)];

    expect(summarizeStatus(panes, TEN_MINUTES, NOW)).toBe('panewatch: 3 active, 1 idle');
  });

  it('reports zeros with no panes', () => {
    expect(summarizeStatus([], TEN_MINUTES, NOW)).toBe('panewatch: 0 active, 0 idle');
  });
});
