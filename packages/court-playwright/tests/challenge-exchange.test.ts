import { describe, it, expect, vi, afterEach } from 'vitest';
import { ChallengeExchange } from '../src/core/challenge-exchange.js';
import { CancelledError, ChallengeTimeoutError } from '../src/core/errors.js';
import type { ChallengeArtifact, PendingChallenge } from '../src/types/index.js';

const artifact: ChallengeArtifact = {
  kind: 'text',
  text: 'K7P2',
  pageUrl: 'https://court.test/app/case-status',
  detectedAt: new Date('2024-01-01T00:00:00Z'),
  expiresIn: 300,
};

describe('ChallengeExchange', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the supplied code', async () => {
    const exchange = new ChallengeExchange();
    const waiting = exchange.waitForCode('attempt-1', artifact, 1000);

    expect(exchange.supply('attempt-1', '  K7P2 ')).toBe(true);
    await expect(waiting).resolves.toBe('K7P2');
    expect(exchange.getPending('attempt-1')).toBeNull();
  });

  it('should announce the pending challenge', async () => {
    const exchange = new ChallengeExchange();
    const seen: PendingChallenge[] = [];
    exchange.on('challenge:pending', (challenge) => seen.push(challenge));

    const waiting = exchange.waitForCode('attempt-1', artifact, 1000);

    expect(seen).toHaveLength(1);
    expect(seen[0]?.attemptId).toBe('attempt-1');
    expect(seen[0]?.artifact).toBe(artifact);
    expect(exchange.listPending()).toEqual(seen);

    exchange.supply('attempt-1', 'K7P2');
    await waiting;
  });

  it('should refuse codes for unknown attempts, stale challenges and blank input', async () => {
    const exchange = new ChallengeExchange();
    const waiting = exchange.waitForCode('attempt-1', artifact, 1000);
    const pending = exchange.getPending('attempt-1');

    expect(exchange.supply('attempt-2', 'K7P2')).toBe(false);
    expect(exchange.supply('attempt-1', 'K7P2', 'some-older-challenge')).toBe(false);
    expect(exchange.supply('attempt-1', '   ')).toBe(false);
    expect(exchange.supply('attempt-1', 'K7P2', pending?.challengeId)).toBe(true);
    await expect(waiting).resolves.toBe('K7P2');
  });

  it('should reject with ChallengeTimeoutError when nobody answers', async () => {
    vi.useFakeTimers();
    const exchange = new ChallengeExchange();
    const waiting = exchange.waitForCode('attempt-1', artifact, 5000);
    const assertion = expect(waiting).rejects.toBeInstanceOf(ChallengeTimeoutError);

    await vi.advanceTimersByTimeAsync(5000);
    await assertion;
    expect(exchange.listPending()).toEqual([]);
  });

  it('should reject with the abort reason when the signal fires', async () => {
    const exchange = new ChallengeExchange();
    const controller = new AbortController();
    const waiting = exchange.waitForCode('attempt-1', artifact, 1000, controller.signal);

    controller.abort(new CancelledError('stopped by user'));

    await expect(waiting).rejects.toThrow('stopped by user');
    expect(exchange.getPending('attempt-1')).toBeNull();
  });

  it('should reject at once when the signal already fired', async () => {
    const exchange = new ChallengeExchange();
    const controller = new AbortController();
    controller.abort();

    await expect(exchange.waitForCode('attempt-1', artifact, 1000, controller.signal))
      .rejects.toBeInstanceOf(CancelledError);
    expect(exchange.listPending()).toEqual([]);
  });

  it('should cancel everything on close', async () => {
    const exchange = new ChallengeExchange();
    const first = exchange.waitForCode('attempt-1', artifact, 1000);
    const second = exchange.waitForCode('attempt-2', artifact, 1000);

    exchange.close();
    const results = await Promise.allSettled([first, second]);

    expect(results.map((result) => result.status)).toEqual(['rejected', 'rejected']);
    for (const result of results) {
      if (result.status === 'rejected') expect(result.reason).toBeInstanceOf(CancelledError);
    }
    expect(exchange.listPending()).toEqual([]);
  });
});
