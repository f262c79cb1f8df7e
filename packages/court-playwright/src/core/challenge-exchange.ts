/**
 * Challenge exchange (human-in-the-loop)
 *
 * The orchestrator parks on `waitForCode` while the challenge is shown to
 * a person; whoever holds the attempt id answers through `supply`.
 */

import { randomUUID } from 'crypto';
import { EventEmitter } from 'eventemitter3';
import type { ChallengeArtifact, ChallengeEvents, PendingChallenge } from '../types/index.js';
import { CancelledError, ChallengeTimeoutError, SearchError } from './errors.js';

interface PendingEntry {
  challenge: PendingChallenge;
  resolve: (code: string) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
  detach: () => void;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof SearchError ? signal.reason : new CancelledError();
}

export class ChallengeExchange extends EventEmitter<ChallengeEvents> {
  private pending = new Map<string, PendingEntry>();

  /**
   * Registers the challenge of `attemptId` and resolves with the code
   * supplied for it. Rejects with ChallengeTimeoutError after `timeoutMs`,
   * or with the signal's reason when the attempt is aborted.
   */
  waitForCode(
    attemptId: string,
    artifact: ChallengeArtifact,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<string> {
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    // an attempt shows one challenge at a time
    this.cancel(attemptId, new CancelledError('The challenge was replaced by a newer one'));

    const challenge: PendingChallenge = {
      attemptId,
      challengeId: randomUUID(),
      artifact,
      expiresAt: new Date(Date.now() + timeoutMs),
    };

    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        if (signal) this.cancel(attemptId, abortReason(signal));
      };

      const timeout = setTimeout(() => {
        this.remove(attemptId);
        this.emit('challenge:cleared', { attemptId, challengeId: challenge.challengeId, reason: 'timeout' });
        reject(new ChallengeTimeoutError(timeoutMs));
      }, timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.set(attemptId, {
        challenge,
        resolve,
        reject,
        timeout,
        detach: () => signal?.removeEventListener('abort', onAbort),
      });

      this.emit('challenge:pending', challenge);
    });
  }

  /**
   * Delivers a code. Returns false when nothing is pending for the attempt
   * or the code answers a challenge that has since been replaced.
   */
  supply(attemptId: string, code: string, challengeId?: string): boolean {
    const entry = this.pending.get(attemptId);
    if (!entry) return false;
    if (challengeId && challengeId !== entry.challenge.challengeId) return false;

    const value = code.trim();
    if (!value) return false;

    this.remove(attemptId);
    this.emit('challenge:answered', { attemptId, challengeId: entry.challenge.challengeId });
    entry.resolve(value);
    return true;
  }

  getPending(attemptId: string): PendingChallenge | null {
    return this.pending.get(attemptId)?.challenge ?? null;
  }

  listPending(): PendingChallenge[] {
    return [...this.pending.values()].map((entry) => entry.challenge);
  }

  /** Rejects the waiting attempt. Returns false when nothing was pending. */
  cancel(attemptId: string, reason: Error = new CancelledError()): boolean {
    const entry = this.pending.get(attemptId);
    if (!entry) return false;

    this.remove(attemptId);
    this.emit('challenge:cleared', { attemptId, challengeId: entry.challenge.challengeId, reason: 'cancelled' });
    entry.reject(reason);
    return true;
  }

  /** Cancels everything still waiting */
  close(): void {
    for (const attemptId of [...this.pending.keys()]) {
      this.cancel(attemptId, new CancelledError('The service is shutting down'));
    }
  }

  private remove(attemptId: string): void {
    const entry = this.pending.get(attemptId);
    if (!entry) return;
    clearTimeout(entry.timeout);
    entry.detach();
    this.pending.delete(attemptId);
  }
}
