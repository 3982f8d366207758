import crypto from 'crypto';
import { AppError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/** Serialises turns that target the same conversation id. */
export interface TurnLock {
  withLock<T>(conversationId: string, work: () => Promise<T>): Promise<T>;
}

export class InProcessTurnLock implements TurnLock {
  private tails = new Map<string, Promise<void>>();

  async withLock<T>(conversationId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(conversationId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(conversationId, tail);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.tails.get(conversationId) === tail) {
        this.tails.delete(conversationId);
      }
    }
  }
}

const LOCK_PREFIX = 'lock:conversation:';
const DEFAULT_TTL_MS = 30000;
const DEFAULT_RETRY_MS = 50;
const DEFAULT_WAIT_MS = 10000;

// Both scripts act only while the key still holds the caller's token.
export const RENEW_SCRIPT = `if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('pexpire', KEYS[1], ARGV[2])
end
return 0`;

export const RELEASE_SCRIPT = `if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
end
return 0`;

/** The Redis commands the lock needs; the node-redis client satisfies it. */
export interface LockCommands {
  set(key: string, value: string, options: { NX: true; PX: number }): Promise<unknown>;
  eval(script: string, options: { keys: string[]; arguments: string[] }): Promise<unknown>;
}

export interface RedisTurnLockOptions {
  ttlMs?: number;
  retryMs?: number;
  waitMs?: number;
}

/**
 * Cross-process lock: SET NX PX with a per-turn token. The lease is renewed
 * while the turn runs and released with a compare-and-delete script.
 */
export class RedisTurnLock implements TurnLock {
  private ttlMs: number;
  private retryMs: number;
  private waitMs: number;

  constructor(private redis: LockCommands, options: RedisTurnLockOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.retryMs = options.retryMs ?? DEFAULT_RETRY_MS;
    this.waitMs = options.waitMs ?? DEFAULT_WAIT_MS;
  }

  async withLock<T>(conversationId: string, work: () => Promise<T>): Promise<T> {
    const key = `${LOCK_PREFIX}${conversationId}`;
    const token = crypto.randomUUID();
    const deadline = Date.now() + this.waitMs;

    while ((await this.redis.set(key, token, { NX: true, PX: this.ttlMs })) !== 'OK') {
      if (Date.now() >= deadline) {
        throw new AppError(409, 'Conversation is busy, try again');
      }
      await new Promise((resolve) => setTimeout(resolve, this.retryMs));
    }

    const renewal = setInterval(() => {
      void this.renew(key, token);
    }, Math.max(1, Math.floor(this.ttlMs / 3)));
    renewal.unref();

    try {
      return await work();
    } finally {
      clearInterval(renewal);
      await this.release(key, token);
    }
  }

  private async renew(key: string, token: string): Promise<void> {
    try {
      const renewed = await this.redis.eval(RENEW_SCRIPT, { keys: [key], arguments: [token, String(this.ttlMs)] });
      if (renewed !== 1) {
        logger.warn('Conversation lock lost before the turn finished', { key });
      }
    } catch (error: unknown) {
      logger.warn('Conversation lock renewal failed', { key, error: errorMessage(error) });
    }
  }

  private async release(key: string, token: string): Promise<void> {
    try {
      await this.redis.eval(RELEASE_SCRIPT, { keys: [key], arguments: [token] });
    } catch (error: unknown) {
      logger.warn('Conversation lock release failed', { key, error: errorMessage(error) });
    }
  }
}
