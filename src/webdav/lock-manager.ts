import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../logging/logger.js';
import type { LockScope, WebDAVLock } from './types.js';

export interface LockManagerOptions {
  defaultTimeout: number; // seconds
  maxTimeout: number;     // seconds
  sweepInterval: number;  // ms, 0 disables the timer
}

export interface LockRequest {
  /** Seconds asked for by the client; undefined means the default, Infinity the maximum. */
  timeout?: number;
  /** Token from the `If` header, present when the client refreshes its lock. */
  presentedToken?: string | null;
  owner?: string;
  scope?: LockScope;
  depth?: '0' | 'infinity';
}

export type UnlockResult = { ok: true } | { ok: false; reason: 'not-locked' | 'token-mismatch' };

/**
 * Lock tokens per resource path.
 *
 * Locks are advisory: LOCK is always granted, and no write is ever refused
 * because a path is locked. Clients such as macOS Finder only mount a share
 * read-write when LOCK succeeds; this table gives them consistent tokens to
 * refresh and release, not mutual exclusion. A LOCK that does not present the
 * live token replaces it, so each path has at most one live token.
 *
 * Every method is synchronous, so each read-modify-write of the table runs to
 * completion before any other request is served.
 */
export class LockManager {
  private locks: Map<string, WebDAVLock> = new Map(); // path -> lock
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(
    private options: LockManagerOptions,
    private logger: Logger,
    private now: () => number = Date.now
  ) {
    if (options.sweepInterval > 0) {
      this.cleanupInterval = setInterval(() => {
        this.cleanupExpiredLocks();
      }, options.sweepInterval);
      this.cleanupInterval.unref();
    }
  }

  generateLockToken(): string {
    return `opaquelocktoken:${uuidv4()}`;
  }

  lock(path: string, request: LockRequest = {}): WebDAVLock {
    const normalizedPath = this.normalizePath(path);
    const timeout = this.boundTimeout(request.timeout);
    const existing = this.getLock(normalizedPath);

    if (existing && request.presentedToken === existing.token) {
      existing.timeout = timeout;
      existing.expiresAt = new Date(this.now() + timeout * 1000);
      this.logger.trace('locks', `🔄 Refreshed lock on ${normalizedPath}`, { token: existing.token, timeout });
      return existing;
    }

    if (existing) {
      this.logger.trace('locks', `♻️ Replacing lock on ${normalizedPath}`, { previous: existing.token });
    }

    const lock: WebDAVLock = {
      token: this.generateLockToken(),
      path: normalizedPath,
      owner: request.owner ?? 'unknown',
      scope: request.scope ?? 'exclusive',
      depth: request.depth ?? 'infinity',
      timeout,
      expiresAt: new Date(this.now() + timeout * 1000),
    };
    this.locks.set(normalizedPath, lock);
    this.logger.trace('locks', `🔒 Locked ${normalizedPath}`, { token: lock.token, timeout });
    return lock;
  }

  unlock(path: string, token: string): UnlockResult {
    const normalizedPath = this.normalizePath(path);
    const lock = this.getLock(normalizedPath);
    if (!lock) {
      return { ok: false, reason: 'not-locked' };
    }
    if (lock.token !== token) {
      return { ok: false, reason: 'token-mismatch' };
    }
    this.locks.delete(normalizedPath);
    this.logger.trace('locks', `🔓 Unlocked ${normalizedPath}`, { token });
    return { ok: true };
  }

  /** Live lock of a path, dropping it first when it has expired. */
  getLock(path: string): WebDAVLock | undefined {
    const normalizedPath = this.normalizePath(path);
    const lock = this.locks.get(normalizedPath);
    if (lock && this.isExpired(lock)) {
      this.locks.delete(normalizedPath);
      this.logger.trace('locks', `⌛ Lock on ${normalizedPath} expired`, { token: lock.token });
      return undefined;
    }
    return lock;
  }

  /**
   * Remove all locks on a path and below it (used when a resource is deleted)
   */
  release(path: string): void {
    const normalizedPath = this.normalizePath(path);
    for (const lockedPath of [...this.locks.keys()]) {
      if (this.isWithin(lockedPath, normalizedPath)) {
        this.locks.delete(lockedPath);
      }
    }
  }

  /**
   * Move locks from one subtree to another (used when a resource is moved)
   */
  transfer(fromPath: string, toPath: string): void {
    const from = this.normalizePath(fromPath);
    const to = this.normalizePath(toPath);
    this.release(to);

    for (const [lockedPath, lock] of [...this.locks.entries()]) {
      if (this.isWithin(lockedPath, from)) {
        const movedPath = to + lockedPath.slice(from.length);
        this.locks.delete(lockedPath);
        lock.path = movedPath;
        this.locks.set(movedPath, lock);
      }
    }
  }

  get size(): number {
    return this.locks.size;
  }

  cleanupExpiredLocks(): void {
    for (const [path, lock] of [...this.locks.entries()]) {
      if (this.isExpired(lock)) {
        this.locks.delete(path);
      }
    }
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.locks.clear();
  }

  private boundTimeout(requested: number | undefined): number {
    if (requested === undefined || Number.isNaN(requested) || requested <= 0) {
      return Math.min(this.options.defaultTimeout, this.options.maxTimeout);
    }
    return Math.min(requested, this.options.maxTimeout);
  }

  private isWithin(candidate: string, root: string): boolean {
    return root === '/' || candidate === root || candidate.startsWith(root + '/');
  }

  private normalizePath(path: string): string {
    let normalized = path;
    if (!normalized.startsWith('/')) {
      normalized = '/' + normalized;
    }
    // Remove trailing slash except for root
    if (normalized.length > 1 && normalized.endsWith('/')) {
      normalized = normalized.slice(0, -1);
    }
    return normalized;
  }

  private isExpired(lock: WebDAVLock): boolean {
    return this.now() >= lock.expiresAt.getTime();
  }
}
