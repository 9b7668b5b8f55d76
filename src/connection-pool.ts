/**
 * Keyed connection pool.
 * Keeps idle connections per PoolKey so requests to the same destination
 * avoid redundant TCP + TLS + SETTINGS handshakes.
 *
 * Multiplexed (HTTP/2) connections stay in the idle list while borrowed and
 * are handed to every concurrent acquirer; HTTP/1 connections are exclusive
 * between acquire and release.
 */
import { z } from "zod";
import { toError } from "./errors.js";
import type { Acquisition, ConnectionSource } from "./connection-acquirer.js";
import { poolKeyToString, type PoolKey } from "./pool-key.js";
import { isMultiplex } from "./session-protocol.js";
import { negotiatedProtocol, type PooledConnection } from "./session/session.js";

export interface KeyedConnectionPool<C extends PooledConnection = PooledConnection>
  extends ConnectionSource<C> {
  /**
   * Return a borrowed connection. Releasing a connection the pool does not
   * track is a no-op.
   */
  release(key: PoolKey, connection: C): void;
}

/** Opens and negotiates new connections for the pool. */
export interface ConnectionFactory<C extends PooledConnection = PooledConnection> {
  connect(key: PoolKey): Promise<C>;
}

export const ConnectionPoolOptionsSchema = z.object({
  /** Idle connections older than this are closed instead of reused (ms) */
  idleTimeoutMs: z.number().int().nonnegative().default(60_000),
  /** Max idle connections across all keys; the least recently used is evicted */
  maxIdleConnections: z.number().int().nonnegative().default(20),
});

export type ConnectionPoolOptions = z.input<typeof ConnectionPoolOptionsSchema>;

interface IdleEntry<C> {
  connection: C;
  key: string;
  lastUsedAt: number;
}

export class ConnectionPool<C extends PooledConnection = PooledConnection>
  implements KeyedConnectionPool<C>
{
  private readonly factory: ConnectionFactory<C>;
  private readonly idleTimeoutMs: number;
  private readonly maxIdleConnections: number;

  private readonly idle = new Map<string, IdleEntry<C>[]>();
  private readonly idleEntries = new Map<C, IdleEntry<C>>();
  /** Outstanding borrows per connection (above 1 only for multiplexed ones) */
  private readonly borrows = new Map<C, number>();
  private readonly watched = new WeakSet<C>();
  private closed = false;

  constructor(factory: ConnectionFactory<C>, options: ConnectionPoolOptions = {}) {
    const parsed = ConnectionPoolOptionsSchema.parse(options);
    this.factory = factory;
    this.idleTimeoutMs = parsed.idleTimeoutMs;
    this.maxIdleConnections = parsed.maxIdleConnections;
  }

  /** Number of connections currently waiting in the pool (shared ones included) */
  get idleCount(): number {
    return this.idleEntries.size;
  }

  /** Number of distinct connections currently borrowed */
  get borrowedCount(): number {
    return this.borrows.size;
  }

  acquire(key: PoolKey): Acquisition<C> {
    if (this.closed) {
      return { status: "failed", cause: new Error("Connection pool is closed") };
    }

    const k = poolKeyToString(key);
    const pooled = this.takeIdle(k);
    if (pooled) {
      this.borrow(k, pooled);
      return { status: "ready", connection: pooled };
    }

    let connecting: Promise<C>;
    try {
      connecting = this.factory.connect(key);
    } catch (err) {
      return { status: "failed", cause: toError(err) };
    }

    return {
      status: "pending",
      promise: connecting.then(connection => {
        if (this.closed) {
          connection.close();
          throw new Error("Connection pool is closed");
        }
        this.borrow(k, connection);
        return connection;
      }),
    };
  }

  release(key: PoolKey, connection: C): void {
    const count = this.borrows.get(connection);
    if (count === undefined) {
      console.debug(`[pool] release of untracked connection ${connection.id} ignored`);
      return;
    }
    if (count > 1) {
      this.borrows.set(connection, count - 1);
    } else {
      this.borrows.delete(connection);
    }

    const existing = this.idleEntries.get(connection);
    if (existing) {
      // Shared multiplexed connection: already in the idle list
      existing.lastUsedAt = Date.now();
      return;
    }

    if (this.closed || !isUsable(connection)) {
      connection.close();
      return;
    }
    this.addIdle(poolKeyToString(key), connection);
  }

  /**
   * Close all idle connections that are not borrowed. Useful for testing.
   */
  clear(): void {
    for (const entry of [...this.idleEntries.values()]) {
      this.removeIdle(entry);
      if (!this.borrows.has(entry.connection)) {
        entry.connection.close();
      }
    }
  }

  /** Clear the pool and refuse further acquisitions. Borrowed connections close on release. */
  close(): void {
    this.closed = true;
    this.clear();
  }

  private takeIdle(key: string): C | null {
    const list = this.idle.get(key);
    if (!list) return null;

    const now = Date.now();
    // Most recently used first
    for (let i = list.length - 1; i >= 0; i--) {
      const entry = list[i];
      const borrowed = this.borrows.has(entry.connection);

      if (now - entry.lastUsedAt > this.idleTimeoutMs || !isUsable(entry.connection)) {
        this.removeIdle(entry);
        if (!borrowed) entry.connection.close();
        continue;
      }

      entry.lastUsedAt = now;
      if (!isShared(entry.connection)) {
        this.removeIdle(entry);
      }
      return entry.connection;
    }
    return null;
  }

  private borrow(key: string, connection: C): void {
    this.borrows.set(connection, (this.borrows.get(connection) ?? 0) + 1);
    this.watch(connection);
    // A freshly negotiated multiplexed connection is shareable right away
    if (isShared(connection) && !this.idleEntries.has(connection)) {
      this.addIdle(key, connection);
    }
  }

  /**
   * Forget a connection as soon as it closes. A connection destroyed while
   * borrowed is never released, so this is the only way its borrow ends.
   */
  private watch(connection: C): void {
    if (this.watched.has(connection)) return;
    this.watched.add(connection);
    connection.onClose(() => {
      if (this.borrows.delete(connection)) {
        console.debug(`[pool] borrowed connection ${connection.id} closed`);
      }
      const entry = this.idleEntries.get(connection);
      if (entry) this.removeIdle(entry);
    });
  }

  private addIdle(key: string, connection: C): void {
    if (this.maxIdleConnections === 0) {
      if (!this.borrows.has(connection)) connection.close();
      return;
    }
    while (this.idleEntries.size >= this.maxIdleConnections) {
      this.evictOldest();
    }
    const entry: IdleEntry<C> = { connection, key, lastUsedAt: Date.now() };
    const list = this.idle.get(key);
    if (list) {
      list.push(entry);
    } else {
      this.idle.set(key, [entry]);
    }
    this.idleEntries.set(connection, entry);
  }

  private evictOldest(): void {
    let oldest: IdleEntry<C> | null = null;
    for (const entry of this.idleEntries.values()) {
      if (!oldest || entry.lastUsedAt < oldest.lastUsedAt) oldest = entry;
    }
    if (!oldest) return;
    console.debug(`[pool] evicting ${oldest.key} (${oldest.connection.id})`);
    this.removeIdle(oldest);
    if (!this.borrows.has(oldest.connection)) {
      oldest.connection.close();
    }
  }

  private removeIdle(entry: IdleEntry<C>): void {
    this.idleEntries.delete(entry.connection);
    const list = this.idle.get(entry.key);
    if (!list) return;
    const index = list.indexOf(entry);
    if (index >= 0) list.splice(index, 1);
    if (list.length === 0) this.idle.delete(entry.key);
  }
}

function isUsable(connection: PooledConnection): boolean {
  return connection.session.state.kind === "ready";
}

function isShared(connection: PooledConnection): boolean {
  const protocol = negotiatedProtocol(connection.session);
  return protocol !== null && isMultiplex(protocol);
}
