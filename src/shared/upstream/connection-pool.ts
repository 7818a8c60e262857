/**
 * =============================================================================
 * UPSTREAM CONNECTION POOL
 * =============================================================================
 *
 * Fixed-size pools of venue API connections, one pool per role
 * (static venue data, dynamic venue data).
 *
 * READ PATH:
 * - acquire(role) hands out slots round-robin; no check-out, no blocking
 * - Health is never checked on the read path
 *
 * REPAIR:
 * - A background sweep probes every slot at a fixed interval
 * - A slot whose probe fails is closed and replaced at the same index
 * - If a sweep blows up it is logged and retried after SWEEP_RETRY_MS
 *
 * USAGE:
 * ```typescript
 * const pool = new UpstreamConnectionPool({ size: 5, ... });
 * pool.start();
 * const connection = pool.acquire(ConnectionRole.STATIC);
 * await pool.stop();
 * ```
 * =============================================================================
 */

import { CONNECTION_ROLES, ConnectionRole } from '../../core/constants';
import { describeError } from '../../core/errors/AppError';
import { logger } from '../services/logger.service';
import { ConnectionFactory, UpstreamConnection } from './upstream-connection';

const SWEEP_RETRY_MS = 5000;

export interface UpstreamPoolOptions {
  /** Slots per role */
  size: number;
  healthCheckIntervalMs: number;
  /** Venue whose data every probe requests */
  probeVenueSlug: string;
  connectionFactory: ConnectionFactory;
}

interface PoolSlot {
  connection: UpstreamConnection;
  healthy: boolean;
  replacements: number;
  lastCheckedAt: number | null;
}

export interface RolePoolStats {
  size: number;
  healthy: number;
  replacements: number;
}

export interface UpstreamPoolStats {
  running: boolean;
  sweeps: number;
  lastSweepAt: string | null;
  roles: Record<ConnectionRole, RolePoolStats>;
}

export class UpstreamConnectionPool {
  private readonly slots = new Map<ConnectionRole, PoolSlot[]>();
  private readonly cursors = new Map<ConnectionRole, number>();
  private sweepTimer: NodeJS.Timeout | null = null;
  private inFlightSweep: Promise<void> | null = null;
  private started = false;
  private stopped = false;
  private sweepCount = 0;
  private lastSweepAt: number | null = null;

  constructor(private readonly options: UpstreamPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${options.size}`);
    }
  }

  /**
   * Open every slot and schedule the first health sweep
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.stopped = false;

    for (const role of CONNECTION_ROLES) {
      const roleSlots: PoolSlot[] = [];
      for (let index = 0; index < this.options.size; index++) {
        roleSlots.push({
          connection: this.options.connectionFactory(role, index),
          healthy: true,
          replacements: 0,
          lastCheckedAt: null
        });
      }
      this.slots.set(role, roleSlots);
      this.cursors.set(role, 0);
    }

    logger.info('Upstream connection pool started', {
      size: this.options.size,
      healthCheckIntervalMs: this.options.healthCheckIntervalMs
    });

    this.scheduleSweep(this.options.healthCheckIntervalMs);
  }

  /**
   * Next connection for a role, round-robin
   */
  acquire(role: ConnectionRole): UpstreamConnection {
    const roleSlots = this.slots.get(role);
    if (!roleSlots || this.stopped) {
      throw new Error(`Upstream connection pool is not running (role ${role})`);
    }

    const cursor = this.cursors.get(role) ?? 0;
    this.cursors.set(role, (cursor + 1) % roleSlots.length);
    return roleSlots[cursor].connection;
  }

  /**
   * Probe every slot once, replacing the ones that fail
   */
  runHealthSweep(): Promise<void> {
    if (this.inFlightSweep) return this.inFlightSweep;

    const sweep = this.sweepAllSlots().finally(() => {
      this.inFlightSweep = null;
    });
    this.inFlightSweep = sweep;
    return sweep;
  }

  /**
   * Cancel the sweep, let a running one finish, close every slot
   */
  async stop(): Promise<void> {
    if (!this.started || this.stopped) return;
    this.stopped = true;

    if (this.sweepTimer) {
      clearTimeout(this.sweepTimer);
      this.sweepTimer = null;
    }

    if (this.inFlightSweep) {
      await this.inFlightSweep.catch(error => {
        logger.warn('Health sweep failed during pool shutdown', { error: describeError(error) });
      });
    }

    const connections = [...this.slots.values()].flat().map(slot => slot.connection);
    await Promise.all(connections.map(connection => this.closeQuietly(connection)));

    this.slots.clear();
    this.cursors.clear();
    this.started = false;
    logger.info('Upstream connection pool stopped', { closed: connections.length });
  }

  getStats(): UpstreamPoolStats {
    const roleStats = (role: ConnectionRole): RolePoolStats => {
      const roleSlots = this.slots.get(role) ?? [];
      return {
        size: roleSlots.length,
        healthy: roleSlots.filter(slot => slot.healthy).length,
        replacements: roleSlots.reduce((sum, slot) => sum + slot.replacements, 0)
      };
    };

    return {
      running: this.started && !this.stopped,
      sweeps: this.sweepCount,
      lastSweepAt: this.lastSweepAt === null ? null : new Date(this.lastSweepAt).toISOString(),
      roles: {
        [ConnectionRole.STATIC]: roleStats(ConnectionRole.STATIC),
        [ConnectionRole.DYNAMIC]: roleStats(ConnectionRole.DYNAMIC)
      }
    };
  }

  // ===========================================================================
  // SWEEP
  // ===========================================================================

  private scheduleSweep(delayMs: number): void {
    if (this.stopped) return;

    this.sweepTimer = setTimeout(() => {
      this.sweepTimer = null;
      this.runHealthSweep()
        .then(() => this.scheduleSweep(this.options.healthCheckIntervalMs))
        .catch(error => {
          logger.error('Upstream health sweep failed, retrying shortly', {
            error: describeError(error),
            retryInMs: SWEEP_RETRY_MS
          });
          this.scheduleSweep(SWEEP_RETRY_MS);
        });
    }, delayMs);
    this.sweepTimer.unref();
  }

  private async sweepAllSlots(): Promise<void> {
    const checks: Promise<void>[] = [];
    for (const [role, roleSlots] of this.slots) {
      roleSlots.forEach((_slot, index) => checks.push(this.checkSlot(role, roleSlots, index)));
    }
    await Promise.all(checks);

    this.sweepCount++;
    this.lastSweepAt = Date.now();
  }

  private async checkSlot(role: ConnectionRole, roleSlots: PoolSlot[], index: number): Promise<void> {
    const slot = roleSlots[index];
    const path = `/venues/${encodeURIComponent(this.options.probeVenueSlug)}/${role}`;
    const probe = await slot.connection.get(path);

    slot.lastCheckedAt = Date.now();
    const healthy = probe.ok && probe.value.status >= 200 && probe.value.status < 300;
    if (healthy) {
      slot.healthy = true;
      return;
    }

    slot.healthy = false;
    logger.warn('Upstream connection failed health check, replacing', {
      role,
      slot: index,
      reason: probe.ok ? `status ${probe.value.status}` : probe.error.message
    });

    await this.closeQuietly(slot.connection);
    if (this.stopped) return;

    roleSlots[index] = {
      connection: this.options.connectionFactory(role, index),
      healthy: true,
      replacements: slot.replacements + 1,
      lastCheckedAt: slot.lastCheckedAt
    };
  }

  private async closeQuietly(connection: UpstreamConnection): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      logger.warn('Failed to close upstream connection', {
        role: connection.role,
        slot: connection.slot,
        error: describeError(error)
      });
    }
  }
}
