/**
 * =============================================================================
 * UPSTREAM CONNECTION POOL - Unit Tests
 * =============================================================================
 *
 * Round-robin hand-out and in-place repair, over in-memory connections.
 * =============================================================================
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() }
}));

import { ConnectionRole } from '../core/constants';
import { UpstreamFailureError } from '../core/errors/AppError';
import { Result, err, ok } from '../core/result';
import { logger } from '../shared/services/logger.service';
import { UpstreamConnectionPool, UpstreamPoolOptions } from '../shared/upstream/connection-pool';
import { ConnectionFactory, UpstreamConnection, UpstreamResponse } from '../shared/upstream/upstream-connection';
import { waitFor } from './helpers/test-utils';

// =============================================================================
// TEST DOUBLES
// =============================================================================

class FakeConnection implements UpstreamConnection {
  probeStatus = 200;
  transportError: string | null = null;
  closeError: Error | null = null;
  readonly probedPaths: string[] = [];
  private isClosed = false;

  constructor(readonly role: ConnectionRole, readonly slot: number, readonly generation: number) {}

  get closed(): boolean {
    return this.isClosed;
  }

  async get(path: string): Promise<Result<UpstreamResponse, UpstreamFailureError>> {
    this.probedPaths.push(path);
    if (this.transportError) {
      return err(new UpstreamFailureError(this.transportError));
    }
    return ok({ status: this.probeStatus, data: {} });
  }

  async close(): Promise<void> {
    this.isClosed = true;
    if (this.closeError) throw this.closeError;
  }
}

interface FakeFactory {
  factory: ConnectionFactory;
  created: FakeConnection[];
}

function fakeFactory(): FakeFactory {
  const created: FakeConnection[] = [];
  const factory: ConnectionFactory = (role, slot) => {
    const generation = created.filter(c => c.role === role && c.slot === slot).length;
    const connection = new FakeConnection(role, slot, generation);
    created.push(connection);
    return connection;
  };
  return { factory, created };
}

function createPool(overrides: Partial<UpstreamPoolOptions> = {}): { pool: UpstreamConnectionPool; created: FakeConnection[] } {
  const { factory, created } = fakeFactory();
  const pool = new UpstreamConnectionPool({
    size: 3,
    healthCheckIntervalMs: 60000,
    probeVenueSlug: 'probe venue',
    connectionFactory: factory,
    ...overrides
  });
  return { pool, created };
}

function slotOf(created: FakeConnection[], role: ConnectionRole, slot: number, generation: number): FakeConnection {
  const match = created.find(c => c.role === role && c.slot === slot && c.generation === generation);
  if (!match) throw new Error(`no connection ${role}/${slot}/${generation}`);
  return match;
}

// =============================================================================
// TESTS
// =============================================================================

describe('UpstreamConnectionPool', () => {
  let pool: UpstreamConnectionPool;
  let created: FakeConnection[];

  beforeEach(() => {
    jest.clearAllMocks();
    ({ pool, created } = createPool());
  });

  afterEach(async () => {
    await pool.stop();
  });

  it('rejects a size below one', () => {
    expect(() => createPool({ size: 0 })).toThrow('Pool size must be a positive integer, got 0');
  });

  it('refuses to hand out connections before start', () => {
    expect(() => pool.acquire(ConnectionRole.STATIC)).toThrow(
      'Upstream connection pool is not running (role static)'
    );
  });

  it('opens size connections per role on start', () => {
    pool.start();

    expect(created).toHaveLength(6);
    expect(pool.getStats()).toEqual({
      running: true,
      sweeps: 0,
      lastSweepAt: null,
      roles: {
        static: { size: 3, healthy: 3, replacements: 0 },
        dynamic: { size: 3, healthy: 3, replacements: 0 }
      }
    });
  });

  it('hands out each role round-robin, independently', () => {
    pool.start();

    const staticSlots = [0, 1, 2, 3].map(() => pool.acquire(ConnectionRole.STATIC).slot);
    const dynamicSlots = [0, 1].map(() => pool.acquire(ConnectionRole.DYNAMIC).slot);

    expect(staticSlots).toEqual([0, 1, 2, 0]);
    expect(dynamicSlots).toEqual([0, 1]);
    expect(pool.acquire(ConnectionRole.STATIC).role).toBe(ConnectionRole.STATIC);
  });

  it('probes every slot with the probe venue', async () => {
    pool.start();
    await pool.runHealthSweep();

    expect(slotOf(created, ConnectionRole.STATIC, 1, 0).probedPaths).toEqual(['/venues/probe%20venue/static']);
    expect(slotOf(created, ConnectionRole.DYNAMIC, 2, 0).probedPaths).toEqual(['/venues/probe%20venue/dynamic']);
    expect(pool.getStats().sweeps).toBe(1);
    expect(pool.getStats().lastSweepAt).not.toBeNull();
  });

  it('replaces a failing slot at the same index', async () => {
    pool.start();
    const failing = slotOf(created, ConnectionRole.STATIC, 1, 0);
    failing.probeStatus = 503;

    await pool.runHealthSweep();

    expect(failing.closed).toBe(true);
    const replacement = slotOf(created, ConnectionRole.STATIC, 1, 1);
    expect(replacement.closed).toBe(false);

    const handedOut = [0, 1, 2].map(() => pool.acquire(ConnectionRole.STATIC));
    expect(handedOut[1]).toBe(replacement);
    expect(pool.getStats().roles.static).toEqual({ size: 3, healthy: 3, replacements: 1 });
    expect(pool.getStats().roles.dynamic.replacements).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith('Upstream connection failed health check, replacing', {
      role: ConnectionRole.STATIC,
      slot: 1,
      reason: 'status 503'
    });
  });

  it('replaces a slot whose probe cannot connect', async () => {
    pool.start();
    slotOf(created, ConnectionRole.DYNAMIC, 0, 0).transportError = 'Request timed out';

    await pool.runHealthSweep();

    expect(pool.getStats().roles.dynamic.replacements).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('Upstream connection failed health check, replacing', {
      role: ConnectionRole.DYNAMIC,
      slot: 0,
      reason: 'Request timed out'
    });
  });

  it('logs a connection that fails to close and still replaces it', async () => {
    pool.start();
    const failing = slotOf(created, ConnectionRole.STATIC, 2, 0);
    failing.probeStatus = 500;
    failing.closeError = new Error('socket stuck');

    await expect(pool.runHealthSweep()).resolves.toBeUndefined();

    expect(logger.warn).toHaveBeenCalledWith('Failed to close upstream connection', {
      role: ConnectionRole.STATIC,
      slot: 2,
      error: 'socket stuck'
    });
    expect(pool.getStats().roles.static.replacements).toBe(1);
  });

  it('rejects the sweep when a replacement cannot be opened', async () => {
    const failingFactory: ConnectionFactory = (role, slot) => {
      if (created.length >= 6) throw new Error('cannot open');
      const connection = new FakeConnection(role, slot, 0);
      created.push(connection);
      return connection;
    };
    ({ pool, created } = createPool({ connectionFactory: failingFactory }));
    created.length = 0;
    pool.start();
    created[0].probeStatus = 500;

    await expect(pool.runHealthSweep()).rejects.toThrow('cannot open');
  });

  it('shares one in-flight sweep between callers', () => {
    pool.start();
    expect(pool.runHealthSweep()).toBe(pool.runHealthSweep());
  });

  it('closes every connection on stop', async () => {
    pool.start();
    await pool.stop();

    expect(created.every(connection => connection.closed)).toBe(true);
    expect(pool.getStats().running).toBe(false);
    expect(() => pool.acquire(ConnectionRole.DYNAMIC)).toThrow(
      'Upstream connection pool is not running (role dynamic)'
    );
  });

  it('sweeps on its own at the configured interval', async () => {
    ({ pool, created } = createPool({ healthCheckIntervalMs: 20 }));
    pool.start();
    slotOf(created, ConnectionRole.STATIC, 0, 0).probeStatus = 404;

    await waitFor(() => pool.getStats().sweeps >= 2);

    expect(pool.getStats().roles.static.replacements).toBe(1);
  });
});
