/**
 * =============================================================================
 * BALANCER MODULE - LOAD BALANCER
 * =============================================================================
 *
 * Owns the pricing instances, probes them, and forwards client requests to
 * the healthy ones in round-robin order.
 *
 * INSTANCE STATE:
 *   starting → healthy ⇄ unhealthy
 *
 * HEALTHY SET:
 * - Ordered list of ports; probes append recovered instances at the end and
 *   drop failing ones
 * - The round-robin cursor is taken modulo the set's current size on every
 *   selection, so it stays valid while the set shrinks and grows
 *
 * Responses from instances are relayed verbatim: status, body, content type.
 * =============================================================================
 */

import http from 'http';
import axios, { AxiosInstance } from 'axios';
import { HTTP_STATUS, InstanceStatus } from '../../core/constants';
import { BalancerError, NoHealthyBackendsError, describeError } from '../../core/errors/AppError';
import { Result, err, ok } from '../../core/result';
import { logger } from '../../shared/services/logger.service';
import { InstanceLauncher, LaunchedInstance } from './instance-launcher';

export interface LoadBalancerOptions {
  host: string;
  pricingEndpoint: string;
  instances: number;
  instancePortStart: number;
  healthCheckIntervalMs: number;
  requestTimeoutMs: number;
  launcher: InstanceLauncher;
}

interface BackendInstance {
  port: number;
  status: InstanceStatus;
  lastCheckedAt: number | null;
  handle: LaunchedInstance | null;
  client: AxiosInstance | null;
  agent: http.Agent | null;
}

export interface ForwardedResponse {
  port: number;
  status: number;
  body: string;
  contentType?: string;
}

export type ForwardError = NoHealthyBackendsError | BalancerError;

export interface InstanceStatusView {
  port: number;
  status: InstanceStatus;
  lastCheckedAt: string | null;
}

export interface BalancerStatus {
  running: boolean;
  mode: string;
  healthyPorts: number[];
  instances: InstanceStatusView[];
}

export class LoadBalancer {
  private instances: BackendInstance[] = [];
  private healthyPorts: number[] = [];
  private cursor = 0;
  private healthTimer: NodeJS.Timeout | null = null;
  private inFlightCheck: Promise<void> | null = null;
  private startup: Promise<void> | null = null;
  private running = false;

  constructor(private readonly options: LoadBalancerOptions) {}

  /**
   * Launch every instance, mark them healthy, start the probe loop.
   * Calling it again returns the same startup.
   */
  start(): Promise<void> {
    if (!this.startup) {
      this.startup = this.launchAll();
    }
    return this.startup;
  }

  /**
   * Next healthy port, round-robin
   */
  selectNext(): Result<number, NoHealthyBackendsError> {
    if (this.healthyPorts.length === 0) {
      return err(new NoHealthyBackendsError());
    }

    const index = this.cursor % this.healthyPorts.length;
    this.cursor = (index + 1) % this.healthyPorts.length;
    return ok(this.healthyPorts[index]);
  }

  /**
   * Relay a pricing request (raw query string) to the next healthy instance
   */
  async forward(rawQuery: string): Promise<Result<ForwardedResponse, ForwardError>> {
    const selected = this.selectNext();
    if (!selected.ok) {
      logger.warn('No healthy services available to forward request');
      return selected;
    }

    const port = selected.value;
    const client = this.instances.find(instance => instance.port === port)?.client;
    if (!client) {
      return err(new BalancerError(`no client for port ${port}`, port));
    }

    const url = rawQuery ? `${this.options.pricingEndpoint}?${rawQuery}` : this.options.pricingEndpoint;
    logger.debug(`Forwarding to port ${port}`);

    try {
      const response = await client.get<unknown>(url, { responseType: 'text' });
      const contentType = response.headers['content-type'];
      logger.debug(`Response from ${port}: ${response.status}`);

      return ok({
        port,
        status: response.status,
        body: typeof response.data === 'string' ? response.data : JSON.stringify(response.data),
        ...(typeof contentType === 'string' && { contentType })
      });
    } catch (error) {
      logger.error(`Forwarding to port ${port} failed`, { error: describeError(error) });
      return err(new BalancerError(describeError(error), port));
    }
  }

  /**
   * Probe every instance once and update the healthy set
   */
  runHealthChecks(): Promise<void> {
    if (this.inFlightCheck) return this.inFlightCheck;

    const check = Promise.all(this.instances.map(instance => this.checkInstance(instance)))
      .then(() => undefined)
      .finally(() => {
        this.inFlightCheck = null;
      });
    this.inFlightCheck = check;
    return check;
  }

  /**
   * Stop probing, close client connections, terminate every instance
   */
  async stop(): Promise<void> {
    if (this.startup) {
      await this.startup.catch(() => undefined);
    }
    this.running = false;

    if (this.healthTimer) {
      clearTimeout(this.healthTimer);
      this.healthTimer = null;
    }
    if (this.inFlightCheck) {
      await this.inFlightCheck;
    }

    await this.releaseInstances(this.instances);

    this.instances = [];
    this.healthyPorts = [];
    this.cursor = 0;
    this.startup = null;
    logger.info('Load balancer stopped');
  }

  getStatus(): BalancerStatus {
    return {
      running: this.running,
      mode: this.options.launcher.mode,
      healthyPorts: [...this.healthyPorts],
      instances: this.instances.map(instance => ({
        port: instance.port,
        status: instance.status,
        lastCheckedAt: instance.lastCheckedAt === null ? null : new Date(instance.lastCheckedAt).toISOString()
      }))
    };
  }

  // ===========================================================================
  // STARTUP
  // ===========================================================================

  private async launchAll(): Promise<void> {
    const { instances: count, instancePortStart, launcher } = this.options;
    logger.info(`Starting ${count} DOPC services (${launcher.mode})...`);

    this.instances = Array.from({ length: count }, (_unused, i) => ({
      port: instancePortStart + i,
      status: InstanceStatus.STARTING,
      lastCheckedAt: null,
      handle: null,
      client: null,
      agent: null
    }));

    try {
      for (const instance of this.instances) {
        instance.handle = await launcher.launch(instance.port);
        instance.port = instance.handle.port;
        this.openClient(instance);
        logger.info(`Started DOPC service on port ${instance.port}`);
      }
    } catch (error) {
      logger.error('Failed to launch pricing instances', { error: describeError(error) });
      await this.releaseInstances(this.instances);
      this.instances = [];
      throw error;
    }

    for (const instance of this.instances) {
      instance.status = InstanceStatus.HEALTHY;
      this.healthyPorts.push(instance.port);
    }

    this.running = true;
    this.scheduleHealthCheck();
  }

  private openClient(instance: BackendInstance): void {
    instance.agent = new http.Agent({ keepAlive: true });
    instance.client = axios.create({
      baseURL: `http://${this.options.host}:${instance.port}`,
      timeout: this.options.requestTimeoutMs,
      httpAgent: instance.agent,
      validateStatus: () => true
    });
  }

  private async releaseInstances(instances: BackendInstance[]): Promise<void> {
    for (const instance of instances) {
      instance.agent?.destroy();
      instance.agent = null;
      instance.client = null;
    }

    const stopping = instances.map(async instance => {
      if (!instance.handle) return;
      try {
        await instance.handle.stop();
      } catch (error) {
        logger.error(`Failed to stop instance on port ${instance.port}`, { error: describeError(error) });
      }
    });
    await Promise.all(stopping);
  }

  // ===========================================================================
  // HEALTH LOOP
  // ===========================================================================

  private scheduleHealthCheck(): void {
    if (!this.running) return;

    this.healthTimer = setTimeout(() => {
      this.healthTimer = null;
      this.runHealthChecks()
        .catch(error => logger.error('Health check round failed', { error: describeError(error) }))
        .finally(() => this.scheduleHealthCheck());
    }, this.options.healthCheckIntervalMs);
    this.healthTimer.unref();
  }

  private async checkInstance(instance: BackendInstance): Promise<void> {
    const healthy = await this.probe(instance);
    instance.lastCheckedAt = Date.now();

    if (healthy) {
      if (instance.status !== InstanceStatus.HEALTHY) {
        logger.info(`Instance on port ${instance.port} is healthy again`);
      }
      instance.status = InstanceStatus.HEALTHY;
      if (!this.healthyPorts.includes(instance.port)) {
        this.healthyPorts.push(instance.port);
      }
      return;
    }

    if (instance.status === InstanceStatus.HEALTHY) {
      logger.warn(`${this.options.host}:${instance.port} does not respond, removing from rotation`);
    }
    instance.status = InstanceStatus.UNHEALTHY;
    this.healthyPorts = this.healthyPorts.filter(port => port !== instance.port);
  }

  private async probe(instance: BackendInstance): Promise<boolean> {
    if (!instance.client) return false;

    try {
      const response = await instance.client.get('/health');
      return response.status === HTTP_STATUS.OK;
    } catch (error) {
      logger.debug(`Health probe to port ${instance.port} failed`, { error: describeError(error) });
      return false;
    }
  }
}
