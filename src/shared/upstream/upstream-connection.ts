/**
 * =============================================================================
 * UPSTREAM CONNECTION
 * =============================================================================
 *
 * One long-lived HTTP client bound to the venue API base URL. Each connection
 * owns its own keep-alive agent, so closing it tears down exactly the sockets
 * it opened.
 *
 * Transport failures come back as UpstreamFailureError values. Any HTTP status
 * is a successful transport; callers decide what a status means to them.
 * =============================================================================
 */

import http from 'http';
import https from 'https';
import axios, { AxiosInstance } from 'axios';
import { ConnectionRole } from '../../core/constants';
import { UpstreamFailureError, describeError } from '../../core/errors/AppError';
import { Result, err, ok } from '../../core/result';

export interface UpstreamResponse {
  status: number;
  data: unknown;
}

export interface UpstreamConnection {
  readonly role: ConnectionRole;
  readonly slot: number;
  readonly closed: boolean;
  get(path: string): Promise<Result<UpstreamResponse, UpstreamFailureError>>;
  close(): Promise<void>;
}

/**
 * Opens the connection for a pool slot
 */
export type ConnectionFactory = (role: ConnectionRole, slot: number) => UpstreamConnection;

export interface HttpConnectionOptions {
  baseUrl: string;
  timeoutMs: number;
  socketsPerConnection: number;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Map a thrown request error to the failure message clients see
 */
export function describeTransportError(error: unknown): string {
  if (axios.isAxiosError(error) && error.code && TIMEOUT_CODES.has(error.code)) {
    return 'Request timed out';
  }
  return `Request error: ${describeError(error)}`;
}

export class HttpUpstreamConnection implements UpstreamConnection {
  private readonly client: AxiosInstance;
  private readonly agent: http.Agent;
  private isClosed = false;

  constructor(
    public readonly role: ConnectionRole,
    public readonly slot: number,
    options: HttpConnectionOptions
  ) {
    const agentOptions = { keepAlive: true, maxSockets: options.socketsPerConnection };
    const secure = new URL(options.baseUrl).protocol === 'https:';
    this.agent = secure ? new https.Agent(agentOptions) : new http.Agent(agentOptions);

    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: { Accept: 'application/json' },
      validateStatus: () => true,
      ...(secure ? { httpsAgent: this.agent } : { httpAgent: this.agent })
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async get(path: string): Promise<Result<UpstreamResponse, UpstreamFailureError>> {
    if (this.isClosed) {
      return err(new UpstreamFailureError('Request error: connection is closed', { role: this.role, slot: this.slot }));
    }

    try {
      const response = await this.client.get<unknown>(path);
      return ok({ status: response.status, data: response.data });
    } catch (error) {
      return err(new UpstreamFailureError(describeTransportError(error), { role: this.role, slot: this.slot }));
    }
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.agent.destroy();
  }
}

/**
 * Factory for real HTTP connections to the venue API
 */
export function httpConnectionFactory(options: HttpConnectionOptions): ConnectionFactory {
  return (role, slot) => new HttpUpstreamConnection(role, slot, options);
}
