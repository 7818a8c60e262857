/**
 * =============================================================================
 * MOCK VENUE MODULE - APP
 * =============================================================================
 *
 * Local stand-in for the venue API, serving one Helsinki venue for any slug:
 *
 *   GET /home-assignment-api/v1/venues/:slug/static
 *   GET /home-assignment-api/v1/venues/:slug/dynamic
 *
 * Counts requests per kind and can be told to answer with an error status
 * or to respond slowly. Used by `npm run mock:venue` and by the tests.
 * =============================================================================
 */

import express, { Express, Request, Response } from 'express';
import { asyncHandler, errorHandler, notFoundHandler } from '../../shared/middleware/error.middleware';
import helsinkiVenue from './helsinki-venue.json';

export const MOCK_VENUE_BASE_PATH = '/home-assignment-api/v1';

export type VenueDataKind = 'static' | 'dynamic';

const VENUE_DATA_KINDS: readonly VenueDataKind[] = ['static', 'dynamic'];

function isVenueDataKind(value: string): value is VenueDataKind {
  return VENUE_DATA_KINDS.some(kind => kind === value);
}

export interface MockVenueStats {
  requests: Record<VenueDataKind, number>;
  totalRequests: number;
  runningSeconds: number;
  requestsPerSecond: number;
}

export class MockVenueApi {
  readonly app: Express;
  private payloads: Record<VenueDataKind, unknown> = MockVenueApi.defaultPayloads();
  private failures: Partial<Record<VenueDataKind, number>> = {};
  private delayMs = 0;
  private requests: Record<VenueDataKind, number> = { static: 0, dynamic: 0 };
  private startedAt = Date.now();

  constructor() {
    this.app = express();
    this.app.get(
      `${MOCK_VENUE_BASE_PATH}/venues/:venueSlug/:kind`,
      asyncHandler((req: Request, res: Response) => this.serve(req, res))
    );
    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  static defaultPayloads(): Record<VenueDataKind, unknown> {
    return structuredClone(helsinkiVenue);
  }

  /**
   * Replace what one endpoint returns (any JSON, valid or not)
   */
  setPayload(kind: VenueDataKind, payload: unknown): void {
    this.payloads[kind] = payload;
  }

  /**
   * Answer every request of `kind` with `status`; null restores normal service
   */
  failWith(kind: VenueDataKind, status: number | null): void {
    if (status === null) {
      delete this.failures[kind];
    } else {
      this.failures[kind] = status;
    }
  }

  setDelay(delayMs: number): void {
    this.delayMs = delayMs;
  }

  getStats(): MockVenueStats {
    const runningSeconds = (Date.now() - this.startedAt) / 1000;
    const totalRequests = this.requests.static + this.requests.dynamic;
    return {
      requests: { ...this.requests },
      totalRequests,
      runningSeconds,
      requestsPerSecond: runningSeconds > 0 ? totalRequests / runningSeconds : 0
    };
  }

  reset(): void {
    this.payloads = MockVenueApi.defaultPayloads();
    this.failures = {};
    this.delayMs = 0;
    this.requests = { static: 0, dynamic: 0 };
    this.startedAt = Date.now();
  }

  private async serve(req: Request, res: Response): Promise<void> {
    const { kind } = req.params;
    if (!isVenueDataKind(kind)) {
      notFoundHandler(req, res);
      return;
    }

    this.requests[kind]++;

    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }

    const failureStatus = this.failures[kind];
    if (failureStatus !== undefined) {
      res.status(failureStatus).json({ error: `Injected ${kind} failure` });
      return;
    }

    res.json(this.payloads[kind]);
  }
}
