/**
 * =============================================================================
 * MIDDLEWARE & HEALTH HELPERS - Tests
 * =============================================================================
 */

jest.mock('../shared/services/logger.service', () => ({
  logger: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() }
}));

import { Server } from 'http';
import express, { Request, Response } from 'express';
import { InvalidInputError } from '../core/errors/AppError';
import { asyncHandler, errorHandler, notFoundHandler } from '../shared/middleware/error.middleware';
import { requestLogger } from '../shared/middleware/request-logger.middleware';
import { formatBytes, formatUptime } from '../shared/routes/health.routes';
import { logger } from '../shared/services/logger.service';
import { closeServer, listen } from '../shared/utils/http-server.utils';
import { TEST_HOST, waitFor } from './helpers/test-utils';

describe('error middleware', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();
    app.use(requestLogger);
    app.get('/boom', asyncHandler(async () => {
      throw new Error('boom');
    }));
    app.get('/invalid', asyncHandler(async () => {
      throw new InvalidInputError('bad value', { field: 'x' });
    }));
    app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'healthy' });
    });
    app.use(notFoundHandler);
    app.use(errorHandler);

    const listening = await listen(app, 0, TEST_HOST);
    server = listening.server;
    baseUrl = `http://${TEST_HOST}:${listening.port}`;
  });

  afterAll(async () => {
    await closeServer(server);
  });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('turns an unexpected throw into a 500 body', async () => {
    const response = await fetch(`${baseUrl}/boom`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ success: false, error: 'boom', code: 'INTERNAL_ERROR' });
  });

  it('keeps the status and body of a thrown AppError', async () => {
    const response = await fetch(`${baseUrl}/invalid`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: 'bad value',
      code: 'INVALID_INPUT',
      details: { field: 'x' }
    });
  });

  it('answers unknown routes with 404', async () => {
    const response = await fetch(`${baseUrl}/missing?x=1`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ success: false, error: 'Cannot GET /missing', code: 'NOT_FOUND' });
  });

  it('logs health probes at debug and errors by status class', async () => {
    await (await fetch(`${baseUrl}/health`)).json();
    await (await fetch(`${baseUrl}/boom`)).json();
    // errorHandler logs first, the request logger once the response has finished
    await waitFor(() => jest.mocked(logger.error).mock.calls.length >= 2);

    expect(logger.debug).toHaveBeenCalledWith('Health probe served', expect.objectContaining({
      method: 'GET',
      path: '/health',
      status: 200
    }));
    expect(logger.error).toHaveBeenCalledWith('Request failed', expect.objectContaining({
      path: '/boom',
      status: 500
    }));
  });
});

describe('formatBytes', () => {
  it('scales to the largest whole unit', () => {
    expect(formatBytes(512)).toBe('512.00 B');
    expect(formatBytes(1536)).toBe('1.50 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.00 MB');
  });
});

describe('formatUptime', () => {
  it('omits empty leading units', () => {
    expect(formatUptime(59)).toBe('59s');
    expect(formatUptime(3661)).toBe('1h 1m 1s');
    expect(formatUptime(90061)).toBe('1d 1h 1m 1s');
  });
});
