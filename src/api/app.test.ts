import { afterEach, describe, it, expect, vi } from 'vitest';
import type { NextFunction, Request, Response } from 'express';

import { createApp, handleError, notFound } from './app.js';
import { buildHealthStatus } from './routes/health.js';

function mockResponse() {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

function request(path: string): Request {
  return { path, method: 'GET' } as unknown as Request;
}

const next: NextFunction = () => {};

describe('buildHealthStatus', () => {
  it('reports the service and accepted inputs', () => {
    expect(buildHealthStatus(new Date('2024-01-15T12:00:00.000Z'))).toEqual({
      status: 'ok',
      timestamp: '2024-01-15T12:00:00.000Z',
      service: 'lineup-tracker-api',
      inputFormats: ['game-record', 'nba-page-payload'],
    });
  });
});

describe('notFound', () => {
  it('responds 404 with the path', () => {
    const res = mockResponse();
    notFound(request('/api/nope'), res as unknown as Response);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(res.json).toHaveBeenCalledWith({ error: 'Not found', path: '/api/nope' });
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps client error statuses from the body parser', () => {
    const res = mockResponse();
    const error = Object.assign(new Error('request entity too large'), { status: 413 });
    handleError(error, request('/api/lineups'), res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(413);
    expect(res.json).toHaveBeenCalledWith({ error: 'request entity too large', code: 'BAD_REQUEST' });
  });

  it('hides unexpected errors behind a 500', () => {
    const logged = vi.spyOn(console, 'error').mockImplementation(() => {});
    const res = mockResponse();
    handleError(new Error('boom'), request('/api/lineups'), res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
    expect(logged).toHaveBeenCalledTimes(1);
  });
});

describe('createApp', () => {
  it('builds an app without listening', () => {
    expect(typeof createApp().listen).toBe('function');
  });
});
