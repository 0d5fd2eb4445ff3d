/**
 * Shared test fixtures
 */

import { vi } from 'vitest';
import type { Request, Response } from 'express';
import { Algorithm, Clock, TokenError } from '../src/types';
import { TokenConfig, TokenConfigOptions } from '../src/config/token-config';

export const TEST_SECRET = 'test-secret';

export interface TestClock extends Clock {
  set(now: number): void;
  advance(seconds: number): void;
}

/**
 * Clock that only moves when told to
 */
export function fixedClock(start: number): TestClock {
  let current = start;
  return {
    now: () => current,
    set: (now: number) => {
      current = now;
    },
    advance: (seconds: number) => {
      current += seconds;
    },
  };
}

/**
 * Deterministic id generator: id-1, id-2, ...
 */
export function sequentialIds(prefix = 'id'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export function testConfig(overrides: Partial<TokenConfigOptions> = {}): TokenConfig {
  return new TokenConfig({
    privateKey: TEST_SECRET,
    publicKey: TEST_SECRET,
    issuer: 'auth.test',
    algorithm: Algorithm.HS256,
    ...overrides,
  });
}

/**
 * Run `fn` and return the `TokenError` it throws
 */
export function catchTokenError(fn: () => unknown): TokenError {
  try {
    fn();
  } catch (error) {
    if (error instanceof TokenError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a TokenError to be thrown');
}

// Mock Express request/response
export function createMockRequest(options: { headers?: Record<string, string>; path?: string } = {}): Request {
  const headers = options.headers || {};
  return {
    headers,
    path: options.path || '/api/resource',
    get: (name: string) => headers[name.toLowerCase()],
  } as unknown as Request;
}

export interface MockResponse {
  statusCode: number;
  data: unknown;
  res: Response;
}

interface ResponseStub {
  status(code: number): ResponseStub;
  json(data: unknown): ResponseStub;
}

export function createMockResponse(): MockResponse {
  const state: { statusCode: number; data: unknown } = { statusCode: 200, data: undefined };
  const res: ResponseStub = {
    status: vi.fn((code: number) => {
      state.statusCode = code;
      return res;
    }),
    json: vi.fn((data: unknown) => {
      state.data = data;
      return res;
    }),
  };
  return {
    get statusCode() {
      return state.statusCode;
    },
    get data() {
      return state.data;
    },
    res: res as unknown as Response,
  };
}
