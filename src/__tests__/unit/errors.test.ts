/**
 * Unit Tests for Error Handling
 */

import { AxiosError, AxiosHeaders, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import {
  AppError,
  ConfigError,
  AuthError,
  RateLimitError,
  TransientError,
  ApiRequestError,
  ItemError,
  toSyncError,
  isFatal,
} from '../../utils/errors';
import { HTTP_STATUS, ERROR_CODES } from '../../config/constants';

const requestConfig = (): InternalAxiosRequestConfig => ({
  method: 'post',
  url: '/v1/product/import/prices',
  headers: new AxiosHeaders(),
});

function httpError(status: number, data: unknown = {}, headers: Record<string, string> = {}): AxiosError {
  const config = requestConfig();
  const response: AxiosResponse = { data, status, statusText: String(status), headers, config };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, {}, response);
}

describe('Error Classes', () => {
  describe('AppError', () => {
    it('should create error with correct properties', () => {
      const error = new AppError('Test error', ERROR_CODES.REQUEST_REJECTED, { field: 'price' }, 400);

      expect(error.message).toBe('Test error');
      expect(error.code).toBe('REQUEST_REJECTED');
      expect(error.details).toEqual({ field: 'price' });
      expect(error.statusCode).toBe(400);
      expect(error.name).toBe('AppError');
    });

    it('should use default values', () => {
      const error = new AppError('Test error');

      expect(error.code).toBe(ERROR_CODES.INTERNAL_ERROR);
      expect(error.statusCode).toBeUndefined();
    });
  });

  describe('ConfigError', () => {
    it('should keep the list of problems', () => {
      const error = new ConfigError('Invalid Ozon configuration', ['Missing required environment variable: OZON_API_KEY']);

      expect(error.code).toBe(ERROR_CODES.CONFIG_INVALID);
      expect(error.problems).toEqual(['Missing required environment variable: OZON_API_KEY']);
      expect(error.name).toBe('ConfigError');
    });
  });

  describe('RateLimitError', () => {
    it('should include retry after', () => {
      const error = new RateLimitError('Too many requests', 60);

      expect(error.statusCode).toBe(HTTP_STATUS.TOO_MANY_REQUESTS);
      expect(error.retryAfter).toBe(60);
      expect(error.details).toEqual({ retryAfter: 60 });
    });
  });

  describe('ItemError', () => {
    it('should describe the rejected item', () => {
      const error = new ItemError('sku-1', ['PRICE_TOO_LOW: price is too low']);

      expect(error.message).toBe('Item sku-1 rejected: PRICE_TOO_LOW: price is too low');
      expect(error.itemId).toBe('sku-1');
      expect(error.code).toBe(ERROR_CODES.ITEM_REJECTED);
    });

    it('should fall back when no reason is given', () => {
      expect(new ItemError('sku-2', []).message).toBe('Item sku-2 rejected: unknown reason');
    });
  });
});

describe('toSyncError', () => {
  it('should map 401 and 403 to AuthError', () => {
    const unauthorized = toSyncError(httpError(401, { message: 'Invalid Api-Key' }));
    const forbidden = toSyncError(httpError(403));

    expect(unauthorized).toBeInstanceOf(AuthError);
    expect(unauthorized.message).toBe('POST /v1/product/import/prices rejected credentials (401): Invalid Api-Key');
    expect(forbidden).toBeInstanceOf(AuthError);
    expect(forbidden.statusCode).toBe(403);
  });

  it('should map 429 to RateLimitError with Retry-After', () => {
    const error = toSyncError(httpError(429, {}, { 'retry-after': '30' }));

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error.details).toEqual({ retryAfter: 30 });
  });

  it('should map 5xx to TransientError', () => {
    const error = toSyncError(httpError(502, 'Bad Gateway'));

    expect(error).toBeInstanceOf(TransientError);
    expect(error.message).toBe('POST /v1/product/import/prices failed with 502: Bad Gateway');
  });

  it('should map network failures to TransientError', () => {
    const error = toSyncError(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED', requestConfig()));

    expect(error).toBeInstanceOf(TransientError);
    expect(error.message).toBe('POST /v1/product/import/prices failed: ECONNABORTED');
  });

  it('should map other 4xx to ApiRequestError with joined messages', () => {
    const error = toSyncError(
      httpError(400, { status: 'ERROR', errors: [{ code: 'BAD_REQUEST', message: 'offers is empty' }, { message: 'second' }] })
    );

    expect(error).toBeInstanceOf(ApiRequestError);
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe('POST /v1/product/import/prices rejected with 400: offers is empty; second');
  });

  it('should pass AppError through and wrap anything else', () => {
    const original = new TransientError('flaky');

    expect(toSyncError(original)).toBe(original);
    expect(toSyncError('boom').message).toBe('boom');
    expect(toSyncError('boom')).toBeInstanceOf(AppError);
  });
});

describe('isFatal', () => {
  it('should treat config, auth and rate limit errors as fatal', () => {
    expect(isFatal(new ConfigError('x'))).toBe(true);
    expect(isFatal(new AuthError())).toBe(true);
    expect(isFatal(new RateLimitError())).toBe(true);
    expect(isFatal(new TransientError())).toBe(false);
    expect(isFatal(new ApiRequestError('x', 400))).toBe(false);
  });
});
