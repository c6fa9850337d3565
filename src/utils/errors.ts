/**
 * Standardized Error Handling
 * Единая таксономия ошибок синхронизации с кодами и типизацией
 */

import axios from 'axios';
import { HTTP_STATUS, ERROR_CODES, ErrorCode } from '../config/constants';

export class AppError extends Error {
  constructor(
    public message: string,
    public code: ErrorCode = ERROR_CODES.INTERNAL_ERROR,
    public details?: Record<string, unknown>,
    public statusCode?: number
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, public problems: string[] = []) {
    super(message, ERROR_CODES.CONFIG_INVALID, problems.length > 0 ? { problems } : undefined);
    this.name = 'ConfigError';
  }
}

export class AuthError extends AppError {
  constructor(message: string = 'Credentials rejected by marketplace API', statusCode: number = HTTP_STATUS.UNAUTHORIZED) {
    super(message, ERROR_CODES.AUTH_REJECTED, undefined, statusCode);
    this.name = 'AuthError';
  }
}

export class RateLimitError extends AppError {
  constructor(message: string = 'Too many requests', public retryAfter?: number) {
    super(message, ERROR_CODES.RATE_LIMIT_EXCEEDED, { retryAfter }, HTTP_STATUS.TOO_MANY_REQUESTS);
    this.name = 'RateLimitError';
  }
}

export class TransientError extends AppError {
  constructor(message: string = 'Marketplace API temporarily unavailable', statusCode?: number) {
    super(message, ERROR_CODES.TRANSIENT_FAILURE, undefined, statusCode);
    this.name = 'TransientError';
  }
}

export class ApiRequestError extends AppError {
  constructor(message: string, statusCode: number, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.REQUEST_REJECTED, details, statusCode);
    this.name = 'ApiRequestError';
  }
}

export class ItemError extends AppError {
  constructor(public itemId: string, public reasons: string[]) {
    super(`Item ${itemId} rejected: ${reasons.join('; ') || 'unknown reason'}`, ERROR_CODES.ITEM_REJECTED, { itemId, reasons });
    this.name = 'ItemError';
  }
}

// Сообщение об ошибке из тела ответа (Ozon: message, Яндекс: errors[].message)
function describeBody(data: unknown): string | undefined {
  if (typeof data === 'string' && data.trim()) {
    return data.trim().slice(0, 300);
  }
  if (!data || typeof data !== 'object') {
    return undefined;
  }
  if ('message' in data && typeof data.message === 'string') {
    return data.message;
  }
  if ('errors' in data && Array.isArray(data.errors)) {
    const messages = data.errors
      .map((e: unknown) => (e && typeof e === 'object' && 'message' in e ? String(e.message) : undefined))
      .filter((m): m is string => Boolean(m));
    return messages.length > 0 ? messages.join('; ') : undefined;
  }
  return undefined;
}

function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Приводит ошибку axios (или любую другую) к таксономии синхронизации
 */
export function toSyncError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const target = `${error.config?.method?.toUpperCase() ?? 'REQUEST'} ${error.config?.url ?? ''}`.trim();

    if (status === undefined) {
      return new TransientError(`${target} failed: ${error.code ?? error.message}`);
    }

    const reason = describeBody(error.response?.data) ?? error.message;

    if (status === HTTP_STATUS.UNAUTHORIZED || status === HTTP_STATUS.FORBIDDEN) {
      return new AuthError(`${target} rejected credentials (${status}): ${reason}`, status);
    }
    if (status === HTTP_STATUS.TOO_MANY_REQUESTS) {
      return new RateLimitError(`${target} rate limited: ${reason}`, parseRetryAfter(error.response?.headers?.['retry-after']));
    }
    if (status >= HTTP_STATUS.INTERNAL_SERVER_ERROR) {
      return new TransientError(`${target} failed with ${status}: ${reason}`, status);
    }
    return new ApiRequestError(`${target} rejected with ${status}: ${reason}`, status, { body: error.response?.data });
  }

  const err = error instanceof Error ? error : new Error(String(error));
  return new AppError(err.message);
}

/**
 * Ошибки, после которых продолжать прогон бессмысленно
 */
export function isFatal(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof AuthError || error instanceof RateLimitError;
}

export default {
  AppError,
  ConfigError,
  AuthError,
  RateLimitError,
  TransientError,
  ApiRequestError,
  ItemError,
  toSyncError,
  isFatal,
};
