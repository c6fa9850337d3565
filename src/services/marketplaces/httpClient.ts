import axios, { AxiosInstance, AxiosRequestConfig, RawAxiosRequestHeaders } from 'axios';
import { z } from 'zod';
import { TransientError, toSyncError } from '../../utils/errors';
import { logAPI } from '../../utils/logger';

export interface ApiClientOptions {
  baseURL: string;
  headers: RawAxiosRequestHeaders;
  timeoutMs: number;
}

/**
 * Одна HTTP-сессия на прогон: keep-alive соединения переиспользуются между вызовами
 */
export function createApiClient(options: ApiClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...options.headers,
    },
  });
}

/**
 * Выполняет запрос и проверяет тело ответа схемой.
 * Ошибки транспорта приводятся к таксономии, невалидное тело считается временным сбоем.
 */
export async function request<T>(client: AxiosInstance, config: AxiosRequestConfig, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const target = `${config.method?.toUpperCase() ?? 'GET'} ${config.url ?? ''}`;
  let data: unknown;

  try {
    const response = await client.request<unknown>(config);
    logAPI(`${target} -> ${response.status}`);
    data = response.data;
  } catch (error) {
    throw toSyncError(error);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new TransientError(`${target} returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}
