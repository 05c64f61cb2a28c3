/**
 * Minimal Discord REST client with rate-limit and retry handling
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import logger from '../../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../../utils/sleep.js';
import { classifyError, getErrorMessage } from '../../types/errors.js';
import { DiscordRateLimitSchema } from '../../validation/discord/schemas.js';

export type DiscordAuthScheme = 'Bot' | 'Bearer';

export type DiscordHttpClient = Pick<AxiosInstance, 'get'>;

export type DiscordQueryParams = Record<string, string | number>;

export interface DiscordRestClientOptions {
  token: string;
  authScheme?: DiscordAuthScheme;
  baseUrl?: string;
  timeout?: number;
  /**
   * Attempts for network errors and 5xx responses. Rate limits are not counted.
   */
  maxAttempts?: number;
  retryDelayMs?: number;
  sleep?: Sleep;
}

export class DiscordRestClient {
  private http: DiscordHttpClient;
  private maxAttempts: number;
  private retryDelayMs: number;
  private sleep: Sleep;

  constructor(options: DiscordRestClientOptions, http?: DiscordHttpClient) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;

    this.http =
      http ??
      axios.create({
        baseURL: options.baseUrl ?? 'https://discord.com/api/v10',
        timeout: options.timeout ?? 30000,
        headers: {
          Authorization: `${options.authScheme ?? 'Bot'} ${options.token}`,
          'Content-Type': 'application/json',
        },
      });
  }

  /**
   * GET a Discord route. Returns the response body, or null once the
   * request has failed for good.
   */
  async get(route: string, params?: DiscordQueryParams): Promise<unknown> {
    let attempt = 0;

    while (attempt < this.maxAttempts) {
      let response: AxiosResponse<unknown>;
      try {
        response = await this.http.get<unknown>(route, {
          params,
          validateStatus: () => true,
        });
      } catch (error) {
        attempt++;
        const classified = classifyError(error);
        logger.warn('Discord request failed', {
          route,
          attempt,
          maxAttempts: this.maxAttempts,
          errorType: classified.type,
          error: getErrorMessage(error),
        });
        if (attempt < this.maxAttempts) {
          await this.sleep(this.retryDelayMs * 2 ** (attempt - 1));
        }
        continue;
      }

      if (response.status === 429) {
        const rateLimit = DiscordRateLimitSchema.safeParse(response.data);
        const retryAfter = rateLimit.success ? rateLimit.data.retry_after : 1;
        logger.warn('Rate limited by Discord, waiting', {
          route,
          retryAfter,
          global: rateLimit.success ? rateLimit.data.global : undefined,
        });
        await this.sleep(retryAfter * 1000);
        continue;
      }

      if (response.status >= 200 && response.status < 300) {
        return response.data;
      }

      if (response.status >= 500) {
        attempt++;
        logger.warn('Discord server error', {
          route,
          status: response.status,
          attempt,
          maxAttempts: this.maxAttempts,
        });
        if (attempt < this.maxAttempts) {
          await this.sleep(this.retryDelayMs * 2 ** (attempt - 1));
        }
        continue;
      }

      logger.error('Discord API error', {
        route,
        status: response.status,
        body: response.data,
      });
      return null;
    }

    logger.error('Discord request abandoned after retries', {
      route,
      attempts: this.maxAttempts,
    });
    return null;
  }
}
