/**
 * Factory for building message sources from serializable settings
 */

import type { MessageSource } from './types.js';
import { DiscordAdapter } from './discord/DiscordAdapter.js';
import {
  DiscordRestClient,
  type DiscordAuthScheme,
} from './discord/DiscordRestClient.js';
import type { Sleep } from '../utils/sleep.js';

export interface MessageSourceConfig {
  token: string;
  authScheme: DiscordAuthScheme;
  baseUrl: string;
  sleep?: Sleep;
}

export class MessageSourceFactory {
  /**
   * Create a Discord message source with its own REST client
   * @param config - Token and REST settings
   */
  static createDiscord(config: MessageSourceConfig): MessageSource {
    return new DiscordAdapter(
      new DiscordRestClient({
        token: config.token,
        authScheme: config.authScheme,
        baseUrl: config.baseUrl,
        sleep: config.sleep,
      })
    );
  }
}
