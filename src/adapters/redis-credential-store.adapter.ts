import { Injectable, Logger } from '@nestjs/common';
import { Redis } from 'ioredis';
import { ICredentialStore } from '../interfaces/credential-store.interface';
import { RedisCredentialOptions } from '../interfaces/config.interface';

export const DEFAULT_API_KEY_SET = 'key-admission:api-keys';

/**
 * Credential store that checks membership in a Redis set.
 * Keys are provisioned and revoked externally with SADD / SREM.
 */
@Injectable()
export class RedisCredentialStore implements ICredentialStore {
  private readonly logger = new Logger(RedisCredentialStore.name);
  private readonly setKey: string;
  private readonly client: Redis;

  constructor(options: RedisCredentialOptions & { client?: Redis }) {
    this.setKey = options.setKey || DEFAULT_API_KEY_SET;

    if (options.client) {
      this.client = options.client;
    } else if (options.url) {
      this.client = new Redis(options.url);
    } else {
      this.client = new Redis({
        host: options.host || 'localhost',
        port: options.port || 6379,
        password: options.password,
      });
    }
  }

  /**
   * Verify the connection
   */
  async initialize(): Promise<void> {
    await this.client.ping();
    this.logger.log(`Initialized RedisCredentialStore on set: ${this.setKey}`);
  }

  async isValid(key: string): Promise<boolean> {
    const member = await this.client.sismember(this.setKey, key);
    return member === 1;
  }
}
