import { Injectable, Logger } from '@nestjs/common';
import { ICredentialStore } from '../interfaces/credential-store.interface';

/**
 * Credential store backed by a fixed set of keys held in memory
 */
@Injectable()
export class StaticCredentialStore implements ICredentialStore {
  private readonly logger = new Logger(StaticCredentialStore.name);
  private readonly apiKeys: ReadonlySet<string>;

  constructor(apiKeys: Iterable<string>) {
    this.apiKeys = new Set([...apiKeys].filter((key) => key.length > 0));
  }

  async initialize(): Promise<void> {
    if (this.apiKeys.size === 0) {
      this.logger.warn('No API keys configured; every request will be rejected');
      return;
    }
    this.logger.log(`Loaded ${this.apiKeys.size} API keys`);
  }

  async isValid(key: string): Promise<boolean> {
    return this.apiKeys.has(key);
  }
}
