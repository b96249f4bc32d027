import {
  InjectionToken,
  ModuleMetadata,
  OptionalFactoryDependency,
  Type,
} from '@nestjs/common';
import { CredentialStoreType } from '../adapters/types';
import { TokenBucketOptions } from './bucket.interface';
import { ICredentialStore } from './credential-store.interface';

/**
 * Connection options for the Redis credential store
 */
export interface RedisCredentialOptions {
  host?: string;
  port?: number;
  password?: string;
  url?: string;

  /**
   * Name of the Redis set holding valid API keys
   * @default 'key-admission:api-keys'
   */
  setKey?: string;
}

/**
 * Configuration for the KeyAdmission module
 */
export interface KeyAdmissionConfig extends TokenBucketOptions {
  /**
   * Request header carrying the API key (matched case-insensitively)
   * @default 'X-API-KEY'
   */
  headerName?: string;

  /**
   * How often, in milliseconds, idle buckets are swept from memory.
   * Leave unset or 0 to rely on maxKeys alone.
   */
  sweepIntervalMs?: number;

  /**
   * Where valid API keys are looked up ('static', 'redis', or 'custom')
   */
  credentialStore: CredentialStoreType;

  /**
   * Credential store specific options
   */
  credentialOptions?: {
    /**
     * Valid keys (for the static store)
     */
    apiKeys?: string[];

    /**
     * Redis connection options (for the redis store)
     */
    redis?: RedisCredentialOptions;
  };

  /**
   * An ICredentialStore to use when credentialStore is 'custom'
   */
  customCredentialStoreInstance?: ICredentialStore;
}

/**
 * Interface for async config factory
 */
export interface KeyAdmissionConfigFactory {
  createKeyAdmissionConfig(): Promise<KeyAdmissionConfig> | KeyAdmissionConfig;
}

/**
 * Options for async module configuration
 */
export interface KeyAdmissionAsyncConfig
  extends Pick<ModuleMetadata, 'imports'> {
  /**
   * Existing provider implementing the config factory interface
   */
  useExisting?: Type<KeyAdmissionConfigFactory>;

  /**
   * Class that implements config factory interface
   */
  useClass?: Type<KeyAdmissionConfigFactory>;

  /**
   * Factory function for config
   */
  useFactory?(
    ...args: unknown[]
  ): Promise<KeyAdmissionConfig> | KeyAdmissionConfig;

  /**
   * Dependencies to inject into factory function
   */
  inject?: Array<InjectionToken | OptionalFactoryDependency>;
}
