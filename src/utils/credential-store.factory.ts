import { Provider } from '@nestjs/common';
import { KEY_ADMISSION_CONFIG, KEY_ADMISSION_CREDENTIAL_STORE } from './constants';
import { KeyAdmissionConfig } from '../interfaces/config.interface';
import { ICredentialStore } from '../interfaces/credential-store.interface';
import { StaticCredentialStore } from '../adapters/static-credential-store.adapter';
import { RedisCredentialStore } from '../adapters/redis-credential-store.adapter';
import {
  CUSTOM_CREDENTIAL_STORE,
  REDIS_CREDENTIAL_STORE,
  STATIC_CREDENTIAL_STORE,
} from '../adapters/types';

/**
 * Instantiate the credential store named by the configuration
 */
export function createCredentialStore(
  config: KeyAdmissionConfig,
): ICredentialStore {
  const { credentialStore, credentialOptions, customCredentialStoreInstance } =
    config;

  switch (credentialStore) {
    case STATIC_CREDENTIAL_STORE:
      return new StaticCredentialStore(credentialOptions?.apiKeys ?? []);
    case REDIS_CREDENTIAL_STORE:
      return new RedisCredentialStore(credentialOptions?.redis ?? {});
    case CUSTOM_CREDENTIAL_STORE:
      if (!customCredentialStoreInstance) {
        throw new Error(
          'Credential store type is "custom" but no customCredentialStoreInstance was provided in KeyAdmissionConfig.',
        );
      }
      return customCredentialStoreInstance;
    default:
      throw new Error(`Unsupported credential store: ${String(credentialStore)}`);
  }
}

/**
 * Creates the credential store provider based on the configuration
 *
 * @returns Provider for the credential store
 */
export function createCredentialStoreProvider(): Provider {
  return {
    provide: KEY_ADMISSION_CREDENTIAL_STORE,
    useFactory: async (
      config: KeyAdmissionConfig,
    ): Promise<ICredentialStore> => {
      const store = createCredentialStore(config);
      await store.initialize();
      return store;
    },
    inject: [KEY_ADMISSION_CONFIG],
  };
}
