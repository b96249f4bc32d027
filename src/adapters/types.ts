export const STATIC_CREDENTIAL_STORE = 'static';
export const REDIS_CREDENTIAL_STORE = 'redis';
export const CUSTOM_CREDENTIAL_STORE = 'custom';

export type CredentialStoreType =
  | typeof STATIC_CREDENTIAL_STORE
  | typeof REDIS_CREDENTIAL_STORE
  | typeof CUSTOM_CREDENTIAL_STORE;

export const CREDENTIAL_STORE_TYPES: readonly CredentialStoreType[] = [
  STATIC_CREDENTIAL_STORE,
  REDIS_CREDENTIAL_STORE,
  CUSTOM_CREDENTIAL_STORE,
];
