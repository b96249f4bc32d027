/**
 * Injection token for KeyAdmission configuration
 */
export const KEY_ADMISSION_CONFIG = 'KEY_ADMISSION_CONFIG';

/**
 * Injection token for the credential store consulted by the admission gate
 */
export const KEY_ADMISSION_CREDENTIAL_STORE = 'KEY_ADMISSION_CREDENTIAL_STORE';

/**
 * Request header carrying the caller's API key
 */
export const DEFAULT_API_KEY_HEADER = 'X-API-KEY';

export const BUCKET_SWEEP_INTERVAL_NAME = 'key-admission:bucket-sweep';
