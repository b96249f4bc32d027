import 'reflect-metadata';

// Module
export { KeyAdmissionModule, validateConfig } from './key-admission.module';

// Services
export { TokenBucketStore } from './services/token-bucket-store.service';
export { BucketSweeperService } from './services/bucket-sweeper.service';

// Interceptors
export {
  AdmissionInterceptor,
  extractApiKey,
} from './interceptors/admission.interceptor';

// Interfaces
export {
  KeyAdmissionConfig,
  KeyAdmissionAsyncConfig,
  KeyAdmissionConfigFactory,
  RedisCredentialOptions,
} from './interfaces/config.interface';
export {
  IBucketState,
  BucketSnapshot,
  TokenBucketOptions,
} from './interfaces/bucket.interface';
export { ICredentialStore } from './interfaces/credential-store.interface';

// Decorators
export { AdmissionGated } from './decorators/admission-gated.decorator';
export {
  SkipAdmission,
  SKIP_ADMISSION_KEY,
} from './decorators/skip-admission.decorator';

// Exceptions
export { RateLimitExceededException } from './exceptions/rate-limit-exceeded.exception';
export { InvalidBucketConfigError } from './exceptions/invalid-bucket-config.error';

// Credential stores (for extending)
export { StaticCredentialStore } from './adapters/static-credential-store.adapter';
export {
  RedisCredentialStore,
  DEFAULT_API_KEY_SET,
} from './adapters/redis-credential-store.adapter';
export { CredentialStoreType } from './adapters/types';

// Config helpers
export { keyAdmissionConfigFromEnv } from './utils/env-config';
export {
  KEY_ADMISSION_CONFIG,
  KEY_ADMISSION_CREDENTIAL_STORE,
  DEFAULT_API_KEY_HEADER,
} from './utils/constants';
