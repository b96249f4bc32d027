import { ConfigService } from '@nestjs/config';
import { KeyAdmissionConfig } from '../interfaces/config.interface';
import {
  CredentialStoreType,
  REDIS_CREDENTIAL_STORE,
  STATIC_CREDENTIAL_STORE,
} from '../adapters/types';

function readInt(
  configService: ConfigService,
  name: string,
): number | undefined {
  const raw = configService.get<string>(name);
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  return Number(raw);
}

/**
 * Build a KeyAdmissionConfig from environment variables.
 * Meant for KeyAdmissionModule.forRootAsync with ConfigModule.
 *
 * @example
 * ```typescript
 * KeyAdmissionModule.forRootAsync({
 *   imports: [ConfigModule],
 *   inject: [ConfigService],
 *   useFactory: keyAdmissionConfigFromEnv,
 * })
 * ```
 */
export function keyAdmissionConfigFromEnv(
  configService: ConfigService,
): KeyAdmissionConfig {
  const store: CredentialStoreType =
    configService.get<string>('KEY_ADMISSION_STORE') === REDIS_CREDENTIAL_STORE
      ? REDIS_CREDENTIAL_STORE
      : STATIC_CREDENTIAL_STORE;

  const apiKeys = (configService.get<string>('KEY_ADMISSION_API_KEYS') ?? '')
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);

  return {
    capacity: readInt(configService, 'KEY_ADMISSION_CAPACITY') ?? 5,
    windowSeconds: readInt(configService, 'KEY_ADMISSION_WINDOW_SECONDS') ?? 60,
    headerName: configService.get<string>('KEY_ADMISSION_HEADER'),
    maxKeys: readInt(configService, 'KEY_ADMISSION_MAX_KEYS'),
    sweepIntervalMs: readInt(configService, 'KEY_ADMISSION_SWEEP_INTERVAL_MS'),
    credentialStore: store,
    credentialOptions: {
      apiKeys,
      redis: {
        url: configService.get<string>('REDIS_URL'),
        setKey: configService.get<string>('KEY_ADMISSION_REDIS_SET'),
      },
    },
  };
}
