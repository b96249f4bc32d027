import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import {
  KeyAdmissionAsyncConfig,
  KeyAdmissionConfig,
  KeyAdmissionConfigFactory,
} from './interfaces/config.interface';
import {
  KEY_ADMISSION_CONFIG,
  KEY_ADMISSION_CREDENTIAL_STORE,
} from './utils/constants';
import { createCredentialStoreProvider } from './utils/credential-store.factory';
import { TokenBucketStore } from './services/token-bucket-store.service';
import { BucketSweeperService } from './services/bucket-sweeper.service';
import { AdmissionInterceptor } from './interceptors/admission.interceptor';
import {
  CREDENTIAL_STORE_TYPES,
  CUSTOM_CREDENTIAL_STORE,
  REDIS_CREDENTIAL_STORE,
} from './adapters/types';

function isPositiveInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isSafeInteger(value) && value > 0;
}

export function validateConfig(config: KeyAdmissionConfig): void {
  if (!isPositiveInteger(config.capacity)) {
    throw new Error('KeyAdmission config capacity must be a positive integer');
  }

  if (!isPositiveInteger(config.windowSeconds)) {
    throw new Error(
      'KeyAdmission config windowSeconds must be a positive integer',
    );
  }

  if (config.maxKeys !== undefined && !isPositiveInteger(config.maxKeys)) {
    throw new Error('KeyAdmission config maxKeys must be a positive integer');
  }

  if (
    config.sweepIntervalMs !== undefined &&
    !(Number.isFinite(config.sweepIntervalMs) && config.sweepIntervalMs >= 0)
  ) {
    throw new Error(
      'KeyAdmission config sweepIntervalMs must be a non-negative number',
    );
  }

  if (!CREDENTIAL_STORE_TYPES.includes(config.credentialStore)) {
    throw new Error(
      `KeyAdmission config credentialStore must be one of: ${CREDENTIAL_STORE_TYPES.join(', ')}`,
    );
  }

  if (
    config.credentialStore === REDIS_CREDENTIAL_STORE &&
    !config.credentialOptions?.redis?.url &&
    !config.credentialOptions?.redis?.host
  ) {
    throw new Error(
      'Redis credential store requires either url or host in credentialOptions.redis',
    );
  }

  if (
    config.credentialStore === CUSTOM_CREDENTIAL_STORE &&
    !config.customCredentialStoreInstance
  ) {
    throw new Error(
      'Custom credential store requires customCredentialStoreInstance',
    );
  }
}

const sharedProviders: Provider[] = [
  TokenBucketStore,
  BucketSweeperService,
  AdmissionInterceptor,
  createCredentialStoreProvider(),
];

const sharedExports = [
  KEY_ADMISSION_CONFIG,
  KEY_ADMISSION_CREDENTIAL_STORE,
  TokenBucketStore,
  AdmissionInterceptor,
];

/**
 * Per-API-key admission control. Use forRoot or forRootAsync to configure and register.
 */
@Global()
@Module({})
export class KeyAdmissionModule {
  /**
   * Register the KeyAdmission module with static configuration
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     KeyAdmissionModule.forRoot({
   *       capacity: 5,
   *       windowSeconds: 60,
   *       credentialStore: 'static',
   *       credentialOptions: { apiKeys: ['test-key-1', 'test-key-2'] },
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRoot(config: KeyAdmissionConfig): DynamicModule {
    validateConfig(config);

    return {
      module: KeyAdmissionModule,
      global: true,
      imports: [ScheduleModule.forRoot()],
      providers: [
        { provide: KEY_ADMISSION_CONFIG, useValue: config },
        ...sharedProviders,
      ],
      exports: sharedExports,
    };
  }

  /**
   * Register the KeyAdmission module with async configuration
   *
   * @example
   * ```typescript
   * @Module({
   *   imports: [
   *     ConfigModule.forRoot(),
   *     KeyAdmissionModule.forRootAsync({
   *       imports: [ConfigModule],
   *       inject: [ConfigService],
   *       useFactory: (configService: ConfigService) => ({
   *         capacity: Number(configService.get('RATE_LIMIT_CAPACITY')),
   *         windowSeconds: Number(configService.get('RATE_LIMIT_WINDOW')),
   *         credentialStore: 'redis',
   *         credentialOptions: { redis: { url: configService.get('REDIS_URL') } },
   *       }),
   *     }),
   *   ],
   * })
   * export class AppModule {}
   * ```
   */
  static forRootAsync(asyncConfig: KeyAdmissionAsyncConfig): DynamicModule {
    return {
      module: KeyAdmissionModule,
      global: true,
      imports: [ScheduleModule.forRoot(), ...(asyncConfig.imports || [])],
      providers: [
        ...KeyAdmissionModule.createAsyncConfigProviders(asyncConfig),
        ...sharedProviders,
      ],
      exports: sharedExports,
    };
  }

  /**
   * Create async config providers
   * @internal
   */
  private static createAsyncConfigProviders(
    options: KeyAdmissionAsyncConfig,
  ): Provider[] {
    const { useFactory } = options;
    if (useFactory) {
      return [
        {
          provide: KEY_ADMISSION_CONFIG,
          useFactory: async (...args: unknown[]) => {
            const config = await useFactory(...args);
            validateConfig(config);
            return config;
          },
          inject: options.inject || [],
        },
      ];
    }

    const factoryClass = options.useClass || options.useExisting;
    if (!factoryClass) {
      throw new Error(
        'Invalid KeyAdmissionAsyncConfig. Must provide useFactory, useClass, or useExisting.',
      );
    }

    const configProvider: Provider = {
      provide: KEY_ADMISSION_CONFIG,
      useFactory: async (configFactory: KeyAdmissionConfigFactory) => {
        const config = await configFactory.createKeyAdmissionConfig();
        validateConfig(config);
        return config;
      },
      inject: [factoryClass],
    };

    // useExisting resolves a provider registered elsewhere; useClass is owned here
    return options.useClass
      ? [{ provide: options.useClass, useClass: options.useClass }, configProvider]
      : [configProvider];
  }
}
