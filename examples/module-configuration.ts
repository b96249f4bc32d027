/**
 * Example of how to configure and register the KeyAdmission module in a NestJS application
 */
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { KeyAdmissionModule, keyAdmissionConfigFromEnv } from '../src';
import { GreetingController } from './greeting.controller';

/**
 * Example module using static configuration: 5 requests per 60 seconds per key
 */
@Module({
  imports: [
    KeyAdmissionModule.forRoot({
      capacity: 5,
      windowSeconds: 60,
      credentialStore: 'static',
      credentialOptions: {
        apiKeys: ['demo-key-1', 'demo-key-2', 'demo-key-3'],
      },
      // Forget keys that have been quiet for a full window
      sweepIntervalMs: 5 * 60 * 1000,
      maxKeys: 10_000,
    }),
  ],
  controllers: [GreetingController],
})
export class StaticConfigAppModule {}

/**
 * Example module using async configuration (recommended for production)
 *
 * KEY_ADMISSION_STORE=redis REDIS_URL=redis://localhost:6379 KEY_ADMISSION_CAPACITY=100
 */
@Module({
  imports: [
    ConfigModule.forRoot(),
    KeyAdmissionModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: keyAdmissionConfigFromEnv,
    }),
  ],
  controllers: [GreetingController],
})
export class AsyncConfigAppModule {}
