import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { StaticConfigAppModule } from './module-configuration';

const PORT = 8083;

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(StaticConfigAppModule);
  app.enableShutdownHooks();
  await app.listen(PORT);
  Logger.log(`Server started on :${PORT}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(error, 'Bootstrap');
  process.exit(1);
});
