import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { bootstrapApp } from './bootstrap';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();
  await bootstrapApp(app);

  Logger.log('Event engagement services ready', 'Main');
}

bootstrap().catch((error: unknown) => {
  Logger.error('Startup failed', error instanceof Error ? error.stack : String(error), 'Main');
  process.exit(1);
});
