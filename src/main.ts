#!/usr/bin/env node
// File overview:
// - Purpose: Process entrypoint: parse CLI flags, configure logging and start the HTTP server.
// - Env inputs: HOST, PORT, LOG_LEVEL, API_KEY, API_ENV (loaded from .env when present).
// - Downstream flow: Creates `AppModule`, mounts API docs outside production, listens until SIGTERM/SIGINT.
import 'reflect-metadata';
import 'dotenv/config';
import { ConsoleLogger, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { CliOptions, logLevelsFor, parseCli, resolveHost } from './cli';
import { AppConfig, appConfig, Environment, parseEnvironment } from './config/app.config';
import { setupApiDocs } from './docs/api-docs';
import { getVersionInfo, versionInfoPretty, versionLine } from './version/version-info';

async function bootstrap(options: CliOptions): Promise<void> {
  const environment = parseEnvironment(process.env.API_ENV);
  // Local runs get coloured text, deployed ones one JSON object per line
  const useJsonLogging = environment !== Environment.Local;
  const logger = new ConsoleLogger({
    json: useJsonLogging,
    colors: !useJsonLogging,
    logLevels: logLevelsFor(options.log),
  });
  Logger.overrideLogger(logger);

  const bootLogger = new Logger('Bootstrap');
  const info = getVersionInfo();
  bootLogger.log(`Starting ${info.name} ${environment}`);
  bootLogger.log(useJsonLogging ? versionLine(info) : versionInfoPretty(info));

  const app = await NestFactory.create<NestExpressApplication>(AppModule, { logger });
  app.enableShutdownHooks();

  const config = app.get<AppConfig>(appConfig.KEY);
  if (config.docsEnabled) {
    setupApiDocs(app);
    bootLogger.log('API documentation available at /doc, /redoc, /rapidoc and /scalar');
  }

  await app.listen(options.port, resolveHost(options.host));
  bootLogger.log(`Listening on ${await app.getUrl()}`);
}

process.on('unhandledRejection', (reason) => {
  const logger = new Logger('Error');
  logger.error('Unhandled Promise Rejection', reason instanceof Error ? reason.stack : String(reason));
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  const logger = new Logger('Error');
  logger.error(`Uncaught Exception: ${error.message}`, error.stack);
  process.exit(1);
});

const options = parseCli(process.argv.slice(2));
if (options.version) {
  console.log(versionLine());
} else {
  bootstrap(options).catch((error: unknown) => {
    const logger = new Logger('Bootstrap');
    logger.error(
      `Failed to start server: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    process.exit(1);
  });
}
