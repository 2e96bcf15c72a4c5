import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { logConfigurationSummary } from './config/config.utils';
import type { RelayConfiguration } from './config/config.types';
import { ProgressStoreService } from './progress/progress-store.service';
import { RelaySchedulerService } from './scheduler/relay-scheduler.service';

/**
 * BootStrap
 *
 * @returns The process exit code
 */
async function bootstrap(): Promise<number> {
  const logger = new Logger('bootstrap');

  const isDevelopment = process.env.NODE_ENV === 'development';
  // configuration errors must surface as exit code 1, not an abort
  const app = await NestFactory.createApplicationContext(AppModule, {
    abortOnError: false,
    logger: isDevelopment ? ['log', 'error', 'warn', 'debug', 'verbose'] : ['log', 'error', 'warn'],
  });

  const config = app.get<ConfigService>(ConfigService);
  const relayConfig = config.getOrThrow<RelayConfiguration>('relay');
  const scheduler = app.get<RelaySchedulerService>(RelaySchedulerService);

  logConfigurationSummary(relayConfig);
  const trackedStreams = Object.keys(app.get(ProgressStoreService).snapshot()).length;
  logger.log(`State file tracks ${trackedStreams} folder(s)`);

  // a second signal falls through to the default handler and ends the process
  const handleSignal = (signal: NodeJS.Signals) => {
    logger.log(`Received ${signal}, stopping after the current message`);
    scheduler.stop();
  };

  process.once('SIGTERM', handleSignal);
  process.once('SIGINT', handleSignal);

  let exitCode = 0;

  if (relayConfig.schedule.runOnce) {
    try {
      const report = await scheduler.runOnce();
      logger.log(`Run complete: ${report.forwarded} of ${report.candidates} message(s) forwarded`);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      const errorStack = error instanceof Error ? error.stack : undefined;
      logger.error(`Run failed: ${errorMessage}`, errorStack);
      exitCode = 1;
    }
  } else {
    await scheduler.runForever();
  }

  await app.close();
  logger.log('Application closed successfully');
  return exitCode;
}

bootstrap()
  .then((exitCode) => process.exit(exitCode))
  .catch((error) => {
    const logger = new Logger('bootstrap');
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to bootstrap application: ${errorMessage}`);
    process.exit(1);
  });
