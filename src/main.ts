#!/usr/bin/env node
/**
 * Process entry point: loads configuration, wires one driver per market and runs the engine
 */

import { config as loadEnvFile } from 'dotenv';
import { loadConfiguration, ConfigurationError, type BotConfiguration } from './config/ConfigurationManager';
import { createConnector, createEngine } from './bootstrap';
import { createLogger, rootLogger, setLogLevel } from './utils/logger';

async function main(): Promise<void> {
  loadEnvFile();

  let config: BotConfiguration;
  try {
    config = loadConfiguration(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      rootLogger.fatal({ errors: error.errors }, error.message);
      process.exitCode = 2;
      return;
    }
    throw error;
  }

  setLogLevel(config.logLevel);
  const logger = createLogger('main');
  const engine = createEngine(config, createConnector(config));

  engine.onStopped(reason => {
    if (engine.getActiveMarkets().length === 0) {
      process.exitCode = 1;
    }
    logger.info({ reason, halted: engine.getHaltedMarkets() }, 'Shutdown complete');
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutdown requested, waiting for the current cycle');
    engine.stop(`Received ${signal}`).catch(error => {
      logger.error({ err: error }, 'Error while stopping engine');
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await engine.preflight();
  engine.start();
}

main().catch(error => {
  rootLogger.fatal({ err: error }, 'Bot failed to start');
  process.exitCode = 1;
});
