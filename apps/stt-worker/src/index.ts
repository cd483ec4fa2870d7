import {
  KafkaBroker,
  ProviderDispatcher,
  createProviders,
  providerSpecsFromEnv,
  toError,
} from '@streamscribe/stream-engine';

import { loadEnvironmentFiles, parseEnv } from './config.js';
import { createLogger } from './logger.js';
import { DispatchWorker } from './worker.js';

export { DispatchWorker, type DispatchWorkerOptions, type DispatchWorkerStats } from './worker.js';

async function startSttWorker(): Promise<void> {
  loadEnvironmentFiles();
  const env = parseEnv(process.env, createLogger());
  const logger = createLogger(env.LOG_LEVEL);

  const dispatcher = new ProviderDispatcher({
    providers: createProviders(providerSpecsFromEnv(env)),
    timeoutMs: env.PROVIDER_TIMEOUT_MS,
    attemptsPerProvider: env.PROVIDER_ATTEMPTS,
    maxInFlightPerSession: env.MAX_IN_FLIGHT_PER_SESSION,
    logger,
  });
  const broker = new KafkaBroker({ clientId: env.KAFKA_CLIENT_ID, brokers: env.KAFKA_BROKERS, logger });
  const worker = new DispatchWorker({
    broker,
    dispatcher,
    logger,
    groupId: env.WORKER_GROUP_ID,
    concurrency: env.WORKER_CONCURRENCY,
  });

  await worker.start();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal, ...worker.stats() }, 'Stopping STT worker');
    worker.stop().catch((error: unknown) => {
      logger.error({ err: toError(error) }, 'STT worker shutdown failed');
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (import.meta.url === `file://${process.argv[1]}`) {
  startSttWorker().catch((error: unknown) => {
    createLogger().error({ err: toError(error) }, 'STT worker failed to start');
    process.exitCode = 1;
  });
}
