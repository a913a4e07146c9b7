import { AwilixContainer } from 'awilix';
import { Config } from './configurations';
import { Cradle, createAppContainer } from './container';
import { ConfigurationError } from './errors';

export type ContainerFactory = (config: Config) => AwilixContainer<Cradle>;

/**
 * Starts the updater and resolves to the exit code. In one-shot mode that is
 * 1 when the cycle failed; in loop mode the loop keeps the process alive and
 * the signal handlers end it. Never rejects.
 */
export const run = async (
  env: Record<string, string | undefined> = process.env,
  createContainer: ContainerFactory = createAppContainer
): Promise<number> => {
  try {
    const config = new Config(env);
    const container = createContainer(config);

    const logger = container.resolve('logger');
    const loop = container.resolve('reconcileLoop');

    logger.info(`Keeping ${config.DNS_RECORD_TYPE} record ${config.DNS_RECORD_NAME} in sync with the public IP`);

    if (config.RUN_ONCE) {
      const outcome = await loop.runOnce();
      return outcome.status === 'failed' ? 1 : 0;
    }

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down...`);
      loop
        .stop()
        .catch((error: unknown) => logger.error('Error while stopping', error))
        .finally(() => process.exit(0));
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    loop.start();
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`[ERROR] ${error.message}`);
    } else {
      console.error('[ERROR] Fatal error during start-up', error);
    }
    return 1;
  }
};
