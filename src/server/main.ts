import dotenv from 'dotenv';
import { loadConfigFromEnv } from './config';
import { createGreeterService } from './example/greeter';
import { errorMessage } from './errors';
import { logger } from './utils/logger';

dotenv.config();

async function main(): Promise<void> {
  const service = createGreeterService({ config: loadConfigFromEnv() });

  service.logger.info('Starting greeter service', {
    addr: service.config.addr,
    metricsAddr: service.config.metricsAddr,
  });

  await service.start();
}

main().catch((error: unknown) => {
  logger.error('Service exited with error', { error: errorMessage(error) });
  process.exit(1);
});
