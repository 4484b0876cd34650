import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import type { Pool } from 'pg';
import { PgBrokerChannel, PgJobStore } from '@pkg/jobs';
import { loadConfig, logger, onShutdown } from '@pkg/shared';
import { AppModule } from './app.module';
import { BROKER_POOL, STORE_POOL } from './tokens';

// Uploaded files travel inside the JSON body
const BODY_LIMIT = '10mb';

async function bootstrap() {
  const config = loadConfig(process.env);
  const app = await NestFactory.create<NestExpressApplication>(
    AppModule.forRoot(config),
    { logger: false },
  );
  app.useBodyParser('json', { limit: BODY_LIMIT });

  await app.get(PgBrokerChannel).ensureSchema();
  await app.get(PgJobStore).ensureSchema();

  await app.listen(config.http.port);
  logger.info({ service: 'api', port: config.http.port }, 'api listening');

  onShutdown(async (signal) => {
    logger.info({ service: 'api', signal }, 'api stopping');
    const pools = [app.get<Pool>(BROKER_POOL), app.get<Pool>(STORE_POOL)];
    await app.close();
    await Promise.all(pools.map((pool) => pool.end()));
    logger.info({ service: 'api' }, 'api stopped');
  });
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ service: 'api', error: err }, 'api failed to start');
  process.exit(1);
});
