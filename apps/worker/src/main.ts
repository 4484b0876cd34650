import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { Pool } from 'pg';
import { PgBrokerChannel, PgJobStore } from '@pkg/jobs';
import { loadConfig, logger, onShutdown } from '@pkg/shared';
import { AppModule } from './app.module';
import { WorkerService } from './worker.service';
import { TaskRegistry } from './tasks';
import { BROKER_POOL, STORE_POOL } from './tokens';

async function bootstrap() {
  const config = loadConfig(process.env);
  const app = await NestFactory.createApplicationContext(
    AppModule.forRoot(config),
    { logger: false },
  );

  await app.get(PgBrokerChannel).ensureSchema();
  await app.get(PgJobStore).ensureSchema();

  logger.info(
    { service: 'worker', tasks: app.get(TaskRegistry).names() },
    'tasks registered',
  );

  const workerService = app.get(WorkerService);
  workerService.start();

  onShutdown(async (signal) => {
    logger.info({ service: 'worker', signal }, 'worker stopping');
    const pools = [app.get<Pool>(BROKER_POOL), app.get<Pool>(STORE_POOL)];
    await workerService.stop();
    await app.close();
    await Promise.all(pools.map((pool) => pool.end()));
    logger.info({ service: 'worker' }, 'worker stopped');
  });
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ service: 'worker', error: err }, 'worker failed to start');
  process.exit(1);
});
