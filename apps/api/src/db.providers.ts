import type { Provider } from '@nestjs/common';
import type { Pool } from 'pg';
import type { AppConfig } from '@pkg/shared';
import { PgBrokerChannel, PgJobStore, createPool } from '@pkg/jobs';
import {
  APP_CONFIG,
  BROKER_CHANNEL,
  BROKER_POOL,
  JOB_STORE,
  STORE_POOL,
} from './tokens';

export const dbProviders: Provider[] = [
  {
    provide: BROKER_POOL,
    useFactory: (config: AppConfig) =>
      createPool('broker', config.brokerUrl, config.poolMax),
    inject: [APP_CONFIG],
  },
  {
    provide: STORE_POOL,
    useFactory: (config: AppConfig) =>
      createPool('store', config.resultBackendUrl, config.poolMax),
    inject: [APP_CONFIG],
  },
  {
    provide: PgBrokerChannel,
    useFactory: (pool: Pool) => new PgBrokerChannel(pool),
    inject: [BROKER_POOL],
  },
  {
    provide: PgJobStore,
    useFactory: (pool: Pool) => new PgJobStore(pool),
    inject: [STORE_POOL],
  },
  { provide: BROKER_CHANNEL, useExisting: PgBrokerChannel },
  { provide: JOB_STORE, useExisting: PgJobStore },
];
