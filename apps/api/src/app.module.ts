import { DynamicModule, Module } from '@nestjs/common';
import type { AppConfig } from '@pkg/shared';
import { TaskQueue } from '@pkg/jobs';
import type { BrokerChannel, JobStore } from '@pkg/jobs';
import { HealthController } from './health.controller';
import { JobsController } from './jobs/jobs.controller';
import { JobsService } from './jobs/jobs.service';
import { dbProviders } from './db.providers';
import { APP_CONFIG, BROKER_CHANNEL, JOB_STORE } from './tokens';

@Module({})
export class AppModule {
  static forRoot(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      controllers: [HealthController, JobsController],
      providers: [
        { provide: APP_CONFIG, useValue: config },
        ...dbProviders,
        {
          provide: TaskQueue,
          useFactory: (broker: BrokerChannel, store: JobStore) =>
            new TaskQueue(broker, store),
          inject: [BROKER_CHANNEL, JOB_STORE],
        },
        JobsService,
      ],
    };
  }
}
