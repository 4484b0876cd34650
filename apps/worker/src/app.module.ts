import { DynamicModule, Module } from '@nestjs/common';
import type { AppConfig } from '@pkg/shared';
import { WorkerService } from './worker.service';
import { JobExecutor } from './executor/job-executor';
import { createTaskRegistry, TaskRegistry } from './tasks';
import { UniformDelay } from './delay/delay-strategy';
import { Failpoint } from './dev/failpoint.dev';
import { dbProviders } from './db.providers';
import { APP_CONFIG, DELAY_STRATEGY } from './tokens';

@Module({})
export class AppModule {
  static forRoot(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      providers: [
        { provide: APP_CONFIG, useValue: config },
        ...dbProviders,
        { provide: TaskRegistry, useFactory: createTaskRegistry },
        {
          provide: DELAY_STRATEGY,
          useValue: new UniformDelay(
            config.worker.delay.minMs,
            config.worker.delay.maxMs,
          ),
        },
        {
          provide: Failpoint,
          useValue: new Failpoint(config.worker.failpoint),
        },
        JobExecutor,
        WorkerService,
      ],
    };
  }
}
