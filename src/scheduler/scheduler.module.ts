import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_POLL_INTERVAL_SECONDS } from '../config/config.constants';
import { ForwarderModule } from '../forwarder/forwarder.module';
import type { SchedulerOptions } from './interfaces';
import { RelaySchedulerService } from './relay-scheduler.service';
import { SCHEDULER_OPTIONS } from './scheduler.tokens';

@Module({
  imports: [ForwarderModule],
  providers: [
    {
      provide: SCHEDULER_OPTIONS,
      useFactory: (configService: ConfigService): SchedulerOptions => ({
        pollIntervalSeconds:
          configService.get<number>('relay.schedule.pollIntervalSeconds') ?? DEFAULT_POLL_INTERVAL_SECONDS,
      }),
      inject: [ConfigService],
    },
    RelaySchedulerService,
  ],
  exports: [RelaySchedulerService],
})
export class SchedulerModule {}
