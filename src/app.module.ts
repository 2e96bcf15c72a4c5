import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from './app.config';
import { ComposerModule } from './composer/composer.module';
import { ForwarderModule } from './forwarder/forwarder.module';
import { MailboxModule } from './mailbox/mailbox.module';
import { MetricsModule } from './metrics/metrics.module';
import { ProgressModule } from './progress/progress.module';
import { RelayModule } from './relay/relay.module';
import { SchedulerModule } from './scheduler/scheduler.module';
import { SharedModule } from './shared/shared.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    SharedModule,
    MetricsModule,
    ProgressModule,
    MailboxModule,
    RelayModule,
    ComposerModule,
    ForwarderModule,
    SchedulerModule,
  ],
})
export class AppModule {}
