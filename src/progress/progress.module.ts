import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_STATE_PATH } from '../config/config.constants';
import { ProgressStoreService } from './progress-store.service';
import { PROGRESS_STATE_PATH } from './progress.tokens';

@Module({
  providers: [
    {
      provide: PROGRESS_STATE_PATH,
      useFactory: (configService: ConfigService): string =>
        configService.get<string>('relay.progress.statePath') ?? DEFAULT_STATE_PATH,
      inject: [ConfigService],
    },
    ProgressStoreService,
  ],
  exports: [ProgressStoreService],
})
export class ProgressModule {}
