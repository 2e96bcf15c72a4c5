import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ComposerModule } from '../composer/composer.module';
import type { ForwardingConfig, SourceConfig } from '../config/config.types';
import { MailboxModule } from '../mailbox/mailbox.module';
import { ProgressModule } from '../progress/progress.module';
import { RelayModule } from '../relay/relay.module';
import { ForwarderService } from './forwarder.service';
import { FORWARDER_OPTIONS } from './forwarder.tokens';
import type { ForwarderOptions } from './interfaces';

/**
 * Factory provider for ForwarderOptions.
 * The progress key is derived from the source account, host and folder.
 */
const forwarderOptionsProvider = {
  provide: FORWARDER_OPTIONS,
  useFactory: (configService: ConfigService): ForwarderOptions => {
    const source = configService.getOrThrow<SourceConfig>('relay.source');
    return {
      ...configService.getOrThrow<ForwardingConfig>('relay.forwarding'),
      progressKey: { account: source.user, host: source.host, folder: source.folder },
    };
  },
  inject: [ConfigService],
};

@Module({
  imports: [MailboxModule, RelayModule, ComposerModule, ProgressModule],
  providers: [forwarderOptionsProvider, ForwarderService],
  exports: [ForwarderService],
})
export class ForwarderModule {}
