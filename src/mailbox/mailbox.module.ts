import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { SourceConfig } from '../config/config.types';
import { DEFAULT_FETCH_CHUNK_SIZE } from '../config/config.constants';
import { createImapMailboxClient } from './imap/imap-mailbox.client';
import type { MailboxSourceOptions } from './interfaces/mailbox-session.interface';
import { MailboxSourceService } from './mailbox-source.service';
import { MAILBOX_CLIENT_FACTORY, MAILBOX_SOURCE_OPTIONS } from './mailbox.tokens';

/**
 * Factory provider for MailboxSourceOptions.
 * The source section is required; configuration loading has already validated it.
 */
const mailboxSourceOptionsProvider = {
  provide: MAILBOX_SOURCE_OPTIONS,
  useFactory: (configService: ConfigService): MailboxSourceOptions => ({
    source: configService.getOrThrow<SourceConfig>('relay.source'),
    fetchChunkSize: configService.get<number>('relay.forwarding.fetchChunkSize') ?? DEFAULT_FETCH_CHUNK_SIZE,
  }),
  inject: [ConfigService],
};

@Module({
  providers: [
    mailboxSourceOptionsProvider,
    { provide: MAILBOX_CLIENT_FACTORY, useValue: createImapMailboxClient },
    MailboxSourceService,
  ],
  exports: [MailboxSourceService],
})
export class MailboxModule {}
