import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { DestinationConfig } from '../config/config.types';
import { RelaySinkService } from './relay-sink.service';
import { RELAY_DESTINATION_CONFIG, RELAY_TRANSPORT_FACTORY } from './relay.tokens';
import { createSmtpRelayTransport } from './smtp/smtp-transport';

@Module({
  providers: [
    {
      provide: RELAY_DESTINATION_CONFIG,
      useFactory: (configService: ConfigService): DestinationConfig =>
        configService.getOrThrow<DestinationConfig>('relay.destination'),
      inject: [ConfigService],
    },
    { provide: RELAY_TRANSPORT_FACTORY, useValue: createSmtpRelayTransport },
    RelaySinkService,
  ],
  exports: [RelaySinkService],
})
export class RelayModule {}
