import { Module } from '@nestjs/common';
import { MessageComposerService } from './message-composer.service';

@Module({
  providers: [MessageComposerService],
  exports: [MessageComposerService],
})
export class ComposerModule {}
