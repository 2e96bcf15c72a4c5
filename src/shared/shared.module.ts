import { Global, Module } from '@nestjs/common';
import { sleep } from './async.utils';
import { SLEEP } from './shared.tokens';

/**
 * Cross-cutting providers. Tests replace {@link SLEEP} with an instant stub.
 */
@Global()
@Module({
  providers: [{ provide: SLEEP, useValue: sleep }],
  exports: [SLEEP],
})
export class SharedModule {}
