import { Module } from '@nestjs/common';
import { SessionRegistry } from './session-registry.service';

@Module({
  providers: [SessionRegistry],
  exports: [SessionRegistry],
})
export class SessionsModule {}
