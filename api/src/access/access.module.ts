import { Module } from '@nestjs/common';
import { AccessControllerService } from './access-controller.service';
import { CredentialsModule } from '../credentials/credentials.module';
import { SessionsModule } from '../sessions/sessions.module';

@Module({
  imports: [CredentialsModule, SessionsModule],
  providers: [AccessControllerService],
  exports: [AccessControllerService],
})
export class AccessModule {}
