import { Module } from '@nestjs/common';
import { AuthController } from './auth.controller';
import { CredentialsModule } from '../credentials/credentials.module';
import { SessionsModule } from '../sessions/sessions.module';
import { AccessModule } from '../access/access.module';

@Module({
  imports: [CredentialsModule, SessionsModule, AccessModule],
  controllers: [AuthController],
})
export class AuthModule {}
