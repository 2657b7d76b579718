import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CredentialsService } from './credentials.service';
import { User } from '../database/entities';

@Module({
  imports: [TypeOrmModule.forFeature([User])],
  providers: [CredentialsService],
  exports: [CredentialsService],
})
export class CredentialsModule {}
