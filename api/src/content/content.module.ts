import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MulterModule } from '@nestjs/platform-express';
import { ContentItem } from '../database/entities';
import { CredentialsModule } from '../credentials/credentials.module';
import { AccessModule } from '../access/access.module';
import { ContentController } from './content.controller';
import { ContentStoreService } from './content-store.service';
import { StoredFileAllocator } from './stored-file.allocator';

@Module({
  imports: [
    TypeOrmModule.forFeature([ContentItem]),
    // 검증 전까지는 메모리에만 보관
    MulterModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        limits: {
          fileSize: configService.get<number>('storage.maxUploadBytes'),
          files: 1,
        },
      }),
    }),
    CredentialsModule,
    AccessModule,
  ],
  controllers: [ContentController],
  providers: [ContentStoreService, StoredFileAllocator],
  exports: [ContentStoreService, StoredFileAllocator],
})
export class ContentModule {}
