import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DatabaseType } from '../config/database.config';
import { User, ContentItem } from './entities';
import { InitialSchema1760745600000 } from './migrations/1760745600000-initial-schema';

interface DatabaseSettings {
  type: DatabaseType;
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  poolSize: number;
  queueLimit: number;
  synchronize: boolean;
  logging: boolean;
}

export const ENTITIES = [User, ContentItem];
export const MIGRATIONS = [InitialSchema1760745600000];

export function typeOrmOptionsFactory(configService: ConfigService): TypeOrmModuleOptions {
  const dbConfig = configService.getOrThrow<DatabaseSettings>('database');

  // synchronize 를 끄면 기동 시 마이그레이션으로 스키마 생성
  const schema = {
    synchronize: dbConfig.synchronize,
    migrations: MIGRATIONS,
    migrationsRun: !dbConfig.synchronize,
  };

  // 임베디드 DB (로컬 실행, 테스트)
  if (dbConfig.type === 'better-sqlite3') {
    return {
      type: 'better-sqlite3',
      database: dbConfig.database,
      entities: ENTITIES,
      ...schema,
      logging: dbConfig.logging,
    };
  }

  return {
    type: 'mysql',
    host: dbConfig.host,
    port: dbConfig.port,
    username: dbConfig.username,
    password: dbConfig.password,
    database: dbConfig.database,
    entities: ENTITIES,
    ...schema,
    logging: dbConfig.logging,
    // 커넥션 풀 설정
    extra: {
      connectionLimit: dbConfig.poolSize,
      waitForConnections: true,
      queueLimit: dbConfig.queueLimit,
    },
    poolSize: dbConfig.poolSize,
  };
}
