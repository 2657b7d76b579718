import { registerAs } from '@nestjs/config';

export type DatabaseType = 'mysql' | 'better-sqlite3';

function databaseType(value: string | undefined): DatabaseType {
  return value === 'better-sqlite3' || value === 'sqlite' ? 'better-sqlite3' : 'mysql';
}

export default registerAs('database', () => ({
  type: databaseType(process.env.DB_TYPE),
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '3306', 10),
  username: process.env.DB_USERNAME || 'root',
  password: process.env.DB_PASSWORD || 'password',
  // better-sqlite3 인 경우 파일 경로 (또는 :memory:)
  database: process.env.DB_DATABASE || 'photo_share',

  poolSize: parseInt(process.env.DB_POOL_SIZE || '10', 10),
  queueLimit: parseInt(process.env.DB_QUEUE_LIMIT || '0', 10),

  synchronize: process.env.DB_SYNCHRONIZE === 'true',
  logging: process.env.DB_LOGGING === 'true',
}));
