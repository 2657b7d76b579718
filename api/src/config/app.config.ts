import { registerAs } from '@nestjs/config';

export default registerAs('app', () => ({
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  // bcrypt 비용 계수
  bcryptRounds: parseInt(process.env.BCRYPT_ROUNDS || '12', 10),

  // 처음 보는 이름으로 로그인 시 자동 가입
  autoRegister: process.env.AUTO_REGISTER !== 'false',

  defaultPageSize: parseInt(process.env.DEFAULT_PAGE_SIZE || '20', 10),
  maxPageSize: parseInt(process.env.MAX_PAGE_SIZE || '100', 10),

  shutdownTimeout: parseInt(process.env.SHUTDOWN_TIMEOUT || '30000', 10),
}));
