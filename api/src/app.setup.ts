import { NestExpressApplication } from '@nestjs/platform-express';
import cookieParser from 'cookie-parser';
import { StoredFileAllocator } from './content/stored-file.allocator';

/**
 * Express 설정 (main.ts 와 e2e 테스트 공용)
 */
export function configureApp(app: NestExpressApplication): NestExpressApplication {
  app.use(cookieParser());

  // 저장된 파일은 /uploads/<파일명> 으로 제공
  const allocator = app.get(StoredFileAllocator);
  app.useStaticAssets(allocator.root, { prefix: '/uploads/', index: false });
  return app;
}
