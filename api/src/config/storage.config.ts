import { registerAs } from '@nestjs/config';

export default registerAs('storage', () => ({
  // 업로드 저장 경로, /uploads 로 공개
  root: process.env.STORAGE_ROOT || './uploads',
  maxUploadBytes: parseInt(process.env.MAX_UPLOAD_BYTES || String(10 * 1024 * 1024), 10),
}));
