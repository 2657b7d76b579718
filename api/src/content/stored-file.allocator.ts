import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { StorageFault } from '../common/errors';

const MAX_ATTEMPTS = 5;
const SAFE_EXTENSION = /^\.[a-z0-9]{1,16}$/;

/**
 * 업로드 파일 배치
 * 저장 루트 아래 `<prefix><uuid><extension>` 이름으로 기록, 기존 파일은 절대 덮어쓰지 않음
 */
@Injectable()
export class StoredFileAllocator {
  private readonly logger = new Logger(StoredFileAllocator.name);
  readonly root: string;

  constructor(private configService: ConfigService) {
    this.root = path.resolve(this.configService.get<string>('storage.root') || './uploads');
  }

  /**
   * 저장 파일명 → 절대 경로 (루트 밖으로 나가는 경로는 basename 으로 차단)
   */
  pathOf(storedFilename: string): string {
    return path.join(this.root, path.basename(storedFilename));
  }

  /**
   * 충돌 없는 이름을 할당해 바이트 기록
   * 이름 충돌(EEXIST) 시 새 uuid 로 MAX_ATTEMPTS 회까지 재시도
   */
  async place(prefix: string, originalFilename: string, content: Buffer): Promise<string> {
    const extension = extensionOf(originalFilename);

    try {
      await fs.mkdir(this.root, { recursive: true });
    } catch (error) {
      throw new StorageFault(`Cannot create storage root ${this.root}`, error);
    }

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const storedFilename = `${prefix}${uuidv4()}${extension}`;
      const filePath = this.pathOf(storedFilename);

      let handle: fs.FileHandle;
      try {
        // 'wx': 이미 있으면 EEXIST, 덮어쓰지 않음
        handle = await fs.open(filePath, 'wx');
      } catch (error) {
        if (errorCode(error) === 'EEXIST') {
          this.logger.warn(`Stored name collision on ${storedFilename}, retrying`);
          continue;
        }
        throw new StorageFault(`Cannot create ${storedFilename}`, error);
      }

      try {
        try {
          await handle.writeFile(content);
        } finally {
          await handle.close();
        }
      } catch (error) {
        // 쓰다 만 파일은 남기지 않음
        await this.remove(storedFilename);
        throw new StorageFault(`Cannot write ${storedFilename}`, error);
      }

      return storedFilename;
    }

    throw new StorageFault(`No free file name after ${MAX_ATTEMPTS} attempts`);
  }

  /**
   * 저장 파일 삭제 (이미 없으면 무시)
   */
  async remove(storedFilename: string): Promise<void> {
    try {
      await fs.unlink(this.pathOf(storedFilename));
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') {
        this.logger.error(`Failed to remove ${storedFilename}: ${String(error)}`);
      }
    }
  }
}

export function extensionOf(originalFilename: string): string {
  const extension = path.extname(path.basename(originalFilename)).toLowerCase();
  return SAFE_EXTENSION.test(extension) ? extension : '';
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
