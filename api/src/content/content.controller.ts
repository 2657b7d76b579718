import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FileInterceptor } from '@nestjs/platform-express';
import { ContentChannel } from '../database/entities';
import { AccessControllerService } from '../access/access-controller.service';
import { SessionToken } from '../access/session-token.decorator';
import { ContentStoreService, PageRequest } from './content-store.service';
import { toContentItemView } from './content-item.view';

interface UploadBody {
  recipient?: unknown;
}

@Controller()
export class ContentController {
  private readonly defaultPageSize: number;
  private readonly maxPageSize: number;

  constructor(
    private readonly contentStore: ContentStoreService,
    private readonly accessController: AccessControllerService,
    private readonly configService: ConfigService,
  ) {
    this.defaultPageSize = this.configService.get<number>('app.defaultPageSize') || 20;
    this.maxPageSize = this.configService.get<number>('app.maxPageSize') || 100;
  }

  /**
   * 파일 업로드
   * 모든 콘텐츠 타입 허용, 수신자는 선택
   */
  @Post('upload')
  @UseInterceptors(FileInterceptor('file'))
  upload(
    @SessionToken() token: string | undefined,
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: UploadBody | undefined,
  ) {
    return this.storeUpload('files', token, file, body);
  }

  /**
   * 사진 공유
   * image/* 만 허용, 수신자 필수
   */
  @Post('photos')
  @UseInterceptors(FileInterceptor('file'))
  sharePhoto(
    @SessionToken() token: string | undefined,
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() body: UploadBody | undefined,
  ) {
    return this.storeUpload('photos', token, file, body);
  }

  /**
   * 내가 보냈거나 받은 파일 목록
   * GET /files?page=1&size=20
   */
  @Get('files')
  listFiles(
    @SessionToken() token: string | undefined,
    @Query('page') page?: string,
    @Query('size') size?: string,
  ) {
    return this.list('files', token, page, size);
  }

  /**
   * 나에게 온 사진 목록 (최신순)
   * GET /photos?page=1&size=20
   */
  @Get('photos')
  listPhotos(
    @SessionToken() token: string | undefined,
    @Query('page') page?: string,
    @Query('size') size?: string,
  ) {
    return this.list('photos', token, page, size);
  }

  /**
   * 파일 단건 조회
   * 보낸 사람 또는 받는 사람만 접근 가능
   */
  @Get('files/:id')
  readFile(
    @SessionToken() token: string | undefined,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.read('files', token, id);
  }

  /**
   * 사진 단건 조회
   * 받는 사람만 접근 가능
   */
  @Get('photos/:id')
  readPhoto(
    @SessionToken() token: string | undefined,
    @Param('id', ParseIntPipe) id: number,
  ) {
    return this.read('photos', token, id);
  }

  private async storeUpload(
    channel: ContentChannel,
    token: string | undefined,
    file: Express.Multer.File | undefined,
    body: UploadBody | undefined,
  ) {
    const identity = await this.accessController.authorize(token, 'upload');
    if (!file) {
      throw new BadRequestException('file is required');
    }

    const recipient = body?.recipient;
    const item = await this.contentStore.store({
      channel,
      senderName: identity.name,
      recipientName: typeof recipient === 'string' && recipient.trim() ? recipient.trim() : null,
      content: file.buffer,
      declaredMimeType: file.mimetype,
      originalFilename: decodeFilename(file.originalname),
    });

    return { success: true, data: toContentItemView(item) };
  }

  private async list(
    channel: ContentChannel,
    token: string | undefined,
    page?: string,
    size?: string,
  ) {
    const identity = await this.accessController.authorize(token, 'list');
    const pageRequest = this.pageRequest(page, size);
    const { items, total } = await this.contentStore.listFor(identity.name, channel, pageRequest);

    return {
      success: true,
      data: items.map(toContentItemView),
      page: { number: pageRequest.page, size: pageRequest.size, total },
    };
  }

  private async read(channel: ContentChannel, token: string | undefined, id: number) {
    const identity = await this.accessController.authorize(token, 'read');
    const item = await this.contentStore.findInChannel(channel, id);
    this.accessController.assertCanRead(identity, item);

    return { success: true, data: toContentItemView(item) };
  }

  private pageRequest(page?: string, size?: string): PageRequest {
    const pageNumber = page ? parseInt(page, 10) : 1;
    const pageSize = size ? parseInt(size, 10) : this.defaultPageSize;

    const request: PageRequest = {
      page: Number.isFinite(pageNumber) && pageNumber > 0 ? pageNumber : 1,
      size: Number.isFinite(pageSize) && pageSize > 0
        ? Math.min(pageSize, this.maxPageSize)
        : this.defaultPageSize,
    };

    // DB 가 받을 수 없는 OFFSET 차단
    if (!Number.isSafeInteger((request.page - 1) * request.size)) {
      throw new BadRequestException('page is out of range');
    }
    return request;
  }
}

/**
 * multer(busboy) 는 multipart 파일명을 latin1 로 디코딩하므로 UTF-8 로 복원
 */
export function decodeFilename(originalname: string): string {
  return Buffer.from(originalname, 'latin1').toString('utf8');
}
