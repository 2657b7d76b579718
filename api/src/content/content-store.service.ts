import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, Repository } from 'typeorm';
import { ContentChannel, ContentItem, User } from '../database/entities';
import { CredentialsService } from '../credentials/credentials.service';
import {
  DomainError,
  NotAuthenticatedError,
  NotFoundError,
  StorageFault,
  UnknownRecipientError,
  UnsupportedTypeError,
} from '../common/errors';
import { CHANNEL_POLICIES, acceptsMimeType } from './channel-policy';
import { StoredFileAllocator } from './stored-file.allocator';

export interface StoreRequest {
  channel: ContentChannel;
  senderName: string;
  recipientName?: string | null;
  content: Buffer;
  declaredMimeType: string;
  originalFilename: string;
}

export interface PageRequest {
  page: number;
  size: number;
}

export interface ContentPage {
  items: ContentItem[];
  total: number;
}

@Injectable()
export class ContentStoreService {
  private readonly logger = new Logger(ContentStoreService.name);

  constructor(
    @InjectRepository(ContentItem)
    private contentRepository: Repository<ContentItem>,
    private credentialsService: CredentialsService,
    private allocator: StoredFileAllocator,
  ) {}

  /**
   * 콘텐츠 저장
   * 검증(발신자 → 수신자 → 타입)을 모두 통과한 뒤에만 파일 기록,
   * 행 저장 실패 시 파일 삭제 후 StorageFault
   */
  async store(request: StoreRequest): Promise<ContentItem> {
    const policy = CHANNEL_POLICIES[request.channel];

    const sender = await this.credentialsService.findByName(request.senderName);
    if (!sender) {
      throw new NotAuthenticatedError();
    }

    const recipient = await this.resolveRecipient(request.recipientName);
    if (!recipient && policy.recipientRequired) {
      throw new UnknownRecipientError(`A recipient is required for ${request.channel}`);
    }

    if (!acceptsMimeType(policy, request.declaredMimeType)) {
      throw new UnsupportedTypeError(request.declaredMimeType);
    }

    const storedFilename = await this.allocator.place(
      policy.storedFilePrefix,
      request.originalFilename,
      request.content,
    );

    const item = this.contentRepository.create({
      channel: request.channel,
      senderId: sender.id,
      recipientId: recipient ? recipient.id : null,
      storedFilename,
      originalFilename: request.originalFilename,
      mimeType: request.declaredMimeType,
      size: request.content.length,
    });

    try {
      await this.contentRepository.save(item);
    } catch (error) {
      await this.allocator.remove(storedFilename);
      if (error instanceof DomainError) throw error;
      throw new StorageFault('Could not record the upload', error);
    }

    this.logger.log(
      `Stored ${request.channel} item ${item.id} as ${storedFilename} from ${sender.name}`,
    );
    return item;
  }

  /**
   * 사용자가 볼 수 있는 항목 목록 (최신순)
   * photos: 받은 것만, files: 보냈거나 받은 것
   */
  async listFor(
    userName: string,
    channel: ContentChannel,
    page: PageRequest,
  ): Promise<ContentPage> {
    const user = await this.credentialsService.findByName(userName);
    if (!user) {
      throw new NotAuthenticatedError();
    }

    const [items, total] = await this.contentRepository.findAndCount({
      where: this.visibleTo(user, channel),
      order: { createdAt: 'DESC', id: 'DESC' },
      skip: (page.page - 1) * page.size,
      take: page.size,
    });
    return { items, total };
  }

  /**
   * 채널 내 단건 조회, 권한 확인은 호출 측 책임
   */
  async findInChannel(channel: ContentChannel, id: number): Promise<ContentItem> {
    const item = await this.contentRepository.findOne({ where: { id, channel } });
    if (!item) {
      throw new NotFoundError(`No ${channel} item ${id}`);
    }
    return item;
  }

  private async resolveRecipient(recipientName?: string | null): Promise<User | null> {
    if (!recipientName) return null;

    const recipient = await this.credentialsService.findByName(recipientName);
    if (!recipient) {
      throw new UnknownRecipientError(`No user named "${recipientName}"`);
    }
    return recipient;
  }

  private visibleTo(
    user: User,
    channel: ContentChannel,
  ): FindOptionsWhere<ContentItem> | FindOptionsWhere<ContentItem>[] {
    if (CHANNEL_POLICIES[channel].visibility === 'recipient') {
      return { channel, recipientId: user.id };
    }
    return [
      { channel, senderId: user.id },
      { channel, recipientId: user.id },
    ];
  }
}
