import { ContentChannel } from '../database/entities';

export type Visibility = 'recipient' | 'sender-or-recipient';

export interface ChannelPolicy {
  channel: ContentChannel;
  // MIME 타입 접두사, null 이면 모든 타입 허용
  allowedMimePrefix: string | null;
  recipientRequired: boolean;
  visibility: Visibility;
  storedFilePrefix: string;
}

/**
 * 채널별 정책
 * photos: 이미지만, 수신자 필수, 수신자만 조회
 * files: 모든 타입, 수신자 선택, 보낸 사람 또는 받는 사람 조회
 */
export const CHANNEL_POLICIES: Record<ContentChannel, ChannelPolicy> = {
  photos: {
    channel: 'photos',
    allowedMimePrefix: 'image/',
    recipientRequired: true,
    visibility: 'recipient',
    storedFilePrefix: 'photo-',
  },
  files: {
    channel: 'files',
    allowedMimePrefix: null,
    recipientRequired: false,
    visibility: 'sender-or-recipient',
    storedFilePrefix: 'upload-',
  },
};

export function acceptsMimeType(policy: ChannelPolicy, mimeType: string): boolean {
  if (policy.allowedMimePrefix === null) return true;
  return mimeType.toLowerCase().startsWith(policy.allowedMimePrefix);
}

export function isVisibleTo(
  policy: ChannelPolicy,
  item: { senderId: number; recipientId: number | null },
  userId: number,
): boolean {
  if (item.recipientId === userId) return true;
  return policy.visibility === 'sender-or-recipient' && item.senderId === userId;
}
