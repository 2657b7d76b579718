import { ContentItem } from '../database/entities';

export interface ContentItemView {
  id: number;
  filename: string;
  originalFilename: string;
  senderId: number;
  recipientId: number | null;
  mimeType: string;
  size: number;
  createdAt: Date;
}

export function toContentItemView(item: ContentItem): ContentItemView {
  return {
    id: item.id,
    filename: item.storedFilename,
    originalFilename: item.originalFilename,
    senderId: item.senderId,
    recipientId: item.recipientId,
    mimeType: item.mimeType,
    size: item.size,
    createdAt: item.createdAt,
  };
}
