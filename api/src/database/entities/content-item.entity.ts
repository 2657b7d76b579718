import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { User } from './user.entity';

export type ContentChannel = 'photos' | 'files';

@Entity('content_items')
export class ContentItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'varchar', length: 16 })
  channel!: ContentChannel;

  @Index()
  @Column({ name: 'sender_id', type: 'int' })
  senderId!: number;

  @Index()
  @Column({ name: 'recipient_id', type: 'int', nullable: true })
  recipientId!: number | null;

  @Column({ name: 'stored_filename', type: 'varchar', length: 255, unique: true })
  storedFilename!: string;

  @Column({ name: 'original_filename', type: 'varchar', length: 255 })
  originalFilename!: string;

  @Column({ name: 'mime_type', type: 'varchar', length: 127 })
  mimeType!: string;

  @Column({ type: 'int' })
  size!: number;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @ManyToOne(() => User, (user) => user.sentItems)
  @JoinColumn({ name: 'sender_id' })
  sender!: User;

  @ManyToOne(() => User, (user) => user.receivedItems, { nullable: true })
  @JoinColumn({ name: 'recipient_id' })
  recipient!: User | null;
}
