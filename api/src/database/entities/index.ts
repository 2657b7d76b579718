export { User } from './user.entity';
export { ContentItem } from './content-item.entity';
export type { ContentChannel } from './content-item.entity';
