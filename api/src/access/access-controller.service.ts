import { Injectable, Logger } from '@nestjs/common';
import { ContentItem } from '../database/entities';
import { CredentialsService } from '../credentials/credentials.service';
import { SessionRegistry } from '../sessions/session-registry.service';
import { AuthorizationError, NotAuthenticatedError } from '../common/errors';
import { CHANNEL_POLICIES, isVisibleTo } from '../content/channel-policy';

export type PublicOperation = 'login' | 'signup' | 'logout' | 'current-user';
export type ProtectedOperation = 'upload' | 'list' | 'read';
export type Operation = PublicOperation | ProtectedOperation;

export interface Identity {
  userId: number;
  name: string;
  token: string;
}

const PUBLIC_OPERATIONS: ReadonlySet<Operation> = new Set<Operation>([
  'login',
  'signup',
  'logout',
  'current-user',
]);

/**
 * 세션 토큰으로 요청자를 확인하고 작업 허용 여부 판단
 * 자체 상태 없음
 */
@Injectable()
export class AccessControllerService {
  private readonly logger = new Logger(AccessControllerService.name);

  constructor(
    private sessionRegistry: SessionRegistry,
    private credentialsService: CredentialsService,
  ) {}

  /**
   * 작업 권한 확인
   * 공개 작업은 Identity 또는 null, 보호 작업은 세션이 없으면 NotAuthenticatedError
   */
  authorize(token: string | undefined, operation: PublicOperation): Promise<Identity | null>;
  authorize(token: string | undefined, operation: ProtectedOperation): Promise<Identity>;
  async authorize(token: string | undefined, operation: Operation): Promise<Identity | null> {
    const identity = await this.resolveIdentity(token);
    if (identity || PUBLIC_OPERATIONS.has(operation)) {
      return identity;
    }
    throw new NotAuthenticatedError(`Login required for ${operation}`);
  }

  /**
   * 채널 공개 범위에 맞지 않으면 AuthorizationError
   */
  assertCanRead(identity: Identity, item: ContentItem): void {
    if (!isVisibleTo(CHANNEL_POLICIES[item.channel], item, identity.userId)) {
      throw new AuthorizationError(`Item ${item.id} is not addressed to ${identity.name}`);
    }
  }

  private async resolveIdentity(token: string | undefined): Promise<Identity | null> {
    if (!token) return null;

    const name = this.sessionRegistry.resolve(token);
    if (!name) return null;

    const user = await this.credentialsService.findByName(name);
    // 사용자 행이 사라진 세션은 폐기
    if (!user) {
      this.logger.warn(`Session for missing user ${name} dropped`);
      this.sessionRegistry.destroyAllFor(name);
      return null;
    }
    return { userId: user.id, name: user.name, token };
  }
}
