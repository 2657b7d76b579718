import { Injectable, Logger } from '@nestjs/common';
import { randomBytes } from 'crypto';

export interface Session {
  token: string;
  userName: string;
  createdAt: Date;
}

const TOKEN_BYTES = 32;

/**
 * 프로세스 메모리 세션 저장소
 * 토큰은 CSPRNG 32바이트, 만료 없음 (로그아웃 시 제거)
 */
@Injectable()
export class SessionRegistry {
  private readonly logger = new Logger(SessionRegistry.name);
  private readonly sessions = new Map<string, Session>();

  /**
   * 세션 생성 후 토큰 반환
   */
  create(userName: string): string {
    let token = newToken();
    while (this.sessions.has(token)) {
      token = newToken();
    }

    this.sessions.set(token, { token, userName, createdAt: new Date() });
    this.logger.debug(`Session opened for ${userName}`);
    return token;
  }

  get(token: string): Session | null {
    return this.sessions.get(token) ?? null;
  }

  resolve(token: string): string | null {
    return this.get(token)?.userName ?? null;
  }

  // 없는 토큰이면 무시
  destroy(token: string): void {
    const session = this.sessions.get(token);
    if (!session) return;

    this.sessions.delete(token);
    this.logger.debug(`Session closed for ${session.userName}`);
  }

  /**
   * 사용자의 모든 세션 제거, 제거한 개수 반환
   */
  destroyAllFor(userName: string): number {
    let removed = 0;
    for (const [token, session] of this.sessions) {
      if (session.userName === userName) {
        this.sessions.delete(token);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}

function newToken(): string {
  return randomBytes(TOKEN_BYTES).toString('base64url');
}
