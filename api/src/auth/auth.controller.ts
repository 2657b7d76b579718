import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Redirect,
  Res,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Response } from 'express';
import { User } from '../database/entities';
import { CredentialsService } from '../credentials/credentials.service';
import { SessionRegistry } from '../sessions/session-registry.service';
import { AccessControllerService, Identity } from '../access/access-controller.service';
import { SESSION_COOKIE, SessionToken } from '../access/session-token.decorator';
import { NotFoundError } from '../common/errors';
import { toUserView, UserView } from './user.view';

const MAX_NAME_LENGTH = 64;

interface CredentialsBody {
  username?: unknown;
  password?: unknown;
}

@Controller()
export class AuthController {
  private readonly logger = new Logger(AuthController.name);
  private readonly autoRegister: boolean;

  constructor(
    private readonly credentialsService: CredentialsService,
    private readonly sessionRegistry: SessionRegistry,
    private readonly accessController: AccessControllerService,
    private readonly configService: ConfigService,
  ) {
    this.autoRegister = this.configService.get<boolean>('app.autoRegister') ?? true;
  }

  /**
   * 로그인
   * 자격 증명 검증 후 세션 발급, 처음 보는 이름이면 즉시 가입 (AUTO_REGISTER=false 제외)
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(
    @SessionToken() token: string | undefined,
    @Body() body: CredentialsBody,
    @Res({ passthrough: true }) response: Response,
  ) {
    const { username, password } = readCredentials(body);
    const previous = await this.accessController.authorize(token, 'login');

    let user: User;
    try {
      user = await this.credentialsService.verify(username, password);
    } catch (error) {
      if (!(error instanceof NotFoundError) || !this.autoRegister) {
        throw error;
      }
      user = await this.credentialsService.register(username, password);
    }

    // 실패한 로그인은 기존 세션을 건드리지 않음
    this.closeSession(previous);
    return this.openSession(user, response);
  }

  /**
   * 명시적 회원 가입
   * 이름 중복 시 409, 기존 세션은 가입 성공 후에만 교체
   */
  @Post('signup')
  async signup(
    @SessionToken() token: string | undefined,
    @Body() body: CredentialsBody,
    @Res({ passthrough: true }) response: Response,
  ) {
    const { username, password } = readCredentials(body);
    const previous = await this.accessController.authorize(token, 'signup');

    const user = await this.credentialsService.register(username, password);

    this.closeSession(previous);
    return this.openSession(user, response);
  }

  /**
   * 로그아웃
   * 세션이 없어도 에러 없이 / 로 리다이렉트
   */
  @Post('logout')
  @Redirect('/', HttpStatus.FOUND)
  async logout(
    @SessionToken() token: string | undefined,
    @Res({ passthrough: true }) response: Response,
  ): Promise<void> {
    const identity = await this.accessController.authorize(token, 'logout');
    if (token) {
      this.sessionRegistry.destroy(token);
    }
    if (identity) {
      this.logger.log(`${identity.name} logged out`);
    }
    response.clearCookie(SESSION_COOKIE);
  }

  /**
   * 현재 세션 사용자 조회
   * 클라이언트가 로그인 폼 표시 여부를 판단하는 용도, 세션이 없으면 data: null
   */
  @Get('user')
  async currentUser(@SessionToken() token: string | undefined) {
    const identity = await this.accessController.authorize(token, 'current-user');
    return {
      success: true,
      data: identity ? toUserView({ id: identity.userId, name: identity.name }) : null,
    };
  }

  private closeSession(previous: Identity | null): void {
    if (previous) {
      this.sessionRegistry.destroy(previous.token);
    }
  }

  private openSession(
    user: User,
    response: Response,
  ): { success: true; data: UserView; token: string } {
    const token = this.sessionRegistry.create(user.name);
    response.cookie(SESSION_COOKIE, token, { httpOnly: true, sameSite: 'lax' });
    this.logger.log(`${user.name} logged in`);
    return { success: true, data: toUserView(user), token };
  }
}

function readCredentials(body: CredentialsBody | undefined): { username: string; password: string } {
  const rawName = body?.username;
  const rawPassword = body?.password;
  const username = typeof rawName === 'string' ? rawName.trim() : '';
  const password = typeof rawPassword === 'string' ? rawPassword : '';

  if (username.length === 0 || username.length > MAX_NAME_LENGTH) {
    throw new BadRequestException(`username must be 1-${MAX_NAME_LENGTH} characters`);
  }
  if (password.length === 0) {
    throw new BadRequestException('password is required');
  }
  return { username, password };
}
