import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { QueryFailedError, Repository } from 'typeorm';
import * as bcrypt from 'bcrypt';
import { User } from '../database/entities';
import {
  DuplicateNameError,
  InvalidCredentialsError,
  NotFoundError,
} from '../common/errors';

// 드라이버별 UNIQUE 인덱스 위반 코드
const UNIQUE_VIOLATION_CODES = new Set([
  'ER_DUP_ENTRY',
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT',
]);

@Injectable()
export class CredentialsService {
  private readonly logger = new Logger(CredentialsService.name);
  private readonly bcryptRounds: number;

  constructor(
    @InjectRepository(User)
    private userRepository: Repository<User>,
    private configService: ConfigService,
  ) {
    this.bcryptRounds = this.configService.get<number>('app.bcryptRounds') || 12;
  }

  /**
   * 이름으로 사용자 조회
   */
  findByName(name: string): Promise<User | null> {
    return this.userRepository.findOne({ where: { name } });
  }

  findById(id: number): Promise<User | null> {
    return this.userRepository.findOne({ where: { id } });
  }

  /**
   * 회원 가입
   * 비밀번호는 bcrypt 해시로만 저장, 이름 중복 시 DuplicateNameError
   */
  async register(name: string, plaintextPassword: string): Promise<User> {
    if (await this.findByName(name)) {
      throw new DuplicateNameError(name);
    }

    const passwordHash = await bcrypt.hash(plaintextPassword, this.bcryptRounds);
    const user = this.userRepository.create({ name, passwordHash });

    try {
      await this.userRepository.save(user);
    } catch (error) {
      // 중복 확인과 INSERT 사이에 동시 가입이 먼저 들어온 경우
      if (isUniqueViolation(error)) {
        throw new DuplicateNameError(name);
      }
      throw error;
    }

    this.logger.log(`Registered user ${user.id} (${name})`);
    return user;
  }

  /**
   * 자격 증명 검증
   * 없는 이름은 NotFoundError, 비밀번호 불일치는 InvalidCredentialsError
   */
  async verify(name: string, plaintextPassword: string): Promise<User> {
    const user = await this.findByName(name);
    if (!user) {
      throw new NotFoundError(`No user named "${name}"`);
    }

    const matches = await bcrypt.compare(plaintextPassword, user.passwordHash);
    if (!matches) {
      throw new InvalidCredentialsError();
    }
    return user;
  }
}

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(driverError.code)
  );
}
