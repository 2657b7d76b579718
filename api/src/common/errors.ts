export type DomainErrorCode =
  | 'DUPLICATE_NAME'
  | 'NOT_FOUND'
  | 'INVALID_CREDENTIALS'
  | 'NOT_AUTHENTICATED'
  | 'UNKNOWN_RECIPIENT'
  | 'UNSUPPORTED_TYPE'
  | 'FORBIDDEN'
  | 'STORAGE_FAULT';

/**
 * 도메인 에러 기본 클래스
 * code 는 에러 응답 본문에 그대로 실림 (DomainExceptionFilter 참고)
 */
export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DuplicateNameError extends DomainError {
  readonly code = 'DUPLICATE_NAME';

  constructor(name: string) {
    super(`User name "${name}" is already taken`);
  }
}

export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND';

  constructor(message: string = 'Resource not found') {
    super(message);
  }
}

export class InvalidCredentialsError extends DomainError {
  readonly code = 'INVALID_CREDENTIALS';

  constructor(message: string = 'Invalid user name or password') {
    super(message);
  }
}

export class NotAuthenticatedError extends DomainError {
  readonly code = 'NOT_AUTHENTICATED';

  constructor(message: string = 'Login required') {
    super(message);
  }
}

export class UnknownRecipientError extends DomainError {
  readonly code = 'UNKNOWN_RECIPIENT';

  constructor(message: string) {
    super(message);
  }
}

export class UnsupportedTypeError extends DomainError {
  readonly code = 'UNSUPPORTED_TYPE';

  constructor(mimeType: string) {
    super(`Content type "${mimeType}" is not accepted here`);
  }
}

export class AuthorizationError extends DomainError {
  readonly code = 'FORBIDDEN';

  constructor(message: string = 'Not allowed') {
    super(message);
  }
}

/**
 * 요청은 정상이나 저장 실패 (디스크, DB)
 */
export class StorageFault extends DomainError {
  readonly code = 'STORAGE_FAULT';

  constructor(
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
  }
}
