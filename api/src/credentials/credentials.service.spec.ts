import { Test, TestingModule } from '@nestjs/testing';
import { CredentialsService } from './credentials.service';
import { CredentialsModule } from './credentials.module';
import {
  DuplicateNameError,
  InvalidCredentialsError,
  NotFoundError,
} from '../common/errors';
import { testingImports } from '../../test/support/testing-modules';

describe('CredentialsService', () => {
  let moduleRef: TestingModule;
  let credentials: CredentialsService;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [...testingImports(), CredentialsModule],
    }).compile();
    credentials = moduleRef.get(CredentialsService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('registers a user and verifies the same password', async () => {
    const registered = await credentials.register('alice', 'p1');

    expect(registered.id).toBe(1);
    expect(registered.name).toBe('alice');

    const verified = await credentials.verify('alice', 'p1');
    expect(verified.id).toBe(registered.id);
    expect(verified.name).toBe('alice');
  });

  it('stores a bcrypt hash, not the password', async () => {
    const user = await credentials.register('alice', 'p1');

    expect(user.passwordHash).not.toBe('p1');
    expect(user.passwordHash).toMatch(/^\$2[aby]\$04\$/);
  });

  it('rejects a wrong password with InvalidCredentialsError', async () => {
    await credentials.register('alice', 'p1');

    await expect(credentials.verify('alice', 'wrong')).rejects.toBeInstanceOf(
      InvalidCredentialsError,
    );
    await expect(credentials.verify('alice', 'P1')).rejects.toBeInstanceOf(
      InvalidCredentialsError,
    );
  });

  it('reports an unknown name as NotFoundError', async () => {
    await credentials.register('alice', 'p1');

    await expect(credentials.verify('mallory', 'p1')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('refuses to register a taken name', async () => {
    await credentials.register('alice', 'p1');

    await expect(credentials.register('alice', 'other')).rejects.toBeInstanceOf(
      DuplicateNameError,
    );
    await expect(credentials.verify('alice', 'p1')).resolves.toMatchObject({ name: 'alice' });
  });

  it('translates a unique-index violation into DuplicateNameError', async () => {
    await credentials.register('alice', 'p1');
    // a concurrent registration that passed the existence check
    jest.spyOn(credentials, 'findByName').mockResolvedValueOnce(null);

    await expect(credentials.register('alice', 'p2')).rejects.toBeInstanceOf(
      DuplicateNameError,
    );
    await expect(credentials.verify('alice', 'p1')).resolves.toMatchObject({ name: 'alice' });
  });

  it('looks users up by name and id', async () => {
    const alice = await credentials.register('alice', 'p1');

    await expect(credentials.findByName('alice')).resolves.toMatchObject({ id: alice.id });
    await expect(credentials.findById(alice.id)).resolves.toMatchObject({ name: 'alice' });
    await expect(credentials.findByName('bob')).resolves.toBeNull();
  });
});
