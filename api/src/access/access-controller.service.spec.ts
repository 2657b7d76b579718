import { Test, TestingModule } from '@nestjs/testing';
import { ContentItem } from '../database/entities';
import { CredentialsService } from '../credentials/credentials.service';
import { SessionRegistry } from '../sessions/session-registry.service';
import { AuthorizationError, NotAuthenticatedError } from '../common/errors';
import { AccessModule } from './access.module';
import { AccessControllerService, Identity } from './access-controller.service';
import { testingImports } from '../../test/support/testing-modules';

function itemOf(fields: Pick<ContentItem, 'id' | 'channel' | 'senderId' | 'recipientId'>) {
  return Object.assign(new ContentItem(), fields);
}

describe('AccessControllerService', () => {
  let moduleRef: TestingModule;
  let access: AccessControllerService;
  let sessions: SessionRegistry;
  let credentials: CredentialsService;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [...testingImports(), AccessModule],
    }).compile();

    access = moduleRef.get(AccessControllerService);
    sessions = moduleRef.get(SessionRegistry);
    credentials = moduleRef.get(CredentialsService);

    await credentials.register('alice', 'p1');
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('authorize', () => {
    it('lets public operations through without a session', async () => {
      await expect(access.authorize(undefined, 'login')).resolves.toBeNull();
      await expect(access.authorize(undefined, 'signup')).resolves.toBeNull();
      await expect(access.authorize(undefined, 'logout')).resolves.toBeNull();
      await expect(access.authorize('bogus', 'current-user')).resolves.toBeNull();
    });

    it.each(['upload', 'list', 'read'] as const)(
      'requires a session for %s',
      async (operation) => {
        await expect(access.authorize(undefined, operation)).rejects.toBeInstanceOf(
          NotAuthenticatedError,
        );
        await expect(access.authorize('bogus', operation)).rejects.toBeInstanceOf(
          NotAuthenticatedError,
        );
      },
    );

    it('resolves a live session to the user identity', async () => {
      const token = sessions.create('alice');

      await expect(access.authorize(token, 'upload')).resolves.toEqual({
        userId: 1,
        name: 'alice',
        token,
      });
      await expect(access.authorize(token, 'current-user')).resolves.toEqual({
        userId: 1,
        name: 'alice',
        token,
      });
    });

    it('rejects a token after logout', async () => {
      const token = sessions.create('alice');
      sessions.destroy(token);

      await expect(access.authorize(token, 'list')).rejects.toBeInstanceOf(NotAuthenticatedError);
    });

    it('drops sessions whose user no longer exists', async () => {
      const token = sessions.create('ghost');

      await expect(access.authorize(token, 'current-user')).resolves.toBeNull();
      expect(sessions.resolve(token)).toBeNull();
    });
  });

  describe('assertCanRead', () => {
    const alice: Identity = { userId: 1, name: 'alice', token: 't1' };
    const bob: Identity = { userId: 2, name: 'bob', token: 't2' };

    it('allows only the recipient to read a photo', () => {
      const item = itemOf({ id: 7, channel: 'photos', senderId: 1, recipientId: 2 });

      expect(() => access.assertCanRead(bob, item)).not.toThrow();
      expect(() => access.assertCanRead(alice, item)).toThrow(AuthorizationError);
    });

    it('allows sender and recipient to read a file', () => {
      const item = itemOf({ id: 8, channel: 'files', senderId: 1, recipientId: null });

      expect(() => access.assertCanRead(alice, item)).not.toThrow();
      expect(() => access.assertCanRead(bob, item)).toThrow(AuthorizationError);
    });
  });
});
