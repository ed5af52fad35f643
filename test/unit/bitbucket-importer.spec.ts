/**
 * Tests for BitbucketImporter
 */

import { BitbucketImporter } from '@core/bitbucket/bitbucket-importer';
import {
  NoLinkedAccountError,
  RemoteSyncError,
  StubOAuthSession,
  type RemoteRepositoryStore,
  type SessionSource,
  type SocialAccount,
  type SocialTokenStore,
  type User
} from '@core/oauth';

const API = 'https://bitbucket.org/api';
const user: User = { id: 'user-1', username: 'eric' };
const account: SocialAccount = { id: 'account-1', userId: 'user-1', provider: 'bitbucket', uid: 'eric-uid' };

function repoPayload(fullName: string, isPrivate = false) {
  return {
    full_name: fullName,
    name: fullName.split('/')[1],
    description: 'A repository',
    is_private: isPrivate,
    scm: 'hg',
    links: {
      html: { href: `https://bitbucket.org/${fullName}` },
      avatar: { href: `https://bitbucket.org/${fullName}/avatar` },
      clone: [
        { name: 'https', href: `https://bitbucket.org/${fullName}` },
        { name: 'ssh', href: `ssh://hg@bitbucket.org/${fullName}` }
      ]
    }
  };
}

describe('BitbucketImporter', () => {
  let session: StubOAuthSession;
  let sessions: jest.Mocked<SessionSource>;
  let accounts: jest.Mocked<Pick<SocialTokenStore, 'findAccount'>>;
  let repositories: jest.Mocked<RemoteRepositoryStore>;

  beforeEach(() => {
    session = new StubOAuthSession('bitbucket');
    sessions = { getSession: jest.fn().mockResolvedValue(session) };
    accounts = { findAccount: jest.fn().mockResolvedValue(account) };
    repositories = {
      createFromGitHubApi: jest.fn(),
      createFromBitbucketApi: jest.fn().mockResolvedValue(null)
    };
  });

  function createImporter() {
    return new BitbucketImporter({ sessions, accounts, repositories });
  }

  it('should return false without a session', async () => {
    sessions.getSession.mockResolvedValue(null);

    await expect(createImporter().importRepositories(user, true)).resolves.toBe(false);
    expect(sessions.getSession).toHaveBeenCalledWith(user, 'bitbucket');
    expect(accounts.findAccount).not.toHaveBeenCalled();
  });

  it('should return true without syncing when sync is false', async () => {
    await expect(createImporter().importRepositories(user, false)).resolves.toBe(true);
    expect(session.getRequests()).toEqual([]);
  });

  it('should fail when the user has no linked account', async () => {
    accounts.findAccount.mockResolvedValue(null);

    const result = createImporter().importRepositories(user, true);

    await expect(result).rejects.toThrow(NoLinkedAccountError);
    await expect(result).rejects.toThrow('User "eric" has no linked bitbucket account');
    expect(session.getRequests()).toEqual([]);
  });

  it('should import account and team repositories page by page', async () => {
    session
      .respondTo('GET', `${API}/2.0/repositories/eric-uid`, {
        body: { values: [repoPayload('eric/notes')], next: `${API}/2.0/repositories/eric-uid?page=2` }
      })
      .respondTo('GET', `${API}/2.0/repositories/eric-uid?page=2`, {
        body: { values: [repoPayload('eric/site', true)] }
      })
      .respondTo('GET', `${API}/1.0/user/privileges/`, { text: '{"teams": {"acme": "admin"}}' })
      .respondTo('GET', `${API}/2.0/teams/acme/repositories`, {
        body: { values: [repoPayload('acme/tools')] }
      });

    await expect(createImporter().importRepositories(user, true)).resolves.toBe(true);

    expect(accounts.findAccount).toHaveBeenCalledWith('user-1', 'bitbucket');
    expect(session.getRequests().map((r) => r.url)).toEqual([
      `${API}/2.0/repositories/eric-uid`,
      `${API}/2.0/repositories/eric-uid?page=2`,
      `${API}/1.0/user/privileges/`,
      `${API}/2.0/teams/acme/repositories`
    ]);

    const calls = repositories.createFromBitbucketApi.mock.calls;
    expect(calls.map(([payload]) => payload.full_name)).toEqual(['eric/notes', 'eric/site', 'acme/tools']);
    expect(calls[1][0].is_private).toBe(true);
    expect(calls[2][1]).toBe(user);
  });

  it('should ask to reconnect when a repository page is not JSON', async () => {
    session.respondTo('GET', `${API}/2.0/repositories/eric-uid`, { status: 500, text: 'Internal Server Error' });

    const error = await createImporter().importRepositories(user, true).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteSyncError);
    expect(error).toHaveProperty(
      'message',
      'Could not sync your Bitbucket repositories, try reconnecting your account'
    );
    expect(session.getRequests()).toHaveLength(1);
  });

  it('should ask to reconnect when a page has no values', async () => {
    session.respondTo('GET', `${API}/2.0/repositories/eric-uid`, { body: { error: { message: 'Forbidden' } } });

    await expect(createImporter().importRepositories(user, true)).rejects.toThrow(
      'Could not sync your Bitbucket repositories, try reconnecting your account'
    );
  });

  it('should ask to reconnect when a repository has no ssh clone link', async () => {
    const repo = repoPayload('eric/notes');
    repo.links.clone = [{ name: 'https', href: 'https://bitbucket.org/eric/notes' }];
    session.respondTo('GET', `${API}/2.0/repositories/eric-uid`, { body: { values: [repo] } });

    await expect(createImporter().importRepositories(user, true)).rejects.toThrow(RemoteSyncError);
    expect(repositories.createFromBitbucketApi).not.toHaveBeenCalled();
  });

  it('should ask to reconnect when the privileges are malformed', async () => {
    session
      .respondTo('GET', `${API}/2.0/repositories/eric-uid`, { body: { values: [repoPayload('eric/notes')] } })
      .respondTo('GET', `${API}/1.0/user/privileges/`, { status: 401, text: 'Unauthorized' });

    await expect(createImporter().importRepositories(user, true)).rejects.toThrow(
      'Could not sync your Bitbucket team repositories, try reconnecting your account'
    );
    expect(repositories.createFromBitbucketApi).toHaveBeenCalledTimes(1);
  });

  it('should ask to reconnect when a team repository page is malformed', async () => {
    session
      .respondTo('GET', `${API}/2.0/repositories/eric-uid`, { body: { values: [] } })
      .respondTo('GET', `${API}/1.0/user/privileges/`, { body: { teams: { acme: 'collaborator' } } })
      .respondTo('GET', `${API}/2.0/teams/acme/repositories`, { body: ['not', 'a', 'page'] });

    await expect(createImporter().importRepositories(user, true)).rejects.toThrow(
      'Could not sync your Bitbucket team repositories, try reconnecting your account'
    );
  });
});
