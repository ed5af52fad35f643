/**
 * Tests for ProjectTokenResolver
 */

import type { LoggerService } from '@nestjs/common';
import {
  ProjectTokenResolver,
  type OAuthProvider,
  type Project,
  type ProjectApiClient,
  type SocialToken,
  type SocialTokenStore
} from '@core/oauth';

const project: Project = {
  id: 'project-1',
  slug: 'pip',
  repo: 'https://github.com/pypa/pip',
  users: [
    { id: 'user-1', username: 'alice' },
    { id: 'user-2', username: 'bob' }
  ]
};

function makeToken(token: string): SocialToken {
  return {
    id: `id-${token}`,
    accountId: 'account-1',
    token,
    tokenSecret: '',
    app: { id: 'app-1', provider: 'github', clientId: 'test-client', secret: 'test-secret' }
  };
}

function tokenStore(byUsername: Record<string, SocialToken[]>): jest.Mocked<Pick<SocialTokenStore, 'findTokens'>> {
  return {
    findTokens: jest.fn(async (username: string, _provider: OAuthProvider) => byUsername[username] ?? [])
  };
}

describe('ProjectTokenResolver', () => {
  let api: jest.Mocked<ProjectApiClient>;
  let logger: jest.Mocked<LoggerService>;

  beforeEach(() => {
    api = { getProjectToken: jest.fn().mockResolvedValue('api-token') };
    logger = { log: jest.fn(), error: jest.fn(), warn: jest.fn() };
  });

  it('should return null when private repositories are disabled', async () => {
    const tokens = tokenStore({ alice: [makeToken('alice-token')] });
    const resolver = new ProjectTokenResolver({
      config: { allowPrivateRepos: false, dontHitDb: false },
      api,
      tokens,
      logger
    });

    await expect(resolver.getTokenForProject(project)).resolves.toBeNull();
    expect(api.getProjectToken).not.toHaveBeenCalled();
    expect(tokens.findTokens).not.toHaveBeenCalled();
  });

  it('should ask the project API when configured', async () => {
    const tokens = tokenStore({});
    const resolver = new ProjectTokenResolver({
      config: { allowPrivateRepos: true, dontHitDb: true },
      api,
      tokens,
      logger
    });

    await expect(resolver.getTokenForProject(project)).resolves.toBe('api-token');
    expect(api.getProjectToken).toHaveBeenCalledWith('project-1');
    expect(tokens.findTokens).not.toHaveBeenCalled();
  });

  it('should read local tokens when forced', async () => {
    const resolver = new ProjectTokenResolver({
      config: { allowPrivateRepos: true, dontHitDb: true },
      api,
      tokens: tokenStore({ alice: [makeToken('alice-token')] }),
      logger
    });

    await expect(resolver.getTokenForProject(project, { forceLocal: true })).resolves.toBe('alice-token');
    expect(api.getProjectToken).not.toHaveBeenCalled();
  });

  it('should return the token of the last user that has one', async () => {
    const tokens = tokenStore({
      alice: [makeToken('alice-token')],
      bob: [makeToken('bob-token'), makeToken('bob-other-token')]
    });
    const resolver = new ProjectTokenResolver({
      config: { allowPrivateRepos: true, dontHitDb: false },
      api,
      tokens,
      logger
    });

    await expect(resolver.getTokenForProject(project)).resolves.toBe('bob-token');
    expect(tokens.findTokens.mock.calls).toEqual([
      ['alice', 'github'],
      ['bob', 'github']
    ]);
  });

  it('should skip users without tokens', async () => {
    const resolver = new ProjectTokenResolver({
      config: { allowPrivateRepos: true, dontHitDb: false },
      api,
      tokens: tokenStore({ alice: [makeToken('alice-token')] }),
      logger
    });

    await expect(resolver.getTokenForProject(project)).resolves.toBe('alice-token');
  });

  it('should return null when no user has a token', async () => {
    const resolver = new ProjectTokenResolver({
      config: { allowPrivateRepos: true, dontHitDb: false },
      api,
      tokens: tokenStore({}),
      logger
    });

    await expect(resolver.getTokenForProject(project)).resolves.toBeNull();
  });

  it('should log and return null when the lookup fails', async () => {
    const failure = new Error('Project API error: 503 - unavailable');
    api.getProjectToken.mockRejectedValue(failure);
    const resolver = new ProjectTokenResolver({
      config: { allowPrivateRepos: true, dontHitDb: true },
      api,
      tokens: tokenStore({}),
      logger
    });

    await expect(resolver.getTokenForProject(project)).resolves.toBeNull();
    expect(logger.error).toHaveBeenCalledWith('Failed to get token for project pip', failure.stack);
  });
});
