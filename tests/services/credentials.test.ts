import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

const mocks = vi.hoisted(() => {
  const credentials: { expiry_date?: number | null } = {};
  const getAccessToken = vi.fn<() => Promise<{ token?: string | null }>>();
  const getProjectId = vi.fn<() => Promise<string | null>>();
  const GoogleAuth = vi.fn(function MockGoogleAuth() {
    return {
      getClient: async () => ({ getAccessToken, credentials }),
      getProjectId,
    };
  });
  return { credentials, getAccessToken, getProjectId, GoogleAuth };
});

vi.mock('google-auth-library', () => ({ GoogleAuth: mocks.GoogleAuth }));

import { GoogleCredentialSource, CLOUD_PLATFORM_SCOPE } from '../../src/services/credentials.js';
import { CredentialError } from '../../src/lib/errors.js';

describe('GoogleCredentialSource', () => {
  beforeEach(() => {
    mocks.GoogleAuth.mockClear();
    mocks.getAccessToken.mockReset();
    mocks.getProjectId.mockReset();
    delete mocks.credentials.expiry_date;
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('fetchCredential', () => {
    it('should return the token with its absolute expiry', async () => {
      mocks.getAccessToken.mockResolvedValue({ token: 'test-token' });
      mocks.credentials.expiry_date = Date.UTC(2030, 0, 1);

      const credential = await new GoogleCredentialSource().fetchCredential([CLOUD_PLATFORM_SCOPE]);

      expect(credential.token).toBe('test-token');
      expect(credential.expiresAt.toISOString()).toBe('2030-01-01T00:00:00.000Z');
    });

    it('should assume a one hour lifetime when no expiry is reported', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'));
      mocks.getAccessToken.mockResolvedValue({ token: 'test-token' });

      const credential = await new GoogleCredentialSource().fetchCredential([CLOUD_PLATFORM_SCOPE]);

      expect(credential.expiresAt.toISOString()).toBe('2024-05-01T13:00:00.000Z');
    });

    it('should fail on an empty token', async () => {
      mocks.getAccessToken.mockResolvedValue({ token: null });

      await expect(
        new GoogleCredentialSource().fetchCredential([CLOUD_PLATFORM_SCOPE])
      ).rejects.toThrow(new CredentialError('Google Auth returned an empty access token'));
    });

    it('should wrap library errors', async () => {
      const cause = new Error('Could not load the default credentials');
      mocks.getAccessToken.mockRejectedValue(cause);

      const error = await new GoogleCredentialSource()
        .fetchCredential([CLOUD_PLATFORM_SCOPE])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CredentialError);
      expect(error).toMatchObject({
        message: 'Failed to fetch access token: Could not load the default credentials',
        code: 'CREDENTIAL_UNAVAILABLE',
        cause,
      });
    });

    it('should reuse one GoogleAuth per scope set', async () => {
      mocks.getAccessToken.mockResolvedValue({ token: 'test-token' });
      const source = new GoogleCredentialSource();

      await source.fetchCredential(['b', 'a']);
      await source.fetchCredential(['a', 'b']);
      await source.fetchCredential(['c']);

      expect(mocks.GoogleAuth).toHaveBeenCalledTimes(2);
      expect(mocks.GoogleAuth).toHaveBeenNthCalledWith(1, {
        scopes: ['b', 'a'],
        clientOptions: { eagerRefreshThresholdMillis: 15 * 60 * 1000 },
      });
    });
  });

  describe('getProjectId', () => {
    it('should return the default project', async () => {
      mocks.getProjectId.mockResolvedValue('my-project');
      await expect(new GoogleCredentialSource().getProjectId()).resolves.toBe('my-project');
    });

    it('should fail when no project is found', async () => {
      mocks.getProjectId.mockResolvedValue(null);
      await expect(new GoogleCredentialSource().getProjectId()).rejects.toThrow(
        'Project ID not found, please set up gcloud authentication'
      );
    });

    it('should wrap library errors', async () => {
      mocks.getProjectId.mockRejectedValue(new Error('Unable to detect a Project Id'));
      await expect(new GoogleCredentialSource().getProjectId()).rejects.toThrow(
        'Project ID not found, please set up gcloud authentication: Unable to detect a Project Id'
      );
    });
  });
});
