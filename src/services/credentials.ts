/**
 * Credential Source
 * 透過 Google Application Default Credentials 取得 access token 與專案 ID
 *
 * GoogleAuth 依序尋找憑證：
 * 1. GOOGLE_APPLICATION_CREDENTIALS 環境變數
 * 2. gcloud auth application-default login 產生的檔案
 * 3. 在 GCP 上執行時附加的 service account
 */

import { GoogleAuth } from 'google-auth-library';
import { CredentialError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import type { Credential } from '../types/auth.js';

export const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

// google-auth-library 沒有回報到期時間時的保守估計（Google access token 壽命為 1 小時）
const FALLBACK_TOKEN_LIFETIME_MS = 60 * 60 * 1000;

// 必須大於 TokenManager 的安全邊界，否則函式庫會一直回傳同一個快到期的 token
const EAGER_REFRESH_THRESHOLD_MS = 15 * 60 * 1000;

export interface CredentialSource {
  /**
   * 取得新的 token 與絕對到期時間；失敗時拋出 CredentialError
   */
  fetchCredential(scopes: string[]): Promise<Credential>;
}

export interface ProjectResolver {
  getProjectId(): Promise<string>;
}

export class GoogleCredentialSource implements CredentialSource, ProjectResolver {
  private clients = new Map<string, GoogleAuth>();

  private getAuth(scopes: string[]): GoogleAuth {
    const cacheKey = [...scopes].sort().join(' ');
    let auth = this.clients.get(cacheKey);
    if (!auth) {
      auth = new GoogleAuth({
        scopes,
        clientOptions: {
          eagerRefreshThresholdMillis: EAGER_REFRESH_THRESHOLD_MS,
        },
      });
      this.clients.set(cacheKey, auth);
    }
    return auth;
  }

  async fetchCredential(scopes: string[]): Promise<Credential> {
    try {
      const client = await this.getAuth(scopes).getClient();
      const { token } = await client.getAccessToken();

      if (!token) {
        throw new CredentialError('Google Auth returned an empty access token');
      }

      const expiryDate = client.credentials.expiry_date;
      const expiresAt = typeof expiryDate === 'number'
        ? new Date(expiryDate)
        : new Date(Date.now() + FALLBACK_TOKEN_LIFETIME_MS);

      loggers.credentials.debug('Fetched access token', {
        expiresAt: expiresAt.toISOString(),
      });

      return { token, expiresAt };
    } catch (error) {
      if (error instanceof CredentialError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new CredentialError(`Failed to fetch access token: ${message}`, error);
    }
  }

  /**
   * 取得預設專案 ID；未設定 gcloud 認證時拋出 CredentialError
   */
  async getProjectId(): Promise<string> {
    return loggers.credentials.trackAsync('Resolve project ID', async () => {
      try {
        const projectId = await this.getAuth([CLOUD_PLATFORM_SCOPE]).getProjectId();
        if (!projectId) {
          throw new CredentialError('Project ID not found, please set up gcloud authentication');
        }
        return projectId;
      } catch (error) {
        if (error instanceof CredentialError) {
          throw error;
        }
        const message = error instanceof Error ? error.message : String(error);
        throw new CredentialError(
          `Project ID not found, please set up gcloud authentication: ${message}`,
          error
        );
      }
    });
  }
}
