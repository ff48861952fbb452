import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import fs from 'fs/promises';
import { dirname } from 'path';
import { CredentialsUnavailableError } from '../common/errors';
import { errorMessage, isRecord } from '../common/utils';
import {
  CredentialRecord,
  Credentials,
  CredentialsProvider,
  CredentialsStatus,
  OAuthTokenResponse,
  fromRecord,
  toRecord,
} from './interfaces';

const REFRESH_BUFFER_MS = 5 * 60 * 1000;

function parseRecord(raw: string): CredentialRecord {
  const parsed: unknown = JSON.parse(raw);
  if (
    !isRecord(parsed) ||
    typeof parsed.access_token !== 'string' ||
    typeof parsed.refresh_token !== 'string'
  ) {
    throw new Error('credential file is missing access_token or refresh_token');
  }

  return {
    access_token: parsed.access_token,
    refresh_token: parsed.refresh_token,
    expiry_date: typeof parsed.expiry_date === 'number' ? parsed.expiry_date : 0,
    token_type:
      typeof parsed.token_type === 'string' ? parsed.token_type : 'Bearer',
    ...(typeof parsed.scope === 'string' ? { scope: parsed.scope } : {}),
    ...(typeof parsed.id_token === 'string' ? { id_token: parsed.id_token } : {}),
  };
}

/**
 * Credentials kept in a JSON file in the OAuth client's record format.
 * Refreshes are coalesced: concurrent callers share one token request.
 */
@Injectable()
export class FileCredentialsService
  implements CredentialsProvider, OnModuleInit
{
  private readonly logger = new Logger(FileCredentialsService.name);
  private credentials: Credentials | null = null;
  private refreshPromise: Promise<void> | null = null;

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    try {
      await this.load();
    } catch (error) {
      // Start without credentials; PUT /admin/credentials replaces the file.
      this.logger.warn(
        `Ignoring unreadable credentials at ${this.path}: ${errorMessage(error)}`,
      );
    }
  }

  private get path(): string {
    return this.configService.get<string>('credentials.path') ?? '';
  }

  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, 'utf8');
    } catch (error) {
      this.logger.warn(
        `No credentials loaded from ${this.path}: ${errorMessage(error)}`,
      );
      return;
    }

    this.credentials = fromRecord(parseRecord(raw));
    this.logger.log(`Loaded credentials from ${this.path}`);
  }

  isTokenExpired(credentials: Credentials, bufferMs = 0): boolean {
    return Date.now() + bufferMs >= credentials.expiryDate;
  }

  async getCredentials(): Promise<Credentials> {
    const current = this.credentials;
    if (!current) {
      throw new CredentialsUnavailableError();
    }

    if (
      current.refreshToken &&
      this.isTokenExpired(current, REFRESH_BUFFER_MS)
    ) {
      try {
        await this.refreshToken();
      } catch (error) {
        if (this.isTokenExpired(current)) {
          throw error;
        }
        this.logger.warn(
          `Early token refresh failed, using current token: ${errorMessage(error)}`,
        );
      }
    }

    return { ...(this.credentials ?? current) };
  }

  async refreshToken(): Promise<void> {
    if (this.refreshPromise) {
      return this.refreshPromise;
    }

    this.refreshPromise = this.performRefresh();
    try {
      await this.refreshPromise;
    } finally {
      this.refreshPromise = null;
    }
  }

  private async performRefresh(): Promise<void> {
    const current = this.credentials;
    if (!current?.refreshToken) {
      throw new CredentialsUnavailableError('no refresh token available');
    }

    this.logger.debug('Refreshing access token...');

    try {
      const response = await axios.post<OAuthTokenResponse>(
        this.configService.get<string>('oauth.tokenUri') ?? '',
        {
          client_id: this.configService.get<string>('oauth.clientId') ?? '',
          client_secret:
            this.configService.get<string>('oauth.clientSecret') ?? '',
          refresh_token: current.refreshToken,
          grant_type: 'refresh_token',
        },
        {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          transformRequest: [
            (data: Record<string, string>) =>
              new URLSearchParams(data).toString(),
          ],
        },
      );

      const token = response.data;
      const refreshed: Credentials = {
        ...current,
        accessToken: token.access_token,
        expiryDate: Date.now() + token.expires_in * 1000,
        refreshToken: token.refresh_token || current.refreshToken,
        tokenType: token.token_type || current.tokenType,
      };
      if (token.scope) refreshed.scope = token.scope;
      if (token.id_token) refreshed.idToken = token.id_token;

      this.credentials = refreshed;
      this.logger.debug('Successfully refreshed access token');
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Failed to refresh token: ${message}`);
      throw new Error(`Token refresh failed: ${message}`);
    }

    await this.persist();
  }

  async save(record: CredentialRecord): Promise<CredentialsStatus> {
    this.credentials = fromRecord(record);
    await this.persist();
    this.logger.log(`Stored new credentials in ${this.path}`);
    return this.getStatus();
  }

  getStatus(): CredentialsStatus {
    const current = this.credentials;
    if (!current) {
      return {
        present: false,
        expiryDate: null,
        expired: true,
        tokenType: null,
        scope: null,
      };
    }

    return {
      present: true,
      expiryDate: current.expiryDate,
      expired: this.isTokenExpired(current),
      tokenType: current.tokenType,
      scope: current.scope ?? null,
    };
  }

  private async persist(): Promise<void> {
    if (!this.credentials) return;

    await fs.mkdir(dirname(this.path), { recursive: true });
    await fs.writeFile(
      this.path,
      JSON.stringify(toRecord(this.credentials), null, 2),
      { mode: 0o600 },
    );
  }
}
