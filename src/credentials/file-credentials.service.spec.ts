import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import fs from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileCredentialsService } from './file-credentials.service';
import { CredentialRecord } from './interfaces';
import { CredentialsUnavailableError } from '../common/errors';

describe('FileCredentialsService', () => {
  let service: FileCredentialsService;
  let dir: string;
  let credentialsPath: string;
  let postSpy: jest.SpyInstance;

  const hour = 60 * 60 * 1000;

  const record = (overrides: Partial<CredentialRecord> = {}): CredentialRecord => ({
    access_token: 'test-access',
    refresh_token: 'test-refresh',
    expiry_date: Date.now() + hour,
    token_type: 'Bearer',
    ...overrides,
  });

  const writeRecord = (value: unknown) =>
    fs.writeFile(credentialsPath, JSON.stringify(value));

  const readRecord = async (): Promise<CredentialRecord> =>
    JSON.parse(await fs.readFile(credentialsPath, 'utf8')) as CredentialRecord;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'credentials-'));
    credentialsPath = join(dir, 'nested', 'oauth_creds.json');

    const config: Record<string, unknown> = {
      'credentials.path': credentialsPath,
      'oauth.tokenUri': 'https://oauth.test/token',
      'oauth.clientId': 'test-client',
      'oauth.clientSecret': 'test-secret',
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        FileCredentialsService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => config[key]) },
        },
      ],
    }).compile();

    service = module.get<FileCredentialsService>(FileCredentialsService);
    postSpy = jest.spyOn(axios, 'post');
  });

  afterEach(async () => {
    postSpy.mockRestore();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should report missing credentials', async () => {
    await service.load();

    expect(service.getStatus()).toEqual({
      present: false,
      expiryDate: null,
      expired: true,
      tokenType: null,
      scope: null,
    });
    await expect(service.getCredentials()).rejects.toThrow(
      CredentialsUnavailableError,
    );
  });

  it('should load a credential file', async () => {
    const stored = record({ scope: 'cloud-platform' });
    await fs.mkdir(join(dir, 'nested'));
    await writeRecord(stored);

    await service.load();

    await expect(service.getCredentials()).resolves.toEqual({
      accessToken: 'test-access',
      refreshToken: 'test-refresh',
      expiryDate: stored.expiry_date,
      tokenType: 'Bearer',
      scope: 'cloud-platform',
    });
    expect(postSpy).not.toHaveBeenCalled();
  });

  it('should reject a file without tokens', async () => {
    await fs.mkdir(join(dir, 'nested'));
    await writeRecord({ access_token: 'only-access' });

    await expect(service.load()).rejects.toThrow(
      'credential file is missing access_token or refresh_token',
    );
  });

  it('should start without credentials when the file is malformed', async () => {
    await fs.mkdir(join(dir, 'nested'));
    await fs.writeFile(credentialsPath, '{not json');

    await expect(service.onModuleInit()).resolves.toBeUndefined();

    expect(service.getStatus().present).toBe(false);
    await expect(service.getCredentials()).rejects.toThrow(
      CredentialsUnavailableError,
    );
  });

  it('should accept a replacement after a malformed file', async () => {
    await fs.mkdir(join(dir, 'nested'));
    await writeRecord({ access_token: 'only-access' });
    await service.onModuleInit();

    await service.save(record());

    await expect(service.getCredentials()).resolves.toMatchObject({
      accessToken: 'test-access',
    });
  });

  it('should save records with owner-only permissions', async () => {
    const status = await service.save(record({ expiry_date: 0 }));

    expect(status).toEqual({
      present: true,
      expiryDate: 0,
      expired: true,
      tokenType: 'Bearer',
      scope: null,
    });
    const stat = await fs.stat(credentialsPath);
    expect(stat.mode & 0o777).toBe(0o600);
    await expect(readRecord()).resolves.toEqual({
      access_token: 'test-access',
      refresh_token: 'test-refresh',
      expiry_date: 0,
      token_type: 'Bearer',
    });
  });

  it('should refresh a token close to expiry and persist it', async () => {
    await service.save(record({ expiry_date: Date.now() + 60 * 1000 }));
    postSpy.mockResolvedValueOnce({
      data: { access_token: 'fresh-access', expires_in: 3600 },
    });

    const credentials = await service.getCredentials();

    expect(credentials.accessToken).toBe('fresh-access');
    expect(credentials.refreshToken).toBe('test-refresh');
    expect(credentials.expiryDate).toBeGreaterThan(Date.now() + 50 * 60 * 1000);
    expect(postSpy).toHaveBeenCalledWith(
      'https://oauth.test/token',
      {
        client_id: 'test-client',
        client_secret: 'test-secret',
        refresh_token: 'test-refresh',
        grant_type: 'refresh_token',
      },
      expect.objectContaining({
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      }),
    );
    await expect(readRecord()).resolves.toMatchObject({
      access_token: 'fresh-access',
      refresh_token: 'test-refresh',
    });
  });

  it('should keep a still-valid token when the early refresh fails', async () => {
    await service.save(record({ expiry_date: Date.now() + 60 * 1000 }));
    postSpy.mockRejectedValueOnce(new Error('network down'));

    await expect(service.getCredentials()).resolves.toMatchObject({
      accessToken: 'test-access',
    });
  });

  it('should fail when an expired token cannot be refreshed', async () => {
    await service.save(record({ expiry_date: Date.now() - 1000 }));
    postSpy.mockRejectedValueOnce(new Error('invalid_grant'));

    await expect(service.getCredentials()).rejects.toThrow(
      'Token refresh failed: invalid_grant',
    );
  });

  it('should share one refresh between concurrent callers', async () => {
    await service.save(record());
    postSpy.mockResolvedValue({
      data: { access_token: 'fresh-access', expires_in: 3600 },
    });

    await Promise.all([service.refreshToken(), service.refreshToken()]);

    expect(postSpy).toHaveBeenCalledTimes(1);
  });
});
