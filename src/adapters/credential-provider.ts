import type { Platform } from '../domain/platform.js';
import { PlatformOperationError } from '../errors/lifecycle-errors.js';

export type GitHubCredential =
  | { kind: 'token'; token: string }
  | { kind: 'app'; appId: number; privateKey: string; installationId: number };

export interface VercelCredential {
  token: string;
  teamId: string | null;
}

export interface BuilderCredential {
  privateKey: string;
}

export interface BackupCredential {
  region: string;
  endpoint: string | null;
  /** `null` falls back to the AWS SDK default provider chain. */
  accessKeyId: string | null;
  secretAccessKey: string | null;
}

/**
 * Scoped, per-call credential acquisition. Implementations must not hold credentials in
 * module state; adapters ask again on every call.
 */
export interface CredentialProvider {
  github(): Promise<GitHubCredential>;
  vercel(): Promise<VercelCredential>;
  builder(spaceId: string): Promise<BuilderCredential>;
  backup(): Promise<BackupCredential>;
}

type EnvSource = Record<string, string | undefined>;

function readValue(source: EnvSource, key: string): string | null {
  const value = source[key];
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function missing(platform: Platform, names: string): PlatformOperationError {
  return new PlatformOperationError(platform, 'CREDENTIALS_MISSING', `Credentials for ${platform} are not configured (${names}).`, false);
}

function parseId(value: string): number | null {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
}

function spaceKeySuffix(spaceId: string): string {
  return spaceId.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}

export class EnvCredentialProvider implements CredentialProvider {
  public constructor(private readonly source: EnvSource = process.env) {}

  public async github(): Promise<GitHubCredential> {
    const token = readValue(this.source, 'GITHUB_TOKEN');
    if (token !== null) {
      return { kind: 'token', token };
    }

    const appId = readValue(this.source, 'GITHUB_APP_ID');
    const privateKey = readValue(this.source, 'GITHUB_APP_PRIVATE_KEY');
    const installationId = readValue(this.source, 'GITHUB_APP_INSTALLATION_ID');
    if (appId === null || privateKey === null || installationId === null) {
      throw missing('source_control', 'GITHUB_TOKEN or GITHUB_APP_ID, GITHUB_APP_PRIVATE_KEY and GITHUB_APP_INSTALLATION_ID');
    }

    const parsedAppId = parseId(appId);
    const parsedInstallationId = parseId(installationId);
    if (parsedAppId === null || parsedInstallationId === null) {
      throw new PlatformOperationError('source_control', 'CREDENTIALS_INVALID', 'GitHub App identifiers must be positive integers.', false);
    }

    return {
      kind: 'app',
      appId: parsedAppId,
      privateKey: privateKey.replace(/\\n/g, '\n'),
      installationId: parsedInstallationId
    };
  }

  public async vercel(): Promise<VercelCredential> {
    const token = readValue(this.source, 'VERCEL_TOKEN');
    if (token === null) {
      throw missing('deployment', 'VERCEL_TOKEN');
    }

    return { token, teamId: readValue(this.source, 'VERCEL_TEAM_ID') };
  }

  public async builder(spaceId: string): Promise<BuilderCredential> {
    const privateKey = readValue(this.source, `BUILDER_PRIVATE_KEY_${spaceKeySuffix(spaceId)}`)
      ?? readValue(this.source, 'BUILDER_PRIVATE_KEY');
    if (privateKey === null) {
      throw missing('cms', `BUILDER_PRIVATE_KEY_${spaceKeySuffix(spaceId)} or BUILDER_PRIVATE_KEY`);
    }

    return { privateKey };
  }

  public async backup(): Promise<BackupCredential> {
    return {
      region: readValue(this.source, 'BACKUP_REGION') ?? 'us-east-1',
      endpoint: readValue(this.source, 'BACKUP_ENDPOINT'),
      accessKeyId: readValue(this.source, 'BACKUP_ACCESS_KEY_ID'),
      secretAccessKey: readValue(this.source, 'BACKUP_SECRET_ACCESS_KEY')
    };
  }
}
