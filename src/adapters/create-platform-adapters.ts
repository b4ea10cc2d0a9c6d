import type { Env } from '../config/env.js';
import type { Clock } from '../domain/lifecycle.js';
import { BuilderAdapter } from './builder-adapter.js';
import { TlsCertificateInspector } from './certificate-inspector.js';
import type { CredentialProvider } from './credential-provider.js';
import { GitHubAdapter } from './github-adapter.js';
import type { PlatformAdapters, UrlProbe } from './platform-adapter.js';
import { FetchUrlProbe } from './public-url-probe.js';
import { S3BackupAdapter } from './s3-backup-adapter.js';
import { VercelAdapter } from './vercel-adapter.js';

export function createPlatformAdapters(env: Env, credentials: CredentialProvider, now: Clock): PlatformAdapters {
  return {
    source_control: new GitHubAdapter(credentials, {
      organization: env.GITHUB_ORG ?? null,
      apiUrl: env.GITHUB_API_URL,
      staleActivityDays: env.HEALTH_STALE_ACTIVITY_DAYS,
      now
    }),
    deployment: new VercelAdapter(credentials, new TlsCertificateInspector(env.HEALTH_PROBE_TIMEOUT_MS), {
      apiUrl: env.VERCEL_API_URL,
      certificateWarningDays: env.HEALTH_CERT_EXPIRY_WARNING_DAYS,
      now
    }),
    cms: new BuilderAdapter(credentials, {
      contentApiUrl: env.BUILDER_CONTENT_API_URL,
      writeApiUrl: env.BUILDER_WRITE_API_URL,
      models: env.BUILDER_MODELS,
      sharedSpaceId: env.BUILDER_SHARED_SPACE_ID ?? null,
      now
    }),
    backup: new S3BackupAdapter(credentials, {
      bucket: env.BACKUP_BUCKET ?? null,
      rootPrefix: env.BACKUP_ROOT_PREFIX,
      staleBackupDays: env.HEALTH_BACKUP_STALE_DAYS,
      now
    })
  };
}

export function createUrlProbe(env: Env): UrlProbe {
  return new FetchUrlProbe(env.HEALTH_SLOW_RESPONSE_MS);
}
