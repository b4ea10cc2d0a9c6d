import type { AppRuntime } from '../../src/app.js';
import type { Tenant } from '../../src/repositories/tenant-repository.js';

export async function seedActiveTenant(runtime: AppRuntime, slug = 'acme'): Promise<Tenant> {
  const { tenant } = await runtime.services.tenants.register({
    slug,
    name: `${slug} site`,
    tier: 'professional',
    status: 'active',
    repository: `sites/${slug}`,
    deploymentProjectId: `prj_${slug}`,
    cms: { mode: 'shared', spaceId: 'space-shared' },
    stagingUrl: `https://${slug}.example.test`,
    initiatedBy: 'provisioner'
  });

  return tenant;
}
