import { registerAs } from '@nestjs/config';

export type DeploymentEnv = 'development' | 'staging' | 'production';

/**
 * Services-enabled deployments may write local state (cache files, log
 * files). Production is services-restricted: everything stays in memory.
 */
export type ServiceMode = 'services-enabled' | 'services-restricted';

export interface AppConfig {
  deploymentEnv: DeploymentEnv;
  serviceMode: ServiceMode;
  port: number;
  headlinesCacheDir: string;
  serviceName: string;
}

export function parseDeploymentEnv(raw: string | undefined): DeploymentEnv {
  const value = (raw || 'development').trim().toLowerCase();
  if (value === 'production' || value === 'prod') return 'production';
  if (value === 'staging') return 'staging';
  return 'development';
}

export function serviceModeFor(env: DeploymentEnv): ServiceMode {
  return env === 'production' ? 'services-restricted' : 'services-enabled';
}

export default registerAs('app', (): AppConfig => {
  const deploymentEnv = parseDeploymentEnv(
    process.env.DEPLOYMENT_ENV || process.env.NODE_ENV,
  );
  return {
    deploymentEnv,
    serviceMode: serviceModeFor(deploymentEnv),
    port: parseInt(process.env.PORT || '8000', 10),
    headlinesCacheDir: process.env.HEADLINES_CACHE_DIR || 'cache',
    serviceName: process.env.SERVICE_NAME || 'api-service',
  };
});
