export enum AppEnv {
  Development = 'dev',
  Tests = 'test',
  Staging = 'stage',
  Production = 'prod',
}

function isAppEnv(candidate: string): candidate is AppEnv {
  return Object.values<string>(AppEnv).includes(candidate);
}

function asAppEnv(env: string): AppEnv {
  if (isAppEnv(env)) {
    return env;
  }
  const validEnvs = Object.values(AppEnv).join(', ');
  throw new Error(`${env} is not valid app env. Choose from ${validEnvs}`);
}

export function getAppEnv(): AppEnv {
  const env = process.env.ENV;
  if (env !== undefined) {
    return asAppEnv(env);
  }
  throw new Error('Environment variable ENV is not present');
}

let appName = '';

export function getAppName(): string {
  if (!appName) {
    appName = process.env.APP_NAME ?? 'proxy-pool-service';
  }

  return appName;
}
