import type { EnvironmentConfig, EnvironmentName, FormGuardConfig } from '../types/environment.js';

const formGuardDefaults: FormGuardConfig = {
  honeypotFieldName: 'website',
  hideClassName: 'inv1s1ble',
  formTimerUseSession: true,
  formTimerSessionFieldName: 'FormTimer.LastStamp',
  formTimerFieldName: 'fts',
  minRequestTimeSeconds: 1.5,
  dynamicFieldSessionFieldName: 'DynamicFormField.LastFieldName',
  dynamicFieldValue: '1',
};

export const devConfig: EnvironmentConfig = {
  environment: 'dev',
  features: {
    honeypotEnabled: true,
    formTimerEnabled: true,
    dynamicFieldEnabled: false,
  },
  formGuard: { ...formGuardDefaults },
  session: { cookieName: 'fg_session', ttlSeconds: 3600 },
};

export const betaConfig: EnvironmentConfig = {
  environment: 'beta',
  features: {
    honeypotEnabled: true,
    formTimerEnabled: true,
    dynamicFieldEnabled: true,
  },
  formGuard: { ...formGuardDefaults },
  session: { cookieName: 'fg_session', ttlSeconds: 3600 },
};

export const prodConfig: EnvironmentConfig = {
  environment: 'prod',
  features: {
    honeypotEnabled: true,
    formTimerEnabled: true,
    dynamicFieldEnabled: true,
  },
  formGuard: { ...formGuardDefaults, minRequestTimeSeconds: 3 },
  session: { cookieName: 'fg_session', ttlSeconds: 1800 },
};

const configs: Record<EnvironmentName, EnvironmentConfig> = {
  dev: devConfig,
  beta: betaConfig,
  prod: prodConfig,
};

function isEnvironmentName(env: string): env is EnvironmentName {
  return Object.prototype.hasOwnProperty.call(configs, env);
}

export function getEnvironmentConfig(env: string): EnvironmentConfig {
  if (!isEnvironmentName(env)) {
    throw new Error(`Unknown environment: ${env}. Valid: dev, beta, prod`);
  }
  return configs[env];
}
