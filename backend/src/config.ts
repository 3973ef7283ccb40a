import { getEnvironmentConfig, type EnvironmentConfig } from '@formguard/shared';

const env = process.env.ENVIRONMENT || 'dev';

export const config: EnvironmentConfig = getEnvironmentConfig(env);

export const SESSIONS_TABLE = process.env.SESSIONS_TABLE || `formguard-sessions-${env}`;
