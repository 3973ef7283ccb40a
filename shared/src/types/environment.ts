export type EnvironmentName = 'dev' | 'beta' | 'prod';

export interface FeatureFlags {
  honeypotEnabled: boolean;
  formTimerEnabled: boolean;
  dynamicFieldEnabled: boolean;
}

export interface FormGuardConfig {
  honeypotFieldName: string;
  hideClassName: string;
  formTimerUseSession: boolean;
  formTimerSessionFieldName: string;
  formTimerFieldName: string;
  minRequestTimeSeconds: number;
  dynamicFieldSessionFieldName: string;
  dynamicFieldValue: string;
}

export interface SessionConfig {
  cookieName: string;
  ttlSeconds: number;
}

export interface EnvironmentConfig {
  environment: EnvironmentName;
  features: FeatureFlags;
  formGuard: FormGuardConfig;
  session: SessionConfig;
}
