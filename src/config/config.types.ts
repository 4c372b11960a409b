import type { KeyDerivation, VaultKeySource } from './config.constants';

/**
 * Configuration type definition for type-safe access
 */
export interface OtpvConfiguration {
  environment: string;
  server: {
    host: string;
    port: number;
  };
  vault: {
    path: string;
    keySource: VaultKeySource;
  };
  crypto: {
    pbkdf2Iterations: number;
    masterKeyKdf: KeyDerivation;
  };
  session: {
    idleTimeoutSecs: number;
    idleCheckIntervalMs: number;
    terminateOnAuthFailure: boolean;
  };
  scheduler: {
    codeRefreshIntervalMs: number;
    importScanIntervalMs: number;
  };
  password: {
    minLength: number;
    minScore: number;
  };
  throttle: {
    ttl: number;
    limit: number;
  };
}
