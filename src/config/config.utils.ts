import { Logger } from '@nestjs/common';
import type { OtpvConfiguration } from './config.types';

/* c8 ignore start */
/**
 * Log Configuration Summary
 *
 * Logs a summary of the loaded configuration for debugging purposes.
 * No secret material lives in the configuration, so nothing is redacted.
 *
 * @param config - The complete configuration object
 */
export function logConfigurationSummary(config: OtpvConfiguration): void {
  const summaryLogger = new Logger('Configuration');

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`HTTP Server: ${config.server.host}:${config.server.port}`);
  summaryLogger.log(`Vault Path: ${config.vault.path}`);
  summaryLogger.log(`Vault Key Source: ${config.vault.keySource}`);
  summaryLogger.log(
    `Key Derivation: PBKDF2 ${config.crypto.pbkdf2Iterations} iterations (master key: ${config.crypto.masterKeyKdf})`,
  );
  summaryLogger.log(
    `Idle Lock: after ${config.session.idleTimeoutSecs}s (checked every ${config.session.idleCheckIntervalMs}ms)`,
  );
  summaryLogger.log(`Terminate On Auth Failure: ${config.session.terminateOnAuthFailure}`);
  summaryLogger.log(
    `Scheduler: code refresh ${config.scheduler.codeRefreshIntervalMs}ms, import scan ${config.scheduler.importScanIntervalMs}ms`,
  );
  summaryLogger.log(`Password Gate: length >= ${config.password.minLength}, score >= ${config.password.minScore}`);
  summaryLogger.log(`API Throttle: ${config.throttle.limit} requests per ${config.throttle.ttl}ms`);
}
/* c8 ignore stop */
