/**
 * What a policy check answers when it cannot reach a verdict
 * (robots.txt unreachable, probe timed out, ...).
 *
 * - `open`: treat the unverifiable condition as permitted
 * - `closed`: treat it as denied
 */
export type FailMode = 'open' | 'closed';

interface FailureLogger {
  warn(message: string, context?: object): void;
}

/**
 * Resolve an unverifiable check to a verdict according to `mode`, logging the cause.
 * @returns true when the check should pass
 */
export function resolveUnverifiable(mode: FailMode, reason: string, logger: FailureLogger): boolean {
  const allowed = mode === 'open';
  logger.warn(`${reason}; failing ${mode} (${allowed ? 'allowed' : 'denied'})`);
  return allowed;
}
