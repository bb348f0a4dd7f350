import { PermissionDecision } from './types';

/**
 * Composite site-policy check, usable without fetching and extracting the page.
 */
export interface IPermissionEvaluator {
  /**
   * Evaluate robots.txt, HTTP-level signals and terms-of-service discovery for a URL.
   * Never rejects: every failure is reported as a denied decision.
   */
  evaluate(url: string): Promise<PermissionDecision>;
}
