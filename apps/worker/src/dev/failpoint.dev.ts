import type { Failpoint as FailpointMode } from '@pkg/shared';

/**
 * Development-only failpoint.
 * With `after_claim_once`, the first delivery of the process fails after the
 * broker has handed it over, so the claim rolls back and the job is
 * delivered again. Controlled by WORKER_FAILPOINT.
 */
export class Failpoint {
  private used = false;

  constructor(private readonly mode: FailpointMode | null) {}

  /**
   * Returns true only once per instance, and only when enabled.
   */
  shouldFailNow(): boolean {
    if (this.mode === 'after_claim_once' && !this.used) {
      this.used = true;
      return true;
    }
    return false;
  }

  isEnabled(): boolean {
    return this.mode !== null;
  }
}
