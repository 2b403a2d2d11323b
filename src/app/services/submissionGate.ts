import { logger } from '../../lib/logger';

// Coarse kill-switch for intake; readers may see a slightly stale value.
export class SubmissionGate {
  private enabled: boolean;

  constructor(initiallyEnabled: boolean) {
    this.enabled = initiallyEnabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean, changedBy: string): void {
    this.enabled = enabled;
    logger.info({ feature: 'submissions', action: 'toggle', enabled, changed_by: changedBy }, 'Submission intake toggled');
  }
}
