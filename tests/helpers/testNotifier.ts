import { NotificationPublisher } from '../../src/services/notification';
import { CampaignProvisionedEvent } from '../../src/types/events';

/**
 * Records emitted confirmations; fails the next `failures` emits
 */
export class FlakyNotifier implements NotificationPublisher {
  readonly emitted: CampaignProvisionedEvent[] = [];
  attempts = 0;

  constructor(private failures = 0) {}

  failNext(count = 1): void {
    this.failures = count;
  }

  async emitConfirmation(event: CampaignProvisionedEvent): Promise<void> {
    this.attempts++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error('Notification queue unavailable');
    }
    this.emitted.push(event);
  }
}
