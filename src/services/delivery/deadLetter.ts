import type { QueuePublisher } from "../queue.js";

export interface DeadLetterRecord {
  url: string;
  payload: Record<string, unknown>;
  userID: string;
  /** Credential Vault ciphertext (hex) of the tenant's signing key; "" when unsigned. */
  encryptedHmacKey: string;
  /** Only for file deliveries. */
  filePath?: string;
  attemptTime: string;
  errorMessage: string;
}

/**
 * Best-effort hand-off of failed deliveries to the error queue.
 * Never throws: a failure to publish is logged and dropped.
 */
export class DeadLetterPublisher {
  constructor(
    private readonly queue: QueuePublisher,
    private readonly queueName: string
  ) {}

  async publish(record: DeadLetterRecord): Promise<void> {
    try {
      await this.queue.publish(this.queueName, JSON.stringify(record));
      if (this.queue.enabled) {
        console.log(`[queue] Dead-letter record for ${record.url} published to ${this.queueName}`);
      }
    } catch (err) {
      console.error(`[queue] Failed to publish dead-letter record to ${this.queueName}:`, err);
    }
  }
}
