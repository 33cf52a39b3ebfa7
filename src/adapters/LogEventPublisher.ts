import type { EventPublisher, StatusPublisher } from "../lib/boundaries";
import { createLogger, type Logger } from "../lib/logger";
import { toFallEventPayload, type DeviceStatus, type FallEvent } from "../events/eventTypes";

/**
 * Publishes to the log only; used by the replay script and when no endpoint
 * is configured.
 */
export class LogEventPublisher implements EventPublisher, StatusPublisher {
  readonly published: FallEvent[] = [];

  constructor(private readonly logger: Logger = createLogger("Publish")) {}

  async publish(event: FallEvent): Promise<void> {
    this.published.push(event);
    this.logger.info(JSON.stringify(toFallEventPayload(event)));
  }

  async publishStatus(status: DeviceStatus): Promise<void> {
    this.logger.info(`status: ${status}`);
  }
}
