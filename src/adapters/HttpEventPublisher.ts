import type { EventPublisher, StatusPublisher } from "../lib/boundaries";
import { PublishError } from "../lib/errors";
import { eventLog } from "../lib/logger";
import {
  toFallEventPayload,
  type DeviceStatus,
  type DeviceStatusPayload,
  type FallEvent,
} from "../events/eventTypes";

export interface HttpEventPublisherOptions {
  /** Endpoint that receives fall events; status goes to `<url>/status` */
  url: string;
  deviceId: string;
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
  /** Wall clock for status timestamps, epoch ms */
  now?: () => number;
}

/**
 * Posts event and presence payloads as JSON. A single attempt per call;
 * the coordinator owns retries.
 */
export class HttpEventPublisher implements EventPublisher, StatusPublisher {
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  constructor(private readonly options: HttpEventPublisherOptions) {
    this.url = options.url.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  async publish(event: FallEvent): Promise<void> {
    await this.post(this.url, toFallEventPayload(event));
  }

  async publishStatus(status: DeviceStatus): Promise<void> {
    const payload: DeviceStatusPayload = {
      status,
      device_id: this.options.deviceId,
      timestamp: Math.floor(this.now() / 1000),
    };
    await this.post(`${this.url}/status`, payload);
    eventLog.debug(`Status ${status} sent for ${this.options.deviceId}`);
  }

  private async post(url: string, body: object): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: { ...this.options.headers, "Content-Type": "application/json" },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new PublishError(`POST ${url} failed`, 1, { cause: error });
    }
    if (!response.ok) {
      throw new PublishError(`POST ${url} failed: ${response.status} ${response.statusText}`, 1);
    }
  }
}
