/**
 * FallEvent and its wire format.
 */

export type ClipStatus = "stored" | "degraded";

export interface FallEvent {
  readonly eventId: string;
  /** Epoch seconds of the triggering frame */
  readonly timestamp: number;
  readonly timestampIso: string;
  readonly confidence: number;
  readonly clipReference: string;
  readonly clipStatus: ClipStatus;
  readonly deviceId: string;
}

/** JSON body sent to the message bus / HTTP endpoint. */
export interface FallEventPayload {
  event: "fall_detected";
  event_id: string;
  timestamp: number;
  timestamp_iso: string;
  confidence: number;
  clip_reference: string;
  clip_status: ClipStatus;
  device_id: string;
}

export type DeviceStatus = "online" | "offline";

export interface DeviceStatusPayload {
  status: DeviceStatus;
  device_id: string;
  timestamp: number;
}

export const DEGRADED_CLIP_SCHEME = "local-only://";

export function createFallEvent(params: {
  eventId: string;
  wallTimeMs: number;
  confidence: number;
  clipReference: string;
  clipStatus: ClipStatus;
  deviceId: string;
}): FallEvent {
  return Object.freeze({
    eventId: params.eventId,
    timestamp: Math.floor(params.wallTimeMs / 1000),
    timestampIso: new Date(params.wallTimeMs).toISOString(),
    confidence: params.confidence,
    clipReference: params.clipReference,
    clipStatus: params.clipStatus,
    deviceId: params.deviceId,
  });
}

export function toFallEventPayload(event: FallEvent): FallEventPayload {
  return {
    event: "fall_detected",
    event_id: event.eventId,
    timestamp: event.timestamp,
    timestamp_iso: event.timestampIso,
    confidence: Math.round(event.confidence * 1000) / 1000,
    clip_reference: event.clipReference,
    clip_status: event.clipStatus,
    device_id: event.deviceId,
  };
}
