import { EventEmitter } from "events";

export enum EventType {
  SEND_COMPLETED = "send.completed",
  SEND_FAILED = "send.failed",
  OPEN_RECORDED = "open.recorded",
  CLICK_RECORDED = "click.recorded",
  CONVERSION_RECORDED = "conversion.recorded",
}

interface SendEventBase {
  campaignId: string;
  subscriberId: string;
  trackingId: string;
  retryCount: number;
}

export interface EventPayloads {
  [EventType.SEND_COMPLETED]: SendEventBase & { smtpServer: string; messageId: string };
  [EventType.SEND_FAILED]: SendEventBase & { error: string };
  [EventType.OPEN_RECORDED]: { campaignId: string; subscriberId: string; trackingId: string; isUnique: boolean };
  [EventType.CLICK_RECORDED]: {
    campaignId: string;
    subscriberId: string;
    trackingId: string;
    linkId: string;
    url: string;
    isUnique: boolean;
  };
  [EventType.CONVERSION_RECORDED]: {
    campaignId: string;
    subscriberId: string;
    trackingId: string;
    conversionType: string;
    url: string;
  };
}

/**
 * Process-wide bus for delivery and attribution events. Listeners must not
 * throw; emission is synchronous.
 */
class EventBus extends EventEmitter {
  private static instance: EventBus;

  private constructor() {
    super();
  }

  public static getInstance(): EventBus {
    if (!EventBus.instance) {
      EventBus.instance = new EventBus();
    }
    return EventBus.instance;
  }

  public emitEvent<K extends EventType>(type: K, payload: EventPayloads[K]): void {
    this.emit(type, payload);
  }

  public onEvent<K extends EventType>(type: K, listener: (payload: EventPayloads[K]) => void): void {
    this.on(type, listener);
  }

  public offEvent<K extends EventType>(type: K, listener: (payload: EventPayloads[K]) => void): void {
    this.off(type, listener);
  }
}

export type { EventBus };
export const eventBus = EventBus.getInstance();
