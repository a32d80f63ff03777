import { logger } from "@config/logger";
import { EventType, eventBus } from "./event-bus";

let registered = false;

/** Mirrors delivery and attribution events into the application log. */
export function registerEventLogging(): void {
  if (registered) return;
  registered = true;

  eventBus.onEvent(EventType.SEND_COMPLETED, (event) => {
    logger.info(`Sent ${event.trackingId} via ${event.smtpServer}`, event);
  });
  eventBus.onEvent(EventType.SEND_FAILED, (event) => {
    logger.warn(`Send ${event.trackingId} failed: ${event.error}`, event);
  });
  eventBus.onEvent(EventType.OPEN_RECORDED, (event) => {
    logger.debug(`Open recorded for ${event.trackingId}`, event);
  });
  eventBus.onEvent(EventType.CLICK_RECORDED, (event) => {
    logger.debug(`Click recorded for ${event.trackingId}`, event);
  });
  eventBus.onEvent(EventType.CONVERSION_RECORDED, (event) => {
    logger.info(`Conversion (${event.conversionType}) for campaign ${event.campaignId}`, event);
  });
}
