import { logger } from "@config/logger";
import { EventType, eventBus } from "@core/events/event-bus";
import { TrackingResolutionError } from "@core/errors/app-errors";
import { CampaignRepository } from "@features/campaign/campaign.repository";
import { CounterDelta } from "@features/campaign/campaign-metrics";
import { SendRecord, SendRecordRepository } from "@features/dispatch/send-record.types";
import {
  CLICK_ENGAGEMENT_POINTS,
  EngagementDelta,
  OPEN_ENGAGEMENT_POINTS,
  SubscriberRepository,
} from "@features/subscriber/subscriber.repository";
import { matchConversionType } from "./conversion-patterns";
import { GeoResolver, UNKNOWN_GEO } from "./geo.service";
import {
  ClickEvent,
  ClientInfo,
  GeoInfo,
  LinkMapping,
  LinkMappingRepository,
  OpenEvent,
  RequestMeta,
  TrackingEventRepository,
} from "./tracking.types";
import { UserAgentParser } from "./user-agent.parser";

const TRACKING_TOKEN_PATTERN = /^[a-f0-9]{64}$/;
const LINK_ID_PATTERN = /^[a-f0-9]{32}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface AttributionDependencies {
  sends: Pick<SendRecordRepository, "findByTrackingId">;
  links: LinkMappingRepository;
  events: TrackingEventRepository;
  campaigns: Pick<CampaignRepository, "applyCounters">;
  subscribers: Pick<SubscriberRepository, "recordEngagement">;
  geo: GeoResolver;
  userAgents: UserAgentParser;
  now?: () => Date;
}

function secondsSince(start: Date | undefined, end: Date): number | null {
  if (!start) return null;
  return Math.max(0, Math.floor((end.getTime() - start.getTime()) / 1000));
}

/**
 * Turns pixel and redirect hits into open, click and conversion events and
 * keeps campaign and subscriber counters in step with them.
 */
export class AttributionIngestor {
  private readonly now: () => Date;

  constructor(private readonly deps: AttributionDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async handleOpen(trackingToken: string, meta: RequestMeta): Promise<OpenEvent> {
    const send = await this.resolveSend(trackingToken);
    const openedAt = this.now();
    const context = await this.describeClient(meta);

    const open = await this.deps.events.insertOpen({
      trackingId: send.trackingId,
      campaignId: send.campaignId,
      subscriberId: send.subscriberId,
      ipAddress: meta.ip,
      userAgent: meta.userAgent,
      referer: meta.referer,
      ...context,
      openedAt,
      timeToOpen: secondsSince(send.sentAt, openedAt),
    });

    await this.updateCounters(send, { emailsOpened: 1, uniqueOpens: open.isUnique ? 1 : 0 });
    await this.updateEngagement(send, { opens: 1 }, OPEN_ENGAGEMENT_POINTS, openedAt);

    eventBus.emitEvent(EventType.OPEN_RECORDED, {
      campaignId: send.campaignId,
      subscriberId: send.subscriberId,
      trackingId: send.trackingId,
      isUnique: open.isUnique,
    });
    return open;
  }

  /** Records the click (and a conversion when the URL matches) and returns the destination. */
  async handleClick(linkId: string, meta: RequestMeta): Promise<string> {
    const link = await this.resolveLink(linkId);
    const send = await this.resolveSend(link.trackingId);
    const clickedAt = this.now();
    const context = await this.describeClient(meta);

    const click = await this.deps.events.insertClick({
      trackingId: send.trackingId,
      campaignId: send.campaignId,
      subscriberId: send.subscriberId,
      ipAddress: meta.ip,
      userAgent: meta.userAgent,
      referer: meta.referer,
      ...context,
      linkId: link.linkId,
      linkUrl: link.originalUrl,
      linkPosition: link.position,
      variant: link.variant,
      clickedAt,
      timeToClick: secondsSince(send.sentAt, clickedAt),
    });

    await this.updateCounters(send, { clicks: 1, uniqueClicks: click.isUnique ? 1 : 0 });
    await this.updateEngagement(send, { clicks: 1 }, CLICK_ENGAGEMENT_POINTS, clickedAt);

    eventBus.emitEvent(EventType.CLICK_RECORDED, {
      campaignId: send.campaignId,
      subscriberId: send.subscriberId,
      trackingId: send.trackingId,
      linkId: link.linkId,
      url: link.originalUrl,
      isUnique: click.isUnique,
    });

    await this.recordConversion(send, link, click);
    return link.originalUrl;
  }

  private async resolveSend(trackingToken: string): Promise<SendRecord> {
    if (!TRACKING_TOKEN_PATTERN.test(trackingToken)) {
      throw new TrackingResolutionError("Malformed tracking token");
    }
    const send = await this.deps.sends.findByTrackingId(trackingToken);
    if (!send) {
      throw new TrackingResolutionError(`Unknown tracking token ${trackingToken.slice(0, 8)}…`);
    }
    return send;
  }

  private async resolveLink(linkId: string): Promise<LinkMapping> {
    if (!LINK_ID_PATTERN.test(linkId)) {
      throw new TrackingResolutionError("Malformed link id");
    }
    const link = await this.deps.links.findByLinkId(linkId);
    if (!link) {
      throw new TrackingResolutionError(`Unknown link ${linkId}`);
    }
    if (link.expiresAt && link.expiresAt.getTime() <= this.now().getTime()) {
      throw new TrackingResolutionError(`Link ${linkId} expired`);
    }
    return link;
  }

  private async describeClient(meta: RequestMeta): Promise<ClientInfo & GeoInfo> {
    const client = this.deps.userAgents.parse(meta.userAgent);
    let geo: GeoInfo;
    try {
      geo = await this.deps.geo.lookup(meta.ip);
    } catch (error) {
      logger.warn(`Geo lookup failed for ${meta.ip}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      geo = { ...UNKNOWN_GEO };
    }
    return { ...client, ...geo };
  }

  private async recordConversion(send: SendRecord, link: LinkMapping, click: ClickEvent): Promise<void> {
    const conversionType = matchConversionType(link.originalUrl);
    if (!conversionType) return;

    try {
      const convertedAt = click.clickedAt;
      const conversion = await this.deps.events.insertConversion({
        trackingId: send.trackingId,
        campaignId: send.campaignId,
        subscriberId: send.subscriberId,
        clickId: click.id,
        conversionType,
        conversionUrl: link.originalUrl,
        currency: "USD",
        attributionModel: "last_click",
        convertedAt,
        daysToConvert: send.sentAt
          ? Math.floor((convertedAt.getTime() - send.sentAt.getTime()) / DAY_MS)
          : null,
      });

      if (!conversion) {
        logger.debug(`Conversion ${conversionType} already recorded for send ${send.trackingId}`);
        return;
      }

      await this.updateCounters(send, { conversions: 1 });
      await this.updateEngagement(send, { conversions: 1 }, 0, convertedAt);

      eventBus.emitEvent(EventType.CONVERSION_RECORDED, {
        campaignId: send.campaignId,
        subscriberId: send.subscriberId,
        trackingId: send.trackingId,
        conversionType,
        url: link.originalUrl,
      });
    } catch (error) {
      logger.error(`Error recording conversion for send ${send.trackingId}:`, error);
    }
  }

  private async updateCounters(send: SendRecord, delta: CounterDelta): Promise<void> {
    try {
      await this.deps.campaigns.applyCounters(send.campaignId, delta);
    } catch (error) {
      logger.error(`Error updating counters for campaign ${send.campaignId}:`, error);
    }
  }

  private async updateEngagement(
    send: SendRecord,
    delta: EngagementDelta,
    points: number,
    at: Date,
  ): Promise<void> {
    try {
      await this.deps.subscribers.recordEngagement(send.subscriberId, delta, points, at);
    } catch (error) {
      logger.error(`Error updating engagement for subscriber ${send.subscriberId}:`, error);
    }
  }
}
