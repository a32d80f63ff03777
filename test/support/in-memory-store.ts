import { BounceType } from "@core/errors/app-errors";
import {
  CampaignCounters,
  CampaignMetrics,
  CounterDelta,
  applyDelta,
  computeRates,
  emptyCounters,
} from "@features/campaign/campaign-metrics";
import { CampaignRepository, CampaignTemplate } from "@features/campaign/campaign.repository";
import {
  ComposedContent,
  NewSendRecord,
  SendRecord,
  SendRecordRepository,
  SendStatus,
  SendStatusCounts,
  emptyStatusCounts,
} from "@features/dispatch/send-record.types";
import { SmtpServerConfig, SmtpServerRepository } from "@features/email/smtp/smtp.types";
import {
  EngagementDelta,
  MAX_ENGAGEMENT_SCORE,
  SOFT_BOUNCE_LIMIT,
  SubscriberRepository,
} from "@features/subscriber/subscriber.repository";
import {
  ClickEvent,
  ConversionEvent,
  EngagementBreakdown,
  EngagementCounts,
  LinkMapping,
  LinkMappingRepository,
  NewClickEvent,
  NewOpenEvent,
  OpenEvent,
  TrackingEventRepository,
} from "@features/tracking/tracking.types";

export class InMemoryCampaignRepository implements CampaignRepository {
  readonly templates = new Map<string, CampaignTemplate>();
  readonly counters = new Map<string, CampaignCounters>();
  readonly dispatchedAt = new Map<string, Date>();

  add(template: CampaignTemplate): void {
    this.templates.set(template.campaignId, template);
    this.counters.set(template.campaignId, emptyCounters());
  }

  async findTemplate(campaignId: string): Promise<CampaignTemplate | null> {
    return this.templates.get(campaignId) ?? null;
  }

  async applyCounters(campaignId: string, delta: CounterDelta): Promise<void> {
    const current = this.counters.get(campaignId);
    if (current) {
      this.counters.set(campaignId, applyDelta(current, delta));
    }
  }

  async resetCounters(campaignId: string, counters: CampaignCounters): Promise<void> {
    if (this.counters.has(campaignId)) {
      this.counters.set(campaignId, { ...counters });
    }
  }

  async getMetrics(campaignId: string): Promise<CampaignMetrics | null> {
    const counters = this.counters.get(campaignId);
    return counters ? { ...counters, ...computeRates(counters) } : null;
  }

  async markDispatched(campaignId: string, at: Date): Promise<void> {
    this.dispatchedAt.set(campaignId, at);
  }

  async listActiveSince(since: Date): Promise<string[]> {
    return [...this.dispatchedAt.entries()]
      .filter(([, at]) => at.getTime() >= since.getTime())
      .map(([campaignId]) => campaignId);
  }

  countersOf(campaignId: string): CampaignCounters {
    return this.counters.get(campaignId) ?? emptyCounters();
  }
}

export class InMemorySendRecordRepository implements SendRecordRepository {
  readonly records = new Map<string, SendRecord>();
  /** Status of every record at the moment it was created. */
  readonly createdStatuses: SendStatus[] = [];

  async create(record: NewSendRecord, at: Date): Promise<SendRecord> {
    if (this.records.has(record.trackingId)) {
      throw new Error(`Duplicate tracking id ${record.trackingId}`);
    }
    const created: SendRecord = {
      ...record,
      status: SendStatus.PENDING,
      retryCount: 0,
      createdAt: at,
      updatedAt: at,
    };
    this.records.set(record.trackingId, created);
    this.createdStatuses.push(created.status);
    return { ...created };
  }

  async saveComposition(trackingId: string, content: ComposedContent): Promise<void> {
    const record = this.records.get(trackingId);
    if (!record) return;
    record.subject = content.subject;
    record.htmlContent = content.htmlContent;
    record.textContent = content.textContent;
    record.messageId = content.messageId;
  }

  async markSent(
    trackingId: string,
    result: { smtpServer: string; retryCount: number; sentAt: Date; messageId: string },
  ): Promise<void> {
    const record = this.records.get(trackingId);
    if (!record || record.status !== SendStatus.PENDING) return;
    record.status = SendStatus.SENT;
    record.smtpServer = result.smtpServer;
    record.retryCount = result.retryCount;
    record.sentAt = result.sentAt;
    record.messageId = result.messageId;
  }

  async markFailed(
    trackingId: string,
    result: { smtpServer?: string; retryCount: number; errorMessage: string },
  ): Promise<void> {
    const record = this.records.get(trackingId);
    if (!record || record.status !== SendStatus.PENDING) return;
    record.status = SendStatus.FAILED;
    record.smtpServer = result.smtpServer;
    record.retryCount = result.retryCount;
    record.errorMessage = result.errorMessage;
  }

  async markBounced(
    reference: { trackingId?: string; messageId?: string },
    bounce: { bounceType: BounceType; reason: string; at: Date },
  ): Promise<SendRecord | null> {
    const record = [...this.records.values()].find(
      (candidate) =>
        (reference.trackingId !== undefined && candidate.trackingId === reference.trackingId) ||
        (reference.messageId !== undefined && candidate.messageId === reference.messageId),
    );
    if (!record || (record.status !== SendStatus.SENT && record.status !== SendStatus.DELIVERED)) {
      return null;
    }
    record.status = SendStatus.BOUNCED;
    record.bounceType = bounce.bounceType;
    record.bounceReason = bounce.reason;
    record.bouncedAt = bounce.at;
    return { ...record };
  }

  async findByTrackingId(trackingId: string): Promise<SendRecord | null> {
    const record = this.records.get(trackingId);
    return record ? { ...record } : null;
  }

  async countByStatus(campaignId: string): Promise<SendStatusCounts> {
    const counts = emptyStatusCounts();
    for (const record of this.records.values()) {
      if (record.campaignId === campaignId) {
        counts[record.status] += 1;
      }
    }
    return counts;
  }

  all(): SendRecord[] {
    return [...this.records.values()];
  }
}

export interface StoredSubscriber {
  status: "active" | "unsubscribed" | "bounced";
  engagementScore: number;
  sent: number;
  opens: number;
  clicks: number;
  conversions: number;
  bounces: number;
  lastBounceReason?: string;
  unsubscribedCampaignId?: string;
}

export class InMemorySubscriberRepository implements SubscriberRepository {
  readonly subscribers = new Map<string, StoredSubscriber>();

  add(subscriberId: string, engagementScore = 0): StoredSubscriber {
    const subscriber: StoredSubscriber = {
      status: "active",
      engagementScore,
      sent: 0,
      opens: 0,
      clicks: 0,
      conversions: 0,
      bounces: 0,
    };
    this.subscribers.set(subscriberId, subscriber);
    return subscriber;
  }

  async recordEngagement(
    subscriberId: string,
    delta: EngagementDelta,
    scoreIncrement: number,
    _at: Date,
  ): Promise<void> {
    const subscriber = this.subscribers.get(subscriberId);
    if (!subscriber) return;
    subscriber.sent += delta.sent ?? 0;
    subscriber.opens += delta.opens ?? 0;
    subscriber.clicks += delta.clicks ?? 0;
    subscriber.conversions += delta.conversions ?? 0;
    subscriber.engagementScore = Math.min(MAX_ENGAGEMENT_SCORE, subscriber.engagementScore + scoreIncrement);
  }

  async recordBounce(subscriberId: string, bounceType: BounceType, reason: string, _at: Date): Promise<void> {
    const subscriber = this.subscribers.get(subscriberId);
    if (!subscriber) return;
    subscriber.bounces += 1;
    subscriber.lastBounceReason = reason;
    if (bounceType === "hard" || subscriber.bounces >= SOFT_BOUNCE_LIMIT) {
      subscriber.status = "bounced";
    }
  }

  async unsubscribe(subscriberId: string, campaignId: string, _at: Date): Promise<boolean> {
    const subscriber = this.subscribers.get(subscriberId);
    if (!subscriber) return false;
    subscriber.status = "unsubscribed";
    subscriber.unsubscribedCampaignId = campaignId;
    return true;
  }
}

export class InMemorySmtpServerRepository implements SmtpServerRepository {
  readonly outcomes: Array<{ serverName: string; success: boolean }> = [];

  constructor(public pool: SmtpServerConfig[] = []) {}

  async loadPool(): Promise<SmtpServerConfig[]> {
    return this.pool.filter((server) => server.enabled);
  }

  async recordOutcome(serverName: string, success: boolean, _at: Date): Promise<void> {
    this.outcomes.push({ serverName, success });
  }
}

export class InMemoryLinkMappingRepository implements LinkMappingRepository {
  readonly links = new Map<string, LinkMapping>();

  async createMany(links: LinkMapping[]): Promise<void> {
    for (const link of links) {
      this.links.set(link.linkId, { ...link });
    }
  }

  async findByLinkId(linkId: string): Promise<LinkMapping | null> {
    return this.links.get(linkId) ?? null;
  }

  forTrackingId(trackingId: string): LinkMapping[] {
    return [...this.links.values()]
      .filter((link) => link.trackingId === trackingId)
      .sort((a, b) => a.position - b.position);
  }
}

/** Uniqueness per (trackingId, ipAddress) and one conversion per (trackingId, type), as the indexes enforce. */
export class InMemoryTrackingEventRepository implements TrackingEventRepository {
  readonly opens: OpenEvent[] = [];
  readonly clicks: ClickEvent[] = [];
  readonly conversions: ConversionEvent[] = [];
  failConversions = false;
  private nextClickId = 1;

  async insertOpen(event: NewOpenEvent): Promise<OpenEvent> {
    const isUnique = !this.opens.some(
      (open) => open.trackingId === event.trackingId && open.ipAddress === event.ipAddress,
    );
    const open: OpenEvent = { ...event, isUnique };
    this.opens.push(open);
    return open;
  }

  async insertClick(event: NewClickEvent): Promise<ClickEvent> {
    const isUnique = !this.clicks.some(
      (click) => click.trackingId === event.trackingId && click.ipAddress === event.ipAddress,
    );
    const click: ClickEvent = { ...event, id: `click-${this.nextClickId++}`, isUnique };
    this.clicks.push(click);
    return click;
  }

  async insertConversion(event: ConversionEvent): Promise<ConversionEvent | null> {
    if (this.failConversions) {
      throw new Error("conversion store unavailable");
    }
    const exists = this.conversions.some(
      (conversion) =>
        conversion.trackingId === event.trackingId && conversion.conversionType === event.conversionType,
    );
    if (exists) return null;
    this.conversions.push(event);
    return event;
  }

  async countForCampaign(campaignId: string): Promise<EngagementCounts> {
    const opens = this.opens.filter((open) => open.campaignId === campaignId);
    const clicks = this.clicks.filter((click) => click.campaignId === campaignId);
    return {
      emailsOpened: opens.length,
      uniqueOpens: opens.filter((open) => open.isUnique).length,
      clicks: clicks.length,
      uniqueClicks: clicks.filter((click) => click.isUnique).length,
      conversions: this.conversions.filter((conversion) => conversion.campaignId === campaignId).length,
    };
  }

  async breakdown(campaignId: string, topLinkLimit = 10): Promise<EngagementBreakdown> {
    const opens = this.opens.filter((open) => open.campaignId === campaignId);
    const tally = (values: string[]): Record<string, number> => {
      const counts: Record<string, number> = {};
      for (const value of values) {
        counts[value] = (counts[value] ?? 0) + 1;
      }
      return counts;
    };

    const links = new Map<string, { url: string; clicks: number; uniqueClicks: number }>();
    for (const click of this.clicks.filter((candidate) => candidate.campaignId === campaignId)) {
      const entry = links.get(click.linkUrl) ?? { url: click.linkUrl, clicks: 0, uniqueClicks: 0 };
      entry.clicks += 1;
      entry.uniqueClicks += click.isUnique ? 1 : 0;
      links.set(click.linkUrl, entry);
    }

    return {
      devices: tally(opens.map((open) => open.deviceType)),
      browsers: tally(opens.map((open) => open.browserName)),
      countries: tally(opens.map((open) => open.country)),
      topLinks: [...links.values()]
        .sort((a, b) => b.clicks - a.clicks || a.url.localeCompare(b.url))
        .slice(0, topLinkLimit),
    };
  }
}
