import { logger } from "@config/logger";
import { NotFoundError } from "@core/errors/app-errors";
import { SendRecordRepository, SendStatus } from "@features/dispatch/send-record.types";
import { EngagementBreakdown, TrackingEventRepository } from "@features/tracking/tracking.types";
import { CampaignCounters, CampaignMetrics, computeRates } from "./campaign-metrics";
import { CampaignRepository } from "./campaign.repository";

export interface CampaignAnalytics {
  campaignId: string;
  metrics: CampaignMetrics;
  breakdown: EngagementBreakdown;
}

export interface CampaignServiceDependencies {
  campaigns: CampaignRepository;
  sends: Pick<SendRecordRepository, "countByStatus">;
  events: Pick<TrackingEventRepository, "countForCampaign" | "breakdown">;
  now?: () => Date;
}

const RECONCILE_WINDOW_DAYS = 7;

export class CampaignService {
  private readonly now: () => Date;

  constructor(private readonly deps: CampaignServiceDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async getAnalytics(campaignId: string): Promise<CampaignAnalytics> {
    const metrics = await this.deps.campaigns.getMetrics(campaignId);
    if (!metrics) {
      throw new NotFoundError(`Campaign ${campaignId} not found`);
    }

    const breakdown = await this.deps.events.breakdown(campaignId);
    return { campaignId, metrics, breakdown };
  }

  /**
   * Recounts every counter from the send records and event collections and
   * overwrites the stored aggregate. Repairs drift left by counter updates
   * that failed after their event was written.
   */
  async reconcile(campaignId: string): Promise<CampaignMetrics> {
    const [statuses, engagement] = await Promise.all([
      this.deps.sends.countByStatus(campaignId),
      this.deps.events.countForCampaign(campaignId),
    ]);

    const counters: CampaignCounters = {
      emailsSent:
        statuses[SendStatus.SENT] + statuses[SendStatus.DELIVERED] + statuses[SendStatus.BOUNCED],
      emailsFailed: statuses[SendStatus.FAILED],
      bounces: statuses[SendStatus.BOUNCED],
      ...engagement,
    };

    await this.deps.campaigns.resetCounters(campaignId, counters);
    logger.info(`Reconciled counters for campaign ${campaignId}`, counters);
    return { ...counters, ...computeRates(counters) };
  }

  /** Reconciles campaigns dispatched within the last week; returns how many succeeded. */
  async reconcileRecentlyActive(): Promise<number> {
    const since = new Date(this.now().getTime() - RECONCILE_WINDOW_DAYS * 24 * 60 * 60 * 1000);
    const campaignIds = await this.deps.campaigns.listActiveSince(since);

    let reconciled = 0;
    for (const campaignId of campaignIds) {
      try {
        await this.reconcile(campaignId);
        reconciled++;
      } catch (error) {
        logger.error(`Error reconciling campaign ${campaignId}:`, error);
      }
    }
    return reconciled;
  }
}
