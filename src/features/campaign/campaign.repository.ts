import { isValidObjectId } from "mongoose";
import { logger } from "@config/logger";
import { EmailTemplate } from "@features/email/content/personalization.service";
import {
  CampaignCounters,
  CampaignMetrics,
  COUNTER_FIELDS,
  CounterDelta,
  buildMetricsResetPipeline,
  buildMetricsUpdatePipeline,
  computeRates,
  emptyCounters,
} from "./campaign-metrics";
import { Campaign } from "./models/campaign.model";

export interface CampaignTemplate extends EmailTemplate {
  campaignId: string;
  fromEmail?: string;
  fromName?: string;
  linkVariants?: Record<string, string[]>;
}

export interface CampaignRepository {
  findTemplate(campaignId: string): Promise<CampaignTemplate | null>;
  /** Atomically adds `delta` and recomputes every rate in the same write. */
  applyCounters(campaignId: string, delta: CounterDelta): Promise<void>;
  resetCounters(campaignId: string, counters: CampaignCounters): Promise<void>;
  getMetrics(campaignId: string): Promise<CampaignMetrics | null>;
  markDispatched(campaignId: string, at: Date): Promise<void>;
  listActiveSince(since: Date): Promise<string[]>;
}

export class MongoCampaignRepository implements CampaignRepository {
  async findTemplate(campaignId: string): Promise<CampaignTemplate | null> {
    if (!isValidObjectId(campaignId)) return null;

    const campaign = await Campaign.findById(campaignId)
      .select("subject htmlContent textContent fromEmail fromName weightedSpintax linkVariants")
      .lean();
    if (!campaign) return null;

    return {
      campaignId,
      subject: campaign.subject,
      html: campaign.htmlContent,
      text: campaign.textContent ?? "",
      fromEmail: campaign.fromEmail ?? undefined,
      fromName: campaign.fromName ?? undefined,
      weightedSpintax: campaign.weightedSpintax ?? false,
      linkVariants: Object.fromEntries((campaign.linkVariants ?? []).map((link) => [link.url, link.variants])),
    };
  }

  async applyCounters(campaignId: string, delta: CounterDelta): Promise<void> {
    const result = await Campaign.updateOne({ _id: campaignId }, buildMetricsUpdatePipeline(delta));
    if (result.matchedCount === 0) {
      logger.warn(`Counter update matched no campaign ${campaignId}`, { delta });
    }
  }

  async resetCounters(campaignId: string, counters: CampaignCounters): Promise<void> {
    await Campaign.updateOne({ _id: campaignId }, buildMetricsResetPipeline(counters));
  }

  async getMetrics(campaignId: string): Promise<CampaignMetrics | null> {
    if (!isValidObjectId(campaignId)) return null;

    const campaign = await Campaign.findById(campaignId).select("metrics").lean();
    if (!campaign) return null;

    const stored = campaign.metrics;
    const counters = emptyCounters();
    for (const field of COUNTER_FIELDS) {
      counters[field] = stored?.[field] ?? 0;
    }
    return { ...counters, ...computeRates(counters) };
  }

  async markDispatched(campaignId: string, at: Date): Promise<void> {
    await Campaign.updateOne({ _id: campaignId }, { $set: { lastDispatchAt: at } });
  }

  async listActiveSince(since: Date): Promise<string[]> {
    const campaigns = await Campaign.find({ lastDispatchAt: { $gte: since } }).select("_id").lean();
    return campaigns.map((campaign) => String(campaign._id));
  }
}
