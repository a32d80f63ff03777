import { isValidObjectId } from "mongoose";
import { BounceType } from "@core/errors/app-errors";
import { Subscriber } from "./models/subscriber.model";

export const MAX_ENGAGEMENT_SCORE = 100;
export const OPEN_ENGAGEMENT_POINTS = 2;
export const CLICK_ENGAGEMENT_POINTS = 5;
/** Soft bounces tolerated before the address is treated as bounced. */
export const SOFT_BOUNCE_LIMIT = 3;

export interface EngagementDelta {
  sent?: number;
  opens?: number;
  clicks?: number;
  conversions?: number;
}

export interface SubscriberRepository {
  /** Bumps engagement counters and raises the score, capped at 100. */
  recordEngagement(subscriberId: string, delta: EngagementDelta, scoreIncrement: number, at: Date): Promise<void>;
  recordBounce(subscriberId: string, bounceType: BounceType, reason: string, at: Date): Promise<void>;
  /** False when the subscriber does not exist. */
  unsubscribe(subscriberId: string, campaignId: string, at: Date): Promise<boolean>;
}

const increment = (path: string, by: number) => ({ $add: [{ $ifNull: [`$${path}`, 0] }, by] });

export class MongoSubscriberRepository implements SubscriberRepository {
  async recordEngagement(
    subscriberId: string,
    delta: EngagementDelta,
    scoreIncrement: number,
    at: Date,
  ): Promise<void> {
    if (!isValidObjectId(subscriberId)) return;

    const stage: Record<string, unknown> = {
      "metrics.sent": increment("metrics.sent", delta.sent ?? 0),
      "metrics.opens": increment("metrics.opens", delta.opens ?? 0),
      "metrics.clicks": increment("metrics.clicks", delta.clicks ?? 0),
      "metrics.conversions": increment("metrics.conversions", delta.conversions ?? 0),
      engagementScore: { $min: [MAX_ENGAGEMENT_SCORE, increment("engagementScore", scoreIncrement)] },
    };
    if (delta.opens) stage["metrics.lastOpen"] = at;
    if (delta.clicks) stage["metrics.lastClick"] = at;
    if (delta.opens || delta.clicks || delta.conversions) stage.lastInteraction = at;

    await Subscriber.updateOne({ _id: subscriberId }, [{ $set: stage }]);
  }

  async recordBounce(subscriberId: string, bounceType: BounceType, reason: string, at: Date): Promise<void> {
    if (!isValidObjectId(subscriberId)) return;

    await Subscriber.updateOne({ _id: subscriberId }, [
      {
        $set: {
          "metrics.bounces": increment("metrics.bounces", 1),
          "metadata.bounceReason": { $literal: reason },
          "metadata.bounceType": bounceType,
          "metadata.bounceDate": at,
        },
      },
      {
        $set: {
          status: {
            $cond: [
              { $or: [bounceType === "hard", { $gte: ["$metrics.bounces", SOFT_BOUNCE_LIMIT] }] },
              "bounced",
              "$status",
            ],
          },
        },
      },
    ]);
  }

  async unsubscribe(subscriberId: string, campaignId: string, at: Date): Promise<boolean> {
    if (!isValidObjectId(subscriberId)) return false;

    const result = await Subscriber.updateOne(
      { _id: subscriberId },
      {
        $set: {
          status: "unsubscribed",
          "metadata.unsubscribedAt": at,
          "metadata.unsubscribedCampaignId": campaignId,
        },
      },
    );
    return result.matchedCount > 0;
  }
}
