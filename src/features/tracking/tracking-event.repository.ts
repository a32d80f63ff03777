import { logger } from "@config/logger";
import { isDuplicateKeyError } from "@core/utils/mongo";
import { ClickEventModel } from "./models/click.model";
import { ConversionModel } from "./models/conversion.model";
import { OpenEventModel } from "./models/open-event.model";
import {
  ClickEvent,
  ConversionEvent,
  EngagementBreakdown,
  EngagementCounts,
  NewClickEvent,
  NewOpenEvent,
  OpenEvent,
  TrackingEventRepository,
} from "./tracking.types";

interface GroupCount {
  _id: string | null;
  count: number;
}

function toRecord(groups: GroupCount[]): Record<string, number> {
  return Object.fromEntries(groups.map((group) => [group._id ?? "unknown", group.count]));
}

export class MongoTrackingEventRepository implements TrackingEventRepository {
  async insertOpen(event: NewOpenEvent): Promise<OpenEvent> {
    try {
      await OpenEventModel.create({ ...event, isUnique: true });
      return { ...event, isUnique: true };
    } catch (error) {
      if (!isDuplicateKeyError(error)) {
        logger.error("Error inserting open event:", error);
        throw error;
      }
    }

    await OpenEventModel.create({ ...event, isUnique: false });
    return { ...event, isUnique: false };
  }

  async insertClick(event: NewClickEvent): Promise<ClickEvent> {
    try {
      const doc = await ClickEventModel.create({ ...event, isUnique: true });
      return { ...event, id: String(doc._id), isUnique: true };
    } catch (error) {
      if (!isDuplicateKeyError(error)) {
        logger.error("Error inserting click event:", error);
        throw error;
      }
    }

    const doc = await ClickEventModel.create({ ...event, isUnique: false });
    return { ...event, id: String(doc._id), isUnique: false };
  }

  async insertConversion(event: ConversionEvent): Promise<ConversionEvent | null> {
    try {
      await ConversionModel.create(event);
      return event;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return null;
      }
      logger.error("Error inserting conversion:", error);
      throw error;
    }
  }

  async countForCampaign(campaignId: string): Promise<EngagementCounts> {
    const [emailsOpened, uniqueOpens, clicks, uniqueClicks, conversions] = await Promise.all([
      OpenEventModel.countDocuments({ campaignId }),
      OpenEventModel.countDocuments({ campaignId, isUnique: true }),
      ClickEventModel.countDocuments({ campaignId }),
      ClickEventModel.countDocuments({ campaignId, isUnique: true }),
      ConversionModel.countDocuments({ campaignId }),
    ]);
    return { emailsOpened, uniqueOpens, clicks, uniqueClicks, conversions };
  }

  async breakdown(campaignId: string, topLinkLimit = 10): Promise<EngagementBreakdown> {
    const groupOpensBy = (field: string) =>
      OpenEventModel.aggregate<GroupCount>([
        { $match: { campaignId } },
        { $group: { _id: `$${field}`, count: { $sum: 1 } } },
        { $sort: { count: -1 } },
      ]);

    const [devices, browsers, countries, topLinks] = await Promise.all([
      groupOpensBy("deviceType"),
      groupOpensBy("browserName"),
      groupOpensBy("country"),
      ClickEventModel.aggregate<{ _id: string; clicks: number; uniqueClicks: number }>([
        { $match: { campaignId } },
        {
          $group: {
            _id: "$linkUrl",
            clicks: { $sum: 1 },
            uniqueClicks: { $sum: { $cond: ["$isUnique", 1, 0] } },
          },
        },
        { $sort: { clicks: -1, _id: 1 } },
        { $limit: topLinkLimit },
      ]),
    ]);

    return {
      devices: toRecord(devices),
      browsers: toRecord(browsers),
      countries: toRecord(countries),
      topLinks: topLinks.map((link) => ({
        url: link._id,
        clicks: link.clicks,
        uniqueClicks: link.uniqueClicks,
      })),
    };
  }
}
