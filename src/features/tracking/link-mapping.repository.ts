import { z } from "zod";
import { logger } from "@config/logger";
import { CacheService } from "@core/services/cache.service";
import { LinkMappingModel } from "./models/link-mapping.model";
import { LinkMapping, LinkMappingRepository } from "./tracking.types";

const LINK_CACHE_PREFIX = "link";
const LINK_CACHE_TTL = 24 * 60 * 60;

const cachedLinkSchema = z.object({
  linkId: z.string(),
  originalUrl: z.string(),
  trackingId: z.string(),
  position: z.number().int(),
  variant: z.string().optional(),
  createdAt: z.coerce.date(),
  expiresAt: z.coerce.date().optional(),
});

export class MongoLinkMappingRepository implements LinkMappingRepository {
  async createMany(links: LinkMapping[]): Promise<void> {
    if (links.length === 0) return;
    await LinkMappingModel.insertMany(links, { ordered: true });
  }

  async findByLinkId(linkId: string): Promise<LinkMapping | null> {
    const cacheKey = CacheService.generateKey(LINK_CACHE_PREFIX, linkId);
    const cached = cachedLinkSchema.safeParse(await CacheService.get(cacheKey));
    if (cached.success) {
      return cached.data;
    }

    const doc = await LinkMappingModel.findOne({ linkId }).lean();
    if (!doc) {
      return null;
    }

    const link: LinkMapping = {
      linkId: doc.linkId,
      originalUrl: doc.originalUrl,
      trackingId: doc.trackingId,
      position: doc.position,
      variant: doc.variant ?? undefined,
      createdAt: doc.createdAt,
      expiresAt: doc.expiresAt ?? undefined,
    };

    await CacheService.set(cacheKey, link, LINK_CACHE_TTL);
    logger.debug(`Cached link mapping ${linkId}`);
    return link;
  }
}
