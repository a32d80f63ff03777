import { logger } from "@config/logger";
import { NotFoundError, ValidationError } from "@core/errors/app-errors";
import { SubscriberRepository } from "./subscriber.repository";
import { UnsubscribeClaims, verifyUnsubscribeToken } from "./unsubscribe-token";

export class SubscriberService {
  constructor(
    private readonly subscribers: Pick<SubscriberRepository, "unsubscribe">,
    private readonly unsubscribeSecret: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async unsubscribe(token: string): Promise<UnsubscribeClaims> {
    const claims = verifyUnsubscribeToken(token, this.unsubscribeSecret);
    if (!claims) {
      throw new ValidationError("Invalid unsubscribe link");
    }

    try {
      const found = await this.subscribers.unsubscribe(claims.subscriberId, claims.campaignId, this.now());
      if (!found) {
        throw new NotFoundError("Subscriber not found");
      }
    } catch (error) {
      logger.error("Error unsubscribing:", error);
      throw error;
    }

    logger.info(`Subscriber ${claims.subscriberId} unsubscribed via campaign ${claims.campaignId}`);
    return claims;
  }
}
