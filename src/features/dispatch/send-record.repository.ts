import { logger } from "@config/logger";
import { BounceType } from "@core/errors/app-errors";
import { SendRecordModel } from "./models/send-record.model";
import {
  ComposedContent,
  NewSendRecord,
  SendRecord,
  SendRecordRepository,
  SendStatus,
  SendStatusCounts,
  emptyStatusCounts,
} from "./send-record.types";

type StoredSendRecord = Omit<SendRecord, "createdAt" | "updatedAt"> & { createdAt?: Date; updatedAt?: Date };

function toSendRecord(doc: StoredSendRecord): SendRecord {
  const now = new Date();
  return {
    trackingId: doc.trackingId,
    campaignId: doc.campaignId,
    subscriberId: doc.subscriberId,
    toEmail: doc.toEmail,
    subject: doc.subject,
    htmlContent: doc.htmlContent,
    textContent: doc.textContent,
    smtpServer: doc.smtpServer,
    messageId: doc.messageId,
    status: doc.status,
    retryCount: doc.retryCount,
    errorMessage: doc.errorMessage,
    bounceType: doc.bounceType,
    bounceReason: doc.bounceReason,
    sentAt: doc.sentAt,
    bouncedAt: doc.bouncedAt,
    createdAt: doc.createdAt ?? now,
    updatedAt: doc.updatedAt ?? now,
  };
}

export class MongoSendRecordRepository implements SendRecordRepository {
  async create(record: NewSendRecord, at: Date): Promise<SendRecord> {
    try {
      const doc = await SendRecordModel.create({
        ...record,
        status: SendStatus.PENDING,
        retryCount: 0,
        createdAt: at,
        updatedAt: at,
      });
      return toSendRecord(doc.toObject());
    } catch (error) {
      logger.error("Error creating send record:", error);
      throw error;
    }
  }

  async saveComposition(trackingId: string, content: ComposedContent): Promise<void> {
    await SendRecordModel.updateOne({ trackingId }, { $set: content });
  }

  async markSent(
    trackingId: string,
    result: { smtpServer: string; retryCount: number; sentAt: Date; messageId: string },
  ): Promise<void> {
    await SendRecordModel.updateOne(
      { trackingId, status: SendStatus.PENDING },
      { $set: { ...result, status: SendStatus.SENT }, $unset: { errorMessage: 1 } },
    );
  }

  async markFailed(
    trackingId: string,
    result: { smtpServer?: string; retryCount: number; errorMessage: string },
  ): Promise<void> {
    await SendRecordModel.updateOne(
      { trackingId, status: SendStatus.PENDING },
      { $set: { ...result, status: SendStatus.FAILED } },
    );
  }

  async markBounced(
    reference: { trackingId?: string; messageId?: string },
    bounce: { bounceType: BounceType; reason: string; at: Date },
  ): Promise<SendRecord | null> {
    if (!reference.trackingId && !reference.messageId) return null;
    const filter = reference.trackingId ? { trackingId: reference.trackingId } : { messageId: reference.messageId };

    const doc = await SendRecordModel.findOneAndUpdate(
      { ...filter, status: { $in: [SendStatus.SENT, SendStatus.DELIVERED] } },
      {
        $set: {
          status: SendStatus.BOUNCED,
          bounceType: bounce.bounceType,
          bounceReason: bounce.reason,
          bouncedAt: bounce.at,
        },
      },
      { new: true },
    ).lean();

    return doc ? toSendRecord(doc) : null;
  }

  async findByTrackingId(trackingId: string): Promise<SendRecord | null> {
    const doc = await SendRecordModel.findOne({ trackingId }).lean();
    return doc ? toSendRecord(doc) : null;
  }

  async countByStatus(campaignId: string): Promise<SendStatusCounts> {
    const groups = await SendRecordModel.aggregate<{ _id: SendStatus; count: number }>([
      { $match: { campaignId } },
      { $group: { _id: "$status", count: { $sum: 1 } } },
    ]);

    const counts = emptyStatusCounts();
    for (const group of groups) {
      counts[group._id] = group.count;
    }
    return counts;
  }
}
