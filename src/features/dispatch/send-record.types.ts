import { BounceType } from "@core/errors/app-errors";

export enum SendStatus {
  PENDING = "pending",
  SENT = "sent",
  DELIVERED = "delivered",
  BOUNCED = "bounced",
  FAILED = "failed",
}

export interface SendRecord {
  trackingId: string;
  campaignId: string;
  subscriberId: string;
  toEmail: string;
  subject?: string;
  htmlContent?: string;
  textContent?: string;
  smtpServer?: string;
  messageId?: string;
  status: SendStatus;
  retryCount: number;
  errorMessage?: string;
  bounceType?: BounceType;
  bounceReason?: string;
  sentAt?: Date;
  bouncedAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewSendRecord {
  trackingId: string;
  campaignId: string;
  subscriberId: string;
  toEmail: string;
}

export interface ComposedContent {
  subject: string;
  htmlContent: string;
  textContent: string;
  messageId: string;
}

export type SendStatusCounts = Record<SendStatus, number>;

export function emptyStatusCounts(): SendStatusCounts {
  return {
    [SendStatus.PENDING]: 0,
    [SendStatus.SENT]: 0,
    [SendStatus.DELIVERED]: 0,
    [SendStatus.BOUNCED]: 0,
    [SendStatus.FAILED]: 0,
  };
}

export interface SendRecordRepository {
  create(record: NewSendRecord, at: Date): Promise<SendRecord>;
  saveComposition(trackingId: string, content: ComposedContent): Promise<void>;
  markSent(trackingId: string, result: { smtpServer: string; retryCount: number; sentAt: Date; messageId: string }): Promise<void>;
  markFailed(trackingId: string, result: { smtpServer?: string; retryCount: number; errorMessage: string }): Promise<void>;
  /**
   * Moves a sent/delivered record to bounced. Null when nothing matched or
   * the record had already bounced.
   */
  markBounced(
    reference: { trackingId?: string; messageId?: string },
    bounce: { bounceType: BounceType; reason: string; at: Date },
  ): Promise<SendRecord | null>;
  findByTrackingId(trackingId: string): Promise<SendRecord | null>;
  countByStatus(campaignId: string): Promise<SendStatusCounts>;
}
