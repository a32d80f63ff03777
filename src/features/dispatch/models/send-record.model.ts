import mongoose, { Schema } from "mongoose";
import { SendRecord, SendStatus } from "../send-record.types";

const sendRecordSchema = new Schema<SendRecord>(
  {
    trackingId: { type: String, required: true, unique: true },
    campaignId: { type: String, required: true },
    subscriberId: { type: String, required: true, index: true },
    toEmail: { type: String, required: true },
    subject: { type: String },
    htmlContent: { type: String },
    textContent: { type: String },
    smtpServer: { type: String },
    messageId: { type: String, index: true, sparse: true },
    status: {
      type: String,
      enum: Object.values(SendStatus),
      default: SendStatus.PENDING,
    },
    retryCount: { type: Number, default: 0 },
    errorMessage: { type: String },
    bounceType: { type: String, enum: ["hard", "soft"] },
    bounceReason: { type: String },
    sentAt: { type: Date },
    bouncedAt: { type: Date },
  },
  { timestamps: true }
);

sendRecordSchema.index({ campaignId: 1, status: 1 });
sendRecordSchema.index({ campaignId: 1, sentAt: -1 });

export const SendRecordModel = mongoose.model<SendRecord>("SendRecord", sendRecordSchema);
