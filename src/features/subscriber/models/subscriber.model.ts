import mongoose, { Schema } from "mongoose";

export type SubscriberStatus = "active" | "unsubscribed" | "bounced" | "inactive";

export interface ISubscriberMetrics {
  sent: number;
  opens: number;
  clicks: number;
  conversions: number;
  bounces: number;
  lastOpen?: Date;
  lastClick?: Date;
}

export interface ISubscriber {
  email: string;
  firstName?: string;
  lastName?: string;
  company?: string;
  city?: string;
  country?: string;
  timezone?: string;
  industry?: string;
  status: SubscriberStatus;
  lastInteraction: Date;
  engagementScore: number;
  metadata: {
    bounceReason?: string;
    bounceType?: string;
    bounceDate?: Date;
    unsubscribedAt?: Date;
    unsubscribedCampaignId?: string;
  };
  metrics: ISubscriberMetrics;
  createdAt: Date;
  updatedAt: Date;
}

const metricsSchema = new Schema<ISubscriberMetrics>(
  {
    sent: { type: Number, default: 0 },
    opens: { type: Number, default: 0 },
    clicks: { type: Number, default: 0 },
    conversions: { type: Number, default: 0 },
    bounces: { type: Number, default: 0 },
    lastOpen: Date,
    lastClick: Date,
  },
  { _id: false }
);

const subscriberSchema = new Schema<ISubscriber>(
  {
    email: {
      type: String,
      required: true,
      lowercase: true,
      trim: true,
      unique: true,
    },
    firstName: String,
    lastName: String,
    company: String,
    city: String,
    country: String,
    timezone: String,
    industry: String,
    status: {
      type: String,
      enum: ["active", "unsubscribed", "bounced", "inactive"],
      default: "active",
    },
    lastInteraction: { type: Date, default: Date.now },
    engagementScore: { type: Number, default: 0, min: 0, max: 100 },
    metadata: {
      bounceReason: String,
      bounceType: String,
      bounceDate: Date,
      unsubscribedAt: Date,
      unsubscribedCampaignId: String,
    },
    metrics: {
      type: metricsSchema,
      default: () => ({ sent: 0, opens: 0, clicks: 0, conversions: 0, bounces: 0 }),
    },
  },
  {
    timestamps: true,
  }
);

subscriberSchema.index({ status: 1 });
subscriberSchema.index({ lastInteraction: 1 });
subscriberSchema.index({ engagementScore: 1 });

export const Subscriber = mongoose.model<ISubscriber>("Subscriber", subscriberSchema);
