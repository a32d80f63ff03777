import mongoose, { Schema } from "mongoose";
import { CampaignMetrics, COUNTER_FIELDS, RATE_DEFINITIONS } from "../campaign-metrics";

export enum CampaignStatus {
  DRAFT = "draft",
  SCHEDULED = "scheduled",
  RUNNING = "running",
  COMPLETED = "completed",
  PAUSED = "paused",
}

export interface ILinkVariant {
  url: string;
  variants: string[];
}

export interface ICampaign {
  name: string;
  status: CampaignStatus;
  subject: string;
  htmlContent: string;
  textContent: string;
  fromEmail?: string;
  fromName?: string;
  weightedSpintax: boolean;
  linkVariants: ILinkVariant[];
  metrics: CampaignMetrics;
  lastDispatchAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const zero = { type: Number, default: 0 };

const metricsDefinition = Object.fromEntries(
  [...COUNTER_FIELDS, ...Object.keys(RATE_DEFINITIONS)].map((field) => [field, zero]),
);

const campaignSchema = new Schema<ICampaign>(
  {
    name: { type: String, required: true },
    status: {
      type: String,
      enum: Object.values(CampaignStatus),
      default: CampaignStatus.DRAFT,
    },
    subject: { type: String, required: true },
    htmlContent: { type: String, required: true },
    textContent: { type: String, default: "" },
    fromEmail: { type: String },
    fromName: { type: String },
    weightedSpintax: { type: Boolean, default: false },
    linkVariants: [
      {
        _id: false,
        url: { type: String, required: true },
        variants: { type: [String], default: [] },
      },
    ],
    metrics: metricsDefinition,
    lastDispatchAt: { type: Date },
  },
  { timestamps: true }
);

campaignSchema.index({ lastDispatchAt: -1 });

export const Campaign = mongoose.model<ICampaign>("Campaign", campaignSchema);
