import mongoose, { Schema } from "mongoose";
import { ConversionEvent } from "../tracking.types";

const conversionSchema = new Schema<ConversionEvent>(
  {
    trackingId: { type: String, required: true },
    campaignId: { type: String, required: true, index: true },
    subscriberId: { type: String, required: true, index: true },
    clickId: { type: String, required: true },
    conversionType: {
      type: String,
      enum: ["purchase", "signup", "download", "contact"],
      required: true,
    },
    conversionUrl: { type: String, required: true },
    conversionValue: { type: Number },
    currency: { type: String, default: "USD" },
    attributionModel: { type: String, enum: ["last_click"], default: "last_click" },
    convertedAt: { type: Date, required: true },
    daysToConvert: { type: Number, default: null },
  },
  { timestamps: true }
);

// One conversion per send and type; repeated clicks on checkout links count once.
conversionSchema.index({ trackingId: 1, conversionType: 1 }, { unique: true });

export const ConversionModel = mongoose.model<ConversionEvent>("Conversion", conversionSchema);
