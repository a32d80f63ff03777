import mongoose, { Schema } from "mongoose";
import { OpenEvent } from "../tracking.types";
import { addUniquePerIpIndex, trackingEventFields } from "./tracking-fields";

const openEventSchema = new Schema<OpenEvent>(
  {
    ...trackingEventFields,
    openedAt: { type: Date, required: true },
    timeToOpen: { type: Number, default: null },
  },
  { timestamps: true }
);

addUniquePerIpIndex(openEventSchema);
openEventSchema.index({ trackingId: 1, openedAt: -1 });
openEventSchema.index({ campaignId: 1, openedAt: -1 });

export const OpenEventModel = mongoose.model<OpenEvent>("OpenEvent", openEventSchema);
