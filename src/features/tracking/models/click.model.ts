import mongoose, { Schema } from "mongoose";
import { ClickEvent } from "../tracking.types";
import { addUniquePerIpIndex, trackingEventFields } from "./tracking-fields";

export type IClickEvent = Omit<ClickEvent, "id">;

const clickEventSchema = new Schema<IClickEvent>(
  {
    ...trackingEventFields,
    linkId: { type: String, required: true },
    linkUrl: { type: String, required: true },
    linkPosition: { type: Number, required: true },
    variant: { type: String },
    clickedAt: { type: Date, required: true },
    timeToClick: { type: Number, default: null },
  },
  {
    timestamps: true,
  }
);

addUniquePerIpIndex(clickEventSchema);
clickEventSchema.index({ campaignId: 1, clickedAt: -1 });
clickEventSchema.index({ linkId: 1 });

export const ClickEventModel = mongoose.model<IClickEvent>("ClickEvent", clickEventSchema);
