import mongoose, { Schema } from "mongoose";
import { LinkMapping } from "../tracking.types";

const linkMappingSchema = new Schema<LinkMapping>({
  linkId: { type: String, required: true, unique: true },
  originalUrl: { type: String, required: true },
  trackingId: { type: String, required: true, index: true },
  position: { type: Number, required: true },
  variant: { type: String },
  createdAt: { type: Date, required: true },
  expiresAt: { type: Date },
});

linkMappingSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export const LinkMappingModel = mongoose.model<LinkMapping>("LinkMapping", linkMappingSchema);
