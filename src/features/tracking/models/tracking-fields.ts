import { Schema } from "mongoose";
import { DeviceType, UNKNOWN } from "../tracking.types";

const unknownString = { type: String, default: UNKNOWN };
const unknownDevice: DeviceType = UNKNOWN;

/** Columns shared by open and click events. */
export const trackingEventFields = {
  trackingId: { type: String, required: true },
  campaignId: { type: String, required: true, index: true },
  subscriberId: { type: String, required: true, index: true },
  ipAddress: { type: String, required: true },
  userAgent: { type: String, default: "" },
  referer: { type: String },
  isUnique: { type: Boolean, required: true },
  isMobile: { type: Boolean, default: false },
  deviceType: { type: String, enum: ["mobile", "tablet", "desktop", UNKNOWN], default: unknownDevice },
  deviceOs: unknownString,
  deviceBrand: unknownString,
  deviceModel: unknownString,
  browserName: unknownString,
  browserVersion: unknownString,
  browserEngine: unknownString,
  country: unknownString,
  countryCode: unknownString,
  region: unknownString,
  city: unknownString,
  timezone: unknownString,
  isp: unknownString,
  latitude: { type: Number },
  longitude: { type: Number },
};

/**
 * At most one `isUnique: true` event per (send, ip). A second concurrent
 * insert fails with a duplicate key and is retried as non-unique.
 */
export function addUniquePerIpIndex(schema: Schema): void {
  schema.index(
    { trackingId: 1, ipAddress: 1 },
    { unique: true, partialFilterExpression: { isUnique: true }, name: "unique_first_per_ip" },
  );
}
