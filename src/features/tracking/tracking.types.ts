export const UNKNOWN = "unknown";

export interface RequestMeta {
  ip: string;
  userAgent: string;
  referer?: string;
}

export type DeviceType = "mobile" | "tablet" | "desktop" | "unknown";

export interface ClientInfo {
  deviceType: DeviceType;
  deviceOs: string;
  deviceBrand: string;
  deviceModel: string;
  browserName: string;
  browserVersion: string;
  browserEngine: string;
  isMobile: boolean;
}

export interface GeoInfo {
  country: string;
  countryCode: string;
  region: string;
  city: string;
  timezone: string;
  isp: string;
  latitude?: number;
  longitude?: number;
}

interface TrackingEventBase extends ClientInfo, GeoInfo {
  trackingId: string;
  campaignId: string;
  subscriberId: string;
  ipAddress: string;
  userAgent: string;
  referer?: string;
  /** First event of its kind for this (send, IP) pair. */
  isUnique: boolean;
}

export interface OpenEvent extends TrackingEventBase {
  openedAt: Date;
  /** Seconds since the send left; null when the send has no sentAt. */
  timeToOpen: number | null;
}

export interface ClickEvent extends TrackingEventBase {
  id: string;
  linkId: string;
  linkUrl: string;
  linkPosition: number;
  variant?: string;
  clickedAt: Date;
  timeToClick: number | null;
}

export type NewOpenEvent = Omit<OpenEvent, "isUnique">;
export type NewClickEvent = Omit<ClickEvent, "id" | "isUnique">;

export interface LinkMapping {
  linkId: string;
  originalUrl: string;
  trackingId: string;
  /** 1-based order of the link in the html. */
  position: number;
  variant?: string;
  createdAt: Date;
  expiresAt?: Date;
}

export type ConversionType = "purchase" | "signup" | "download" | "contact";

export interface ConversionEvent {
  trackingId: string;
  campaignId: string;
  subscriberId: string;
  clickId: string;
  conversionType: ConversionType;
  conversionUrl: string;
  conversionValue?: number;
  currency: string;
  attributionModel: "last_click";
  convertedAt: Date;
  daysToConvert: number | null;
}

export interface EngagementCounts {
  emailsOpened: number;
  uniqueOpens: number;
  clicks: number;
  uniqueClicks: number;
  conversions: number;
}

export interface LinkPerformance {
  url: string;
  clicks: number;
  uniqueClicks: number;
}

export interface EngagementBreakdown {
  devices: Record<string, number>;
  browsers: Record<string, number>;
  countries: Record<string, number>;
  topLinks: LinkPerformance[];
}

export interface LinkMappingRepository {
  createMany(links: LinkMapping[]): Promise<void>;
  findByLinkId(linkId: string): Promise<LinkMapping | null>;
}

export interface TrackingEventRepository {
  /** Inserts the open, deciding `isUnique` atomically against earlier opens. */
  insertOpen(event: NewOpenEvent): Promise<OpenEvent>;
  insertClick(event: NewClickEvent): Promise<ClickEvent>;
  /** Null when a conversion of the same type already exists for the send. */
  insertConversion(event: ConversionEvent): Promise<ConversionEvent | null>;
  countForCampaign(campaignId: string): Promise<EngagementCounts>;
  breakdown(campaignId: string, topLinkLimit?: number): Promise<EngagementBreakdown>;
}
