import { describe, it, expect, beforeEach } from "vitest";
import { TrackingResolutionError } from "@core/errors/app-errors";
import { AttributionIngestor } from "@features/tracking/attribution.service";
import { GeoResolver } from "@features/tracking/geo.service";
import { RequestMeta } from "@features/tracking/tracking.types";
import { RegexUserAgentParser } from "@features/tracking/user-agent.parser";
import { BERLIN_GEO, FixedGeoResolver } from "./support/fakes";
import {
  InMemoryCampaignRepository,
  InMemoryLinkMappingRepository,
  InMemorySendRecordRepository,
  InMemorySubscriberRepository,
  InMemoryTrackingEventRepository,
} from "./support/in-memory-store";

const CAMPAIGN_ID = "campaign-1";
const SUBSCRIBER_ID = "sub-1";
const TRACKING_ID = "a".repeat(64);
const PENDING_TRACKING_ID = "b".repeat(64);
const CHECKOUT_LINK = "1".repeat(32);
const BLOG_LINK = "2".repeat(32);
const EXPIRED_LINK = "3".repeat(32);

const sentAt = new Date(Date.UTC(2026, 2, 1, 8, 0, 0));
const now = new Date(Date.UTC(2026, 2, 1, 8, 1, 30));

const IPHONE_UA =
  "Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Mobile/15E148 Safari/604.1";

const visitor = (ip: string): RequestMeta => ({ ip, userAgent: IPHONE_UA, referer: "https://mail.example.net/" });

describe("AttributionIngestor", () => {
  let campaigns: InMemoryCampaignRepository;
  let sends: InMemorySendRecordRepository;
  let links: InMemoryLinkMappingRepository;
  let events: InMemoryTrackingEventRepository;
  let subscribers: InMemorySubscriberRepository;

  const ingestor = (geo: GeoResolver = new FixedGeoResolver(BERLIN_GEO)) =>
    new AttributionIngestor({
      sends,
      links,
      events,
      campaigns,
      subscribers,
      geo,
      userAgents: new RegexUserAgentParser(),
      now: () => now,
    });

  beforeEach(async () => {
    campaigns = new InMemoryCampaignRepository();
    campaigns.add({ campaignId: CAMPAIGN_ID, subject: "Hi", html: "<p>Hi</p>", text: "Hi" });
    sends = new InMemorySendRecordRepository();
    links = new InMemoryLinkMappingRepository();
    events = new InMemoryTrackingEventRepository();
    subscribers = new InMemorySubscriberRepository();
    subscribers.add(SUBSCRIBER_ID);

    const base = { campaignId: CAMPAIGN_ID, subscriberId: SUBSCRIBER_ID, toEmail: "ana@example.com" };
    await sends.create({ ...base, trackingId: TRACKING_ID }, sentAt);
    await sends.markSent(TRACKING_ID, { smtpServer: "primary", retryCount: 0, sentAt, messageId: "<m1@example.com>" });
    await sends.create({ ...base, trackingId: PENDING_TRACKING_ID }, sentAt);

    await links.createMany([
      {
        linkId: CHECKOUT_LINK,
        originalUrl: "https://shop.example.com/checkout?cart=1",
        trackingId: TRACKING_ID,
        position: 1,
        createdAt: sentAt,
      },
      {
        linkId: BLOG_LINK,
        originalUrl: "https://shop.example.com/blog",
        trackingId: TRACKING_ID,
        position: 2,
        variant: "B",
        createdAt: sentAt,
      },
      {
        linkId: EXPIRED_LINK,
        originalUrl: "https://shop.example.com/blog",
        trackingId: TRACKING_ID,
        position: 3,
        createdAt: sentAt,
        expiresAt: now,
      },
    ]);
  });

  describe("handleOpen", () => {
    it("records the open with client and geo context", async () => {
      const open = await ingestor().handleOpen(TRACKING_ID, visitor("203.0.113.5"));

      expect(open).toMatchObject({
        trackingId: TRACKING_ID,
        campaignId: CAMPAIGN_ID,
        subscriberId: SUBSCRIBER_ID,
        ipAddress: "203.0.113.5",
        referer: "https://mail.example.net/",
        isUnique: true,
        deviceType: "mobile",
        deviceOs: "iOS",
        deviceBrand: "Apple",
        browserName: "Safari",
        city: "Berlin",
        countryCode: "DE",
        openedAt: now,
        timeToOpen: 90,
      });
    });

    it("counts uniqueness per IP and credits engagement on every open", async () => {
      const tracker = ingestor();
      await tracker.handleOpen(TRACKING_ID, visitor("203.0.113.5"));
      const repeat = await tracker.handleOpen(TRACKING_ID, visitor("203.0.113.5"));
      const other = await tracker.handleOpen(TRACKING_ID, visitor("198.51.100.9"));

      expect(repeat.isUnique).toBe(false);
      expect(other.isUnique).toBe(true);
      expect(campaigns.countersOf(CAMPAIGN_ID)).toMatchObject({ emailsOpened: 3, uniqueOpens: 2 });
      expect(subscribers.subscribers.get(SUBSCRIBER_ID)).toMatchObject({ opens: 3, engagementScore: 6 });
    });

    it("leaves timeToOpen empty for a send that never left", async () => {
      const open = await ingestor().handleOpen(PENDING_TRACKING_ID, visitor("203.0.113.5"));
      expect(open.timeToOpen).toBeNull();
    });

    it("falls back to unknown geo when the lookup fails", async () => {
      const open = await ingestor(new FixedGeoResolver(new Error("lookup timed out"))).handleOpen(
        TRACKING_ID,
        visitor("203.0.113.5"),
      );

      expect(open).toMatchObject({ country: "unknown", city: "unknown", timezone: "unknown" });
      expect(campaigns.countersOf(CAMPAIGN_ID).emailsOpened).toBe(1);
    });

    it("rejects malformed and unknown tokens without recording anything", async () => {
      const tracker = ingestor();

      await expect(tracker.handleOpen("not-a-token", visitor("203.0.113.5"))).rejects.toThrow(
        new TrackingResolutionError("Malformed tracking token"),
      );
      await expect(tracker.handleOpen("f".repeat(64), visitor("203.0.113.5"))).rejects.toThrow(
        "Unknown tracking token ffffffff…",
      );
      expect(events.opens).toHaveLength(0);
      expect(campaigns.countersOf(CAMPAIGN_ID).emailsOpened).toBe(0);
    });
  });

  describe("handleClick", () => {
    it("returns the destination and records the click", async () => {
      const url = await ingestor().handleClick(BLOG_LINK, visitor("203.0.113.5"));

      expect(url).toBe("https://shop.example.com/blog");
      expect(events.clicks[0]).toMatchObject({
        id: "click-1",
        linkId: BLOG_LINK,
        linkUrl: "https://shop.example.com/blog",
        linkPosition: 2,
        variant: "B",
        isUnique: true,
        timeToClick: 90,
      });
      expect(campaigns.countersOf(CAMPAIGN_ID)).toMatchObject({ clicks: 1, uniqueClicks: 1, conversions: 0 });
      expect(subscribers.subscribers.get(SUBSCRIBER_ID)).toMatchObject({ clicks: 1, engagementScore: 5 });
      expect(events.conversions).toHaveLength(0);
    });

    it("attributes one conversion per type to the first matching click", async () => {
      const tracker = ingestor();
      await tracker.handleClick(CHECKOUT_LINK, visitor("203.0.113.5"));
      await tracker.handleClick(CHECKOUT_LINK, visitor("203.0.113.5"));

      expect(events.conversions).toEqual([
        {
          trackingId: TRACKING_ID,
          campaignId: CAMPAIGN_ID,
          subscriberId: SUBSCRIBER_ID,
          clickId: "click-1",
          conversionType: "purchase",
          conversionUrl: "https://shop.example.com/checkout?cart=1",
          currency: "USD",
          attributionModel: "last_click",
          convertedAt: now,
          daysToConvert: 0,
        },
      ]);
      expect(campaigns.countersOf(CAMPAIGN_ID)).toMatchObject({ clicks: 2, uniqueClicks: 1, conversions: 1 });
      expect(subscribers.subscribers.get(SUBSCRIBER_ID)).toMatchObject({
        clicks: 2,
        conversions: 1,
        engagementScore: 10,
      });
    });

    it("still redirects when the conversion cannot be stored", async () => {
      events.failConversions = true;

      const url = await ingestor().handleClick(CHECKOUT_LINK, visitor("203.0.113.5"));

      expect(url).toBe("https://shop.example.com/checkout?cart=1");
      expect(campaigns.countersOf(CAMPAIGN_ID)).toMatchObject({ clicks: 1, conversions: 0 });
    });

    it("rejects malformed, unknown and expired links", async () => {
      const tracker = ingestor();

      await expect(tracker.handleClick("xyz", visitor("203.0.113.5"))).rejects.toThrow("Malformed link id");
      await expect(tracker.handleClick("9".repeat(32), visitor("203.0.113.5"))).rejects.toThrow(
        `Unknown link ${"9".repeat(32)}`,
      );
      await expect(tracker.handleClick(EXPIRED_LINK, visitor("203.0.113.5"))).rejects.toBeInstanceOf(
        TrackingResolutionError,
      );
      expect(events.clicks).toHaveLength(0);
    });
  });
});
