import { describe, it, expect } from "vitest";
import {
  applyDelta,
  buildMetricsUpdatePipeline,
  computeRates,
  emptyCounters,
  ratePercent,
} from "@features/campaign/campaign-metrics";
import { CampaignService } from "@features/campaign/campaign.service";
import { NotFoundError } from "@core/errors/app-errors";
import { SendStatus } from "@features/dispatch/send-record.types";
import {
  InMemoryCampaignRepository,
  InMemorySendRecordRepository,
  InMemoryTrackingEventRepository,
} from "./support/in-memory-store";

describe("campaign metrics", () => {
  it("rounds rates to two decimals and guards zero denominators", () => {
    expect(ratePercent(1, 3)).toBe(33.33);
    expect(ratePercent(2, 3)).toBe(66.67);
    expect(ratePercent(5, 0)).toBe(0);
  });

  it("derives every rate from the counters", () => {
    const counters = applyDelta(emptyCounters(), {
      emailsSent: 200,
      emailsOpened: 90,
      uniqueOpens: 60,
      clicks: 30,
      conversions: 4,
      bounces: 3,
    });

    expect(computeRates(counters)).toEqual({
      openRate: 45,
      uniqueOpenRate: 30,
      clickRate: 15,
      clickToOpenRate: 50,
      conversionRate: 2,
      bounceRate: 1.5,
    });
  });

  it("updates counters and rates in one pipeline", () => {
    const [counterStage, rateStage] = buildMetricsUpdatePipeline({ emailsOpened: 1 });

    expect(counterStage.$set["metrics.emailsOpened"]).toEqual({ $add: [{ $ifNull: ["$metrics.emailsOpened", 0] }, 1] });
    expect(counterStage.$set["metrics.emailsSent"]).toEqual({ $add: [{ $ifNull: ["$metrics.emailsSent", 0] }, 0] });
    expect(Object.keys(rateStage.$set)).toEqual([
      "metrics.openRate",
      "metrics.uniqueOpenRate",
      "metrics.clickRate",
      "metrics.clickToOpenRate",
      "metrics.conversionRate",
      "metrics.bounceRate",
    ]);
  });
});

describe("CampaignService", () => {
  const CAMPAIGN_ID = "campaign-1";
  const now = new Date(Date.UTC(2026, 3, 10, 12, 0));

  async function seeded() {
    const campaigns = new InMemoryCampaignRepository();
    campaigns.add({ campaignId: CAMPAIGN_ID, subject: "Hi", html: "<p>Hi</p>", text: "Hi" });
    const sends = new InMemorySendRecordRepository();
    const events = new InMemoryTrackingEventRepository();

    const statuses = [SendStatus.SENT, SendStatus.SENT, SendStatus.BOUNCED, SendStatus.FAILED];
    for (const [index, status] of statuses.entries()) {
      const trackingId = String(index).repeat(64);
      await sends.create(
        { trackingId, campaignId: CAMPAIGN_ID, subscriberId: `sub-${index}`, toEmail: `s${index}@example.com` },
        now,
      );
      const record = sends.records.get(trackingId);
      if (record) record.status = status;
    }

    const client = {
      campaignId: CAMPAIGN_ID,
      subscriberId: "sub-0",
      userAgent: "",
      deviceType: "desktop" as const,
      deviceOs: "Windows",
      deviceBrand: "unknown",
      deviceModel: "unknown",
      browserName: "Chrome",
      browserVersion: "124",
      browserEngine: "Blink",
      isMobile: false,
      country: "Germany",
      countryCode: "DE",
      region: "Berlin",
      city: "Berlin",
      timezone: "Europe/Berlin",
      isp: "Example ISP",
    };
    const trackingId = "0".repeat(64);
    await events.insertOpen({ ...client, trackingId, ipAddress: "203.0.113.1", openedAt: now, timeToOpen: 10 });
    await events.insertOpen({ ...client, trackingId, ipAddress: "203.0.113.1", openedAt: now, timeToOpen: 20 });
    await events.insertClick({
      ...client,
      trackingId,
      ipAddress: "203.0.113.1",
      linkId: "1".repeat(32),
      linkUrl: "https://shop.example.com/",
      linkPosition: 1,
      clickedAt: now,
      timeToClick: 30,
    });

    // drifted aggregate
    await campaigns.applyCounters(CAMPAIGN_ID, { emailsSent: 9, clicks: 4 });
    await campaigns.markDispatched(CAMPAIGN_ID, new Date(now.getTime() - 2 * 24 * 60 * 60 * 1000));

    const service = new CampaignService({ campaigns, sends, events, now: () => now });
    return { service, campaigns };
  }

  it("reconciles counters from send records and events", async () => {
    const { service, campaigns } = await seeded();

    const metrics = await service.reconcile(CAMPAIGN_ID);

    expect(campaigns.countersOf(CAMPAIGN_ID)).toEqual({
      emailsSent: 3,
      emailsFailed: 1,
      emailsOpened: 2,
      uniqueOpens: 1,
      clicks: 1,
      uniqueClicks: 1,
      conversions: 0,
      bounces: 1,
    });
    expect(metrics.openRate).toBe(66.67);
    expect(metrics.clickToOpenRate).toBe(100);
    expect(metrics.bounceRate).toBe(33.33);
  });

  it("reconciles campaigns dispatched within the last week", async () => {
    const { service, campaigns } = await seeded();
    campaigns.add({ campaignId: "old", subject: "Hi", html: "<p>Hi</p>", text: "Hi" });
    await campaigns.markDispatched("old", new Date(now.getTime() - 8 * 24 * 60 * 60 * 1000));

    expect(await service.reconcileRecentlyActive()).toBe(1);
  });

  it("returns metrics with the engagement breakdown", async () => {
    const { service } = await seeded();

    const analytics = await service.getAnalytics(CAMPAIGN_ID);

    expect(analytics.metrics).toMatchObject({ emailsSent: 9, clicks: 4, clickRate: 44.44 });
    expect(analytics.breakdown).toEqual({
      devices: { desktop: 2 },
      browsers: { Chrome: 2 },
      countries: { Germany: 2 },
      topLinks: [{ url: "https://shop.example.com/", clicks: 1, uniqueClicks: 1 }],
    });
  });

  it("rejects an unknown campaign", async () => {
    const { service } = await seeded();
    await expect(service.getAnalytics("missing")).rejects.toBeInstanceOf(NotFoundError);
  });
});
