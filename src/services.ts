import { AppConfig, senderDomain } from "@config/config";
import { MongoCampaignRepository } from "@features/campaign/campaign.repository";
import { CampaignService } from "@features/campaign/campaign.service";
import { DispatchEngine } from "@features/dispatch/dispatch.service";
import { MongoSendRecordRepository } from "@features/dispatch/send-record.repository";
import { TemplatePreviewService } from "@features/dispatch/template-preview.service";
import { DeliveryAuthenticator } from "@features/email/authentication/delivery-authenticator";
import { DkimSigner } from "@features/email/authentication/dkim-signer";
import { ContentPersonalizer } from "@features/email/content/personalization.service";
import { SpintaxExpander } from "@features/email/content/spintax.service";
import { ScoringServerSelector } from "@features/email/smtp/server-selector";
import { MongoSmtpServerRepository } from "@features/email/smtp/smtp-server.repository";
import { SmtpTransport } from "@features/email/smtp/smtp.service";
import { MongoSubscriberRepository } from "@features/subscriber/subscriber.repository";
import { SubscriberService } from "@features/subscriber/subscriber.service";
import { AttributionIngestor } from "@features/tracking/attribution.service";
import { IpApiGeoResolver } from "@features/tracking/geo.service";
import { MongoLinkMappingRepository } from "@features/tracking/link-mapping.repository";
import { MongoTrackingEventRepository } from "@features/tracking/tracking-event.repository";
import { TrackingInjector } from "@features/tracking/tracking-injector.service";
import { RegexUserAgentParser } from "@features/tracking/user-agent.parser";
import { AppDependencies } from "./app";

export interface ApplicationServices extends AppDependencies {
  transport: SmtpTransport;
}

/** Wires the MongoDB-backed implementations from configuration. */
export function createServices(config: AppConfig, shutdownSignal?: AbortSignal): ApplicationServices {
  const campaignRepository = new MongoCampaignRepository();
  const sends = new MongoSendRecordRepository();
  const subscriberRepository = new MongoSubscriberRepository();
  const servers = new MongoSmtpServerRepository();
  const links = new MongoLinkMappingRepository();
  const events = new MongoTrackingEventRepository();

  const spintax = new SpintaxExpander();
  const personalizer = new ContentPersonalizer(spintax);
  const selector = new ScoringServerSelector();
  const transport = new SmtpTransport();

  const signer = config.DKIM_ENABLED
    ? new DkimSigner({
        domain: config.DKIM_DOMAIN,
        selector: config.DKIM_SELECTOR,
        privateKey: config.DKIM_PRIVATE_KEY,
        canonicalization: config.DKIM_CANONICALIZATION,
      })
    : undefined;

  const authenticator = new DeliveryAuthenticator({
    domain: senderDomain(config),
    publicBaseUrl: config.PUBLIC_BASE_URL,
    unsubscribeSecret: config.UNSUBSCRIBE_SECRET,
    returnPath: config.RETURN_PATH,
    organization: config.ORGANIZATION,
    signer,
  });

  const injector = new TrackingInjector(links, {
    publicBaseUrl: config.PUBLIC_BASE_URL,
    linkTtlDays: config.LINK_TTL_DAYS,
  });

  const engine = new DispatchEngine({
    campaigns: campaignRepository,
    sends,
    subscribers: subscriberRepository,
    servers,
    selector,
    transport,
    personalizer,
    spintax,
    injector,
    authenticator,
    settings: {
      maxAttempts: config.MAX_SEND_ATTEMPTS,
      batchSize: config.BATCH_SIZE,
      sendTimeoutMs: config.SEND_TIMEOUT_MS,
      fromEmail: config.FROM_EMAIL,
      fromName: config.FROM_NAME,
      returnPath: config.RETURN_PATH,
    },
  });

  const attribution = new AttributionIngestor({
    sends,
    links,
    events,
    campaigns: campaignRepository,
    subscribers: subscriberRepository,
    geo: new IpApiGeoResolver({ urlTemplate: config.GEO_LOOKUP_URL, timeoutMs: config.GEO_LOOKUP_TIMEOUT_MS }),
    userAgents: new RegexUserAgentParser(),
  });

  return {
    engine,
    previews: new TemplatePreviewService(spintax, personalizer),
    attribution,
    campaigns: new CampaignService({ campaigns: campaignRepository, sends, events }),
    subscribers: new SubscriberService(subscriberRepository, config.UNSUBSCRIBE_SECRET),
    servers,
    selector,
    transport,
    trackingFallbackUrl: config.TRACKING_FALLBACK_URL,
    publicBaseUrl: config.PUBLIC_BASE_URL,
    shutdownSignal,
    webhookRateLimit: config.BOUNCE_WEBHOOK_RATE_LIMIT,
    docs: true,
  };
}
