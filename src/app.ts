import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import { setupSwagger } from "@config/swagger";
import { errorHandler, notFoundHandler } from "@core/middlewares/error.middleware";
import { CampaignController } from "@features/campaign/campaign.controller";
import { createCampaignRoutes } from "@features/campaign/campaign.routes";
import { CampaignService } from "@features/campaign/campaign.service";
import { DispatchController } from "@features/dispatch/dispatch.controller";
import { createDispatchRoutes } from "@features/dispatch/dispatch.routes";
import { DispatchEngine } from "@features/dispatch/dispatch.service";
import { TemplatePreviewService } from "@features/dispatch/template-preview.service";
import { ScoringServerSelector } from "@features/email/smtp/server-selector";
import { SmtpController } from "@features/email/smtp/smtp.controller";
import { createSmtpRoutes } from "@features/email/smtp/smtp.routes";
import { SmtpServerRepository } from "@features/email/smtp/smtp.types";
import { SubscriberController } from "@features/subscriber/subscriber.controller";
import { createSubscriberRoutes } from "@features/subscriber/subscriber.routes";
import { SubscriberService } from "@features/subscriber/subscriber.service";
import { AttributionIngestor } from "@features/tracking/attribution.service";
import { TrackingController } from "@features/tracking/tracking.controller";
import { createTrackingRoutes } from "@features/tracking/tracking.routes";

export interface AppDependencies {
  engine: DispatchEngine;
  previews: TemplatePreviewService;
  attribution: AttributionIngestor;
  campaigns: CampaignService;
  subscribers: SubscriberService;
  servers: Pick<SmtpServerRepository, "loadPool">;
  selector: ScoringServerSelector;
  trackingFallbackUrl: string;
  publicBaseUrl: string;
  /** Aborts in-flight dispatches when the process shuts down. */
  shutdownSignal?: AbortSignal;
  /** Bounce webhook requests per minute per client. */
  webhookRateLimit?: number;
  /** Serve swagger UI at /api-docs. */
  docs?: boolean;
}

export function buildApp(deps: AppDependencies): Express {
  const app = express();

  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'", "'unsafe-inline'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          imgSrc: ["'self'", "data:", "https:"],
          connectSrc: ["'self'"],
          objectSrc: ["'none'"],
          frameSrc: ["'none'"],
        },
      },
      // The open pixel is embedded by mail clients on other origins.
      crossOriginResourcePolicy: { policy: "cross-origin" },
    }),
  );

  app.use(
    cors({
      origin: "*",
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
      optionsSuccessStatus: 200,
      maxAge: 86400,
    }),
  );
  app.use(express.json({ limit: "5mb" }));
  app.use(express.urlencoded({ extended: false }));

  if (deps.docs) {
    setupSwagger(app, deps.publicBaseUrl);
  }

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(
    "/api/dispatch",
    createDispatchRoutes(new DispatchController(deps.engine, deps.previews, deps.shutdownSignal)),
  );
  app.use(
    "/api/smtp",
    createSmtpRoutes(new SmtpController(deps.servers, deps.selector, deps.engine), {
      webhookRateLimit: deps.webhookRateLimit,
    }),
  );
  app.use("/api/campaigns", createCampaignRoutes(new CampaignController(deps.campaigns)));
  app.use("/api/subscribers", createSubscriberRoutes(new SubscriberController(deps.subscribers)));
  app.use("/track", createTrackingRoutes(new TrackingController(deps.attribution, deps.trackingFallbackUrl)));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
