import { NextFunction, Request, Response } from "express";
import { logger } from "@config/logger";
import { BounceWebhookInput } from "@core/utils/validators/validations/smtp.validation";
import { DispatchEngine } from "@features/dispatch/dispatch.service";
import { ScoringServerSelector } from "./server-selector";
import { SmtpServerRepository } from "./smtp.types";

export class SmtpController {
  constructor(
    private readonly servers: Pick<SmtpServerRepository, "loadPool">,
    private readonly selector: ScoringServerSelector,
    private readonly engine: Pick<DispatchEngine, "recordBounce">,
  ) {}

  async getServerPerformance(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const pool = await this.servers.loadPool();
      res.json({ data: this.selector.performance(pool) });
    } catch (error) {
      logger.error("Error loading SMTP server performance:", error);
      next(error);
    }
  }

  async handleBounce(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const report: BounceWebhookInput = req.body;
      const record = await this.engine.recordBounce(report);

      res.json({
        message: "Bounce recorded",
        data: {
          trackingId: record.trackingId,
          campaignId: record.campaignId,
          subscriberId: record.subscriberId,
          bounceType: report.bounceType,
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
