import { NextFunction, Request, Response } from "express";
import { logger } from "@config/logger";
import { CampaignService } from "./campaign.service";

export class CampaignController {
  constructor(private readonly campaigns: CampaignService) {}

  async getAnalytics(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const analytics = await this.campaigns.getAnalytics(req.params.campaignId);
      res.json({ data: analytics });
    } catch (error) {
      next(error);
    }
  }

  async reconcile(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const metrics = await this.campaigns.reconcile(req.params.campaignId);
      res.json({ message: "Counters reconciled", data: metrics });
    } catch (error) {
      logger.error("Error reconciling campaign counters:", error);
      next(error);
    }
  }
}
