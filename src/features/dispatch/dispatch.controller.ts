import { NextFunction, Request, Response } from "express";
import { logger } from "@config/logger";
import {
  DispatchCampaignInput,
  PreviewTemplateInput,
} from "@core/utils/validators/validations/dispatch.validation";
import { DispatchEngine } from "./dispatch.service";
import { TemplatePreviewService } from "./template-preview.service";

export class DispatchController {
  constructor(
    private readonly engine: DispatchEngine,
    private readonly previews: TemplatePreviewService,
    private readonly shutdownSignal?: AbortSignal,
  ) {}

  async dispatchCampaign(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { campaignId } = req.params;
      const { recipients }: DispatchCampaignInput = req.body;

      const results = await this.engine.dispatch(campaignId, recipients, { signal: this.shutdownSignal });
      const sent = results.filter((result) => result.status === "sent").length;

      res.json({
        message: "Campaign dispatched",
        data: {
          campaignId,
          sent,
          failed: results.length - sent,
          results,
        },
      });
    } catch (error) {
      logger.error("Error dispatching campaign:", error);
      next(error);
    }
  }

  previewTemplate(req: Request, res: Response, next: NextFunction): void {
    try {
      const { recipient, seed, ...template }: PreviewTemplateInput = req.body;
      const preview = this.previews.preview(template, recipient, seed);
      res.json({ data: preview });
    } catch (error) {
      next(error);
    }
  }
}
