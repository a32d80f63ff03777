import { Router } from "express";
import { CampaignController } from "./campaign.controller";

/**
 * @swagger
 * tags:
 *   name: Campaigns
 *   description: Delivery and engagement analytics
 */
export function createCampaignRoutes(controller: CampaignController): Router {
  const router = Router();

  /**
   * @swagger
   * /api/campaigns/{campaignId}/analytics:
   *   get:
   *     summary: Counters, rates and device, browser, country and link breakdowns
   *     tags: [Campaigns]
   *     parameters:
   *       - in: path
   *         name: campaignId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Campaign analytics
   *       404:
   *         description: Campaign not found
   */
  router.get("/:campaignId/analytics", (req, res, next) => controller.getAnalytics(req, res, next));

  /**
   * @swagger
   * /api/campaigns/{campaignId}/reconcile:
   *   post:
   *     summary: Recount counters and rates from send records and tracking events
   *     tags: [Campaigns]
   *     parameters:
   *       - in: path
   *         name: campaignId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: The recomputed metrics
   */
  router.post("/:campaignId/reconcile", (req, res, next) => controller.reconcile(req, res, next));

  return router;
}
