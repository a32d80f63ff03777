import { Router } from "express";
import { validateRequest } from "@core/middlewares/validation.middleware";
import {
  dispatchCampaignSchema,
  previewTemplateSchema,
} from "@core/utils/validators/validations/dispatch.validation";
import { DispatchController } from "./dispatch.controller";

/**
 * @swagger
 * tags:
 *   name: Dispatch
 *   description: Campaign sending and template preview
 *
 * components:
 *   schemas:
 *     Recipient:
 *       type: object
 *       required: [id, email]
 *       properties:
 *         id:
 *           type: string
 *         email:
 *           type: string
 *           format: email
 *         firstName:
 *           type: string
 *         lastName:
 *           type: string
 *         company:
 *           type: string
 *         city:
 *           type: string
 *         country:
 *           type: string
 *         timezone:
 *           type: string
 *           example: Europe/Berlin
 *         industry:
 *           type: string
 */
export function createDispatchRoutes(controller: DispatchController): Router {
  const router = Router();

  /**
   * @swagger
   * /api/dispatch/campaigns/{campaignId}:
   *   post:
   *     summary: Send a campaign to a list of recipients
   *     tags: [Dispatch]
   *     parameters:
   *       - in: path
   *         name: campaignId
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [recipients]
   *             properties:
   *               recipients:
   *                 type: array
   *                 items:
   *                   $ref: '#/components/schemas/Recipient'
   *     responses:
   *       200:
   *         description: One result per recipient with its status and tracking token
   *       400:
   *         description: Invalid recipients or template spintax
   *       404:
   *         description: Campaign not found
   *       503:
   *         description: No enabled SMTP server
   */
  router.post("/campaigns/:campaignId", validateRequest(dispatchCampaignSchema), (req, res, next) =>
    controller.dispatchCampaign(req, res, next),
  );

  /**
   * @swagger
   * /api/dispatch/preview:
   *   post:
   *     summary: Validate a template and render one sample
   *     tags: [Dispatch]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [subject, html]
   *             properties:
   *               subject:
   *                 type: string
   *               html:
   *                 type: string
   *               text:
   *                 type: string
   *               weightedSpintax:
   *                 type: boolean
   *               seed:
   *                 type: integer
   *               recipient:
   *                 $ref: '#/components/schemas/Recipient'
   *     responses:
   *       200:
   *         description: Per-field errors, variation counts and a sample when valid
   */
  router.post("/preview", validateRequest(previewTemplateSchema), (req, res, next) =>
    controller.previewTemplate(req, res, next),
  );

  return router;
}
