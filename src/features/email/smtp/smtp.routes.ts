import { Router } from "express";
import rateLimit from "express-rate-limit";
import { validateRequest } from "@core/middlewares/validation.middleware";
import { bounceWebhookSchema } from "@core/utils/validators/validations/smtp.validation";
import { SmtpController } from "./smtp.controller";

export interface SmtpRouteOptions {
  /** Bounce webhook calls allowed per IP per minute. */
  webhookRateLimit?: number;
}

/**
 * @swagger
 * tags:
 *   name: SMTP
 *   description: Sending pool health and bounce notifications
 */
export function createSmtpRoutes(controller: SmtpController, options: SmtpRouteOptions = {}): Router {
  const router = Router();

  const webhookLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: options.webhookRateLimit ?? 600,
    standardHeaders: true,
    legacyHeaders: false,
  });

  /**
   * @swagger
   * /api/smtp/servers/performance:
   *   get:
   *     summary: Current selection score, success rate, response time and load per server
   *     tags: [SMTP]
   *     responses:
   *       200:
   *         description: One entry per enabled server in pool order
   */
  router.get("/servers/performance", (req, res, next) => controller.getServerPerformance(req, res, next));

  /**
   * @swagger
   * /api/smtp/webhook/bounce:
   *   post:
   *     summary: Record a bounce reported by the mail provider
   *     tags: [SMTP]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [bounceType, reason]
   *             properties:
   *               trackingId:
   *                 type: string
   *               messageId:
   *                 type: string
   *               bounceType:
   *                 type: string
   *                 enum: [hard, soft]
   *               reason:
   *                 type: string
   *     responses:
   *       200:
   *         description: The send was marked bounced
   *       400:
   *         description: Neither trackingId nor messageId given
   *       404:
   *         description: No sent message matches
   */
  router.post("/webhook/bounce", webhookLimiter, validateRequest(bounceWebhookSchema), (req, res, next) =>
    controller.handleBounce(req, res, next),
  );

  return router;
}
