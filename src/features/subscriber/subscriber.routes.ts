import { Router } from "express";
import { SubscriberController } from "./subscriber.controller";

/**
 * @swagger
 * tags:
 *   name: Subscribers
 *   description: List-Unsubscribe endpoints
 */
export function createSubscriberRoutes(controller: SubscriberController): Router {
  const router = Router();

  /**
   * @swagger
   * /api/subscribers/unsubscribe/{token}:
   *   get:
   *     summary: Unsubscribe from the link in the List-Unsubscribe header
   *     tags: [Subscribers]
   *     parameters:
   *       - in: path
   *         name: token
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Plain-text confirmation
   *       400:
   *         description: Token signature does not verify
   *   post:
   *     summary: One-click unsubscribe
   *     tags: [Subscribers]
   *     parameters:
   *       - in: path
   *         name: token
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: The subscriber is now unsubscribed
   *       400:
   *         description: Token signature does not verify
   *       404:
   *         description: Subscriber no longer exists
   */
  router.get("/unsubscribe/:token", (req, res, next) => controller.unsubscribeLink(req, res, next));
  router.post("/unsubscribe/:token", (req, res, next) => controller.unsubscribeOneClick(req, res, next));

  return router;
}
