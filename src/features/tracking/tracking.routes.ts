import { Router } from "express";
import { TrackingController } from "./tracking.controller";

/**
 * @swagger
 * tags:
 *   name: Tracking
 *   description: Open pixel and click redirect endpoints embedded in sent mail
 */
export function createTrackingRoutes(controller: TrackingController): Router {
  const router = Router();

  /**
   * @swagger
   * /track/pixel/{trackingToken}:
   *   get:
   *     summary: Record an open and return a 1x1 transparent GIF
   *     tags: [Tracking]
   *     parameters:
   *       - in: path
   *         name: trackingToken
   *         required: true
   *         schema:
   *           type: string
   *         description: Tracking token of the send, optionally suffixed with .gif
   *     responses:
   *       200:
   *         description: The pixel, returned even when the token is unknown
   *         content:
   *           image/gif: {}
   */
  router.get("/pixel/:trackingToken", (req, res, next) => controller.trackOpen(req, res, next));

  /**
   * @swagger
   * /track/click/{linkId}:
   *   get:
   *     summary: Record a click and redirect to the original link
   *     tags: [Tracking]
   *     parameters:
   *       - in: path
   *         name: linkId
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       302:
   *         description: Redirect to the original URL, or to the fallback URL when the link cannot be resolved
   */
  router.get("/click/:linkId", (req, res, next) => controller.trackClick(req, res, next));

  return router;
}
