import { NextFunction, Request, Response } from "express";
import { logger } from "@config/logger";
import { isValidUrl } from "@core/utils/url";
import { AttributionIngestor } from "./attribution.service";
import { extractRequestMeta } from "./request-meta";

// 1x1 transparent GIF89a, 43 bytes.
export const TRANSPARENT_GIF = Buffer.from("R0lGODlhAQABAIAAAP///wAAACH5BAEAAAAALAAAAAABAAEAAAICRAEAOw==", "base64");

export class TrackingController {
  constructor(
    private readonly attribution: AttributionIngestor,
    private readonly fallbackUrl: string,
  ) {}

  /** Always answers with the pixel; attribution failures are only logged. */
  async trackOpen(req: Request, res: Response, _next: NextFunction): Promise<void> {
    const token = req.params.trackingToken.replace(/\.gif$/i, "");

    try {
      await this.attribution.handleOpen(token, extractRequestMeta(req));
    } catch (error) {
      logger.warn("Error tracking open:", { token: token.slice(0, 8), error });
    }

    // Mail proxies cache aggressively; every open must reach us.
    res.setHeader("Content-Type", "image/gif");
    res.setHeader("Content-Length", TRANSPARENT_GIF.length);
    res.setHeader("Cache-Control", "no-cache, no-store, must-revalidate, private");
    res.setHeader("Pragma", "no-cache");
    res.setHeader("Expires", "0");
    res.status(200).end(TRANSPARENT_GIF);
  }

  /** Redirects to the mapped URL, or to the fallback when it cannot be resolved. */
  async trackClick(req: Request, res: Response, _next: NextFunction): Promise<void> {
    const { linkId } = req.params;
    let destination = this.fallbackUrl;

    try {
      const url = await this.attribution.handleClick(linkId, extractRequestMeta(req));
      if (isValidUrl(url)) {
        destination = url;
      } else {
        logger.warn("Refusing to redirect to non-http destination", { linkId, url });
      }
    } catch (error) {
      logger.warn("Error tracking click:", { linkId, error });
    }

    res.redirect(302, destination);
  }
}
