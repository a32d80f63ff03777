import { NextFunction, Request, Response } from "express";
import { SubscriberService } from "./subscriber.service";

export class SubscriberController {
  constructor(private readonly subscribers: SubscriberService) {}

  /** One-click form (RFC 8058): mail clients POST without a body. */
  async unsubscribeOneClick(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const claims = await this.subscribers.unsubscribe(req.params.token);
      res.json({ message: "Unsubscribed successfully", data: claims });
    } catch (error) {
      next(error);
    }
  }

  async unsubscribeLink(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      await this.subscribers.unsubscribe(req.params.token);
      res.type("text/plain").send("You have been unsubscribed and will no longer receive these emails.");
    } catch (error) {
      next(error);
    }
  }
}
