import { logger } from "@config/logger";
import { SmtpServer } from "./models/smtp.model";
import { SmtpServerConfig, SmtpServerRepository } from "./smtp.types";

export class MongoSmtpServerRepository implements SmtpServerRepository {
  async loadPool(): Promise<SmtpServerConfig[]> {
    try {
      const servers = await SmtpServer.find({ enabled: true })
        .sort({ priority: -1, name: 1 })
        .lean();

      return servers.map((server) => ({
        name: server.name,
        host: server.host,
        port: server.port,
        secure: server.secure,
        username: server.username,
        password: server.password,
        fromEmail: server.fromEmail,
        fromName: server.fromName,
        priority: server.priority,
        enabled: server.enabled,
      }));
    } catch (error) {
      logger.error("Error loading SMTP server pool:", error);
      throw error;
    }
  }

  async recordOutcome(serverName: string, success: boolean, at: Date): Promise<void> {
    const update = success
      ? { $inc: { "stats.sent": 1 }, $set: { "stats.lastUsedAt": at } }
      : { $inc: { "stats.failed": 1 }, $set: { "stats.lastUsedAt": at, "stats.lastFailureAt": at } };

    await SmtpServer.updateOne({ name: serverName }, update);
  }
}
