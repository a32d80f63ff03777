import nodemailer from "nodemailer";
import { logger } from "@config/logger";
import { TransportError, errorMessage } from "@core/errors/app-errors";
import { classifyTransportFailure } from "./bounce-classifier";
import { MailTransport, OutboundMessage, SmtpServerConfig, TransportReceipt } from "./smtp.types";

const POOL_CONFIG = {
  pool: true,
  maxConnections: 5,
  maxMessages: 100,
  rateDelta: 1000,
  rateLimit: 5,
} as const;

function createSmtpTransporter(server: SmtpServerConfig) {
  return nodemailer.createTransport({
    ...POOL_CONFIG,
    host: server.host,
    port: server.port,
    secure: server.secure,
    auth: server.username ? { user: server.username, pass: server.password } : undefined,
    connectionTimeout: 5000,
    greetingTimeout: 5000,
    socketTimeout: 10000,
  });
}

type SmtpTransporter = ReturnType<typeof createSmtpTransporter>;

export interface SmtpTransportOptions {
  idleTimeoutMs?: number;
}

export class SmtpTransport implements MailTransport {
  private readonly transporters = new Map<string, { transporter: SmtpTransporter; lastUsed: number }>();
  private readonly idleTimeoutMs: number;
  private cleanupTimer: NodeJS.Timeout | null = null;

  static readonly CLEANUP_INTERVAL = 15 * 60 * 1000;

  constructor(options: SmtpTransportOptions = {}) {
    this.idleTimeoutMs = options.idleTimeoutMs ?? 30 * 60 * 1000;
  }

  startCleanupInterval(): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => this.cleanupUnusedTransporters(), SmtpTransport.CLEANUP_INTERVAL);
    this.cleanupTimer.unref();
  }

  async send(server: SmtpServerConfig, message: OutboundMessage, signal?: AbortSignal): Promise<TransportReceipt> {
    signal?.throwIfAborted();
    const transporter = this.getTransporter(server);
    const startedAt = Date.now();

    try {
      // The message is already composed and signed; nodemailer must not rewrite it.
      const info = await transporter.sendMail({ envelope: message.envelope, raw: message.raw });
      const messageId = info.messageId || message.messageId;

      const responseTimeMs = Date.now() - startedAt;
      logger.info("Email sent successfully via SMTP", {
        server: server.name,
        messageId,
        responseTimeMs,
      });

      return { messageId, response: info.response, responseTimeMs };
    } catch (error) {
      const reason = errorMessage(error);
      const responseCode = readResponseCode(error);
      logger.error(`Failed to send email via SMTP server ${server.name}:`, error);
      throw new TransportError(reason, server.name, classifyTransportFailure(reason, responseCode), {
        cause: error,
      });
    }
  }

  cleanupUnusedTransporters(): void {
    const now = Date.now();
    for (const [name, { transporter, lastUsed }] of this.transporters) {
      if (now - lastUsed > this.idleTimeoutMs) {
        transporter.close();
        this.transporters.delete(name);
        logger.info(`Closed inactive SMTP transporter for server ${name}`);
      }
    }
  }

  close(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    for (const { transporter } of this.transporters.values()) {
      transporter.close();
    }
    this.transporters.clear();
  }

  private getTransporter(server: SmtpServerConfig): SmtpTransporter {
    const existing = this.transporters.get(server.name);
    if (existing) {
      existing.lastUsed = Date.now();
      return existing.transporter;
    }

    const transporter = createSmtpTransporter(server);
    this.transporters.set(server.name, { transporter, lastUsed: Date.now() });
    return transporter;
  }
}

function readResponseCode(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "responseCode" in error) {
    const { responseCode } = error;
    return typeof responseCode === "number" ? responseCode : undefined;
  }
  return undefined;
}
