import { BounceType } from "@core/errors/app-errors";

export interface SmtpServerConfig {
  name: string;
  host: string;
  port: number;
  secure: boolean;
  username?: string;
  password?: string;
  fromEmail?: string;
  fromName?: string;
  /** Higher wins; each point is worth 10 score points. */
  priority: number;
  enabled: boolean;
}

export interface OutboundMessage {
  from: string;
  to: string;
  subject: string;
  html: string;
  text: string;
  messageId: string;
  date: Date;
  /** SMTP envelope; `from` is the Return-Path when one is configured. */
  envelope: { from: string; to: string };
  /** Identity headers that went into `raw`. */
  headers: Record<string, string>;
  /** Composed, and DKIM-signed when enabled, RFC 5322 message sent as is. */
  raw: string;
}

export interface TransportReceipt {
  messageId: string;
  response?: string;
  responseTimeMs: number;
}

export interface MailTransport {
  send(server: SmtpServerConfig, message: OutboundMessage, signal?: AbortSignal): Promise<TransportReceipt>;
}

export interface SmtpServerRepository {
  loadPool(): Promise<SmtpServerConfig[]>;
  recordOutcome(serverName: string, success: boolean, at: Date): Promise<void>;
}

export interface BounceReport {
  trackingId?: string;
  messageId?: string;
  bounceType: BounceType;
  reason: string;
}
