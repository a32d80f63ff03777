import { v4 as uuidv4 } from "uuid";
import { joinUrl } from "@core/utils/url";
import { createUnsubscribeToken } from "@features/subscriber/unsubscribe-token";
import { MimeSource, composeMime, parseMime } from "@features/email/smtp/mime-composer";
import { DkimSigner } from "./dkim-signer";

export interface DeliveryAuthenticatorOptions {
  domain: string;
  publicBaseUrl: string;
  unsubscribeSecret: string;
  returnPath?: string;
  organization?: string;
  signer?: DkimSigner;
}

export interface MessageToAuthenticate {
  from: string;
  to: string;
  subject: string;
  recipientId: string;
  campaignId: string;
  date: Date;
  messageId?: string;
}

export class DeliveryAuthenticator {
  constructor(private readonly options: DeliveryAuthenticatorOptions) {}

  get dkimEnabled(): boolean {
    return this.options.signer !== undefined;
  }

  createMessageId(): string {
    return `<${uuidv4()}.${Date.now()}@${this.options.domain}>`;
  }

  unsubscribeUrl(recipientId: string, campaignId: string): string {
    const token = createUnsubscribeToken(
      { subscriberId: recipientId, campaignId },
      this.options.unsubscribeSecret,
    );
    return joinUrl(this.options.publicBaseUrl, `/api/subscribers/unsubscribe/${token}`);
  }

  identityHeaders(recipientId: string, campaignId: string, date: Date, messageId?: string): Record<string, string> {
    const headers: Record<string, string> = {
      "Message-ID": messageId ?? this.createMessageId(),
      Date: date.toUTCString(),
      "MIME-Version": "1.0",
      "List-Unsubscribe": `<${this.unsubscribeUrl(recipientId, campaignId)}>, <mailto:unsubscribe@${this.options.domain}?subject=unsubscribe>`,
      "List-Unsubscribe-Post": "List-Unsubscribe=One-Click",
      "X-Priority": "3",
      "X-Auto-Response-Suppress": "OOF, DR, RN, NRN",
    };

    if (this.options.returnPath) {
      headers["Return-Path"] = `<${this.options.returnPath}>`;
    }
    if (this.options.organization) {
      headers.Organization = this.options.organization;
    }
    return headers;
  }

  /** Header set written into the composed message, before any DKIM signature. */
  authenticate(message: MessageToAuthenticate): Record<string, string> {
    return {
      From: message.from,
      To: message.to,
      Subject: message.subject,
      ...this.identityHeaders(message.recipientId, message.campaignId, message.date, message.messageId),
    };
  }

  /**
   * Composes the wire message and, when a signer is configured, prepends a
   * DKIM-Signature computed over the composed headers and MIME body. Tracking
   * must already be injected into the html.
   */
  async seal(source: MimeSource): Promise<string> {
    const raw = await composeMime(source);
    const { signer } = this.options;
    if (!signer) {
      return raw;
    }

    const { headers, body } = parseMime(raw);
    const signature = signer.sign(headers, body, Math.floor(source.date.getTime() / 1000));
    return `DKIM-Signature: ${signature}\r\n${raw}`;
  }
}
