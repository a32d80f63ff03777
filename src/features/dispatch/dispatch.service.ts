import { z } from "zod";
import { logger } from "@config/logger";
import { EventType, eventBus } from "@core/events/event-bus";
import {
  NoServerAvailableError,
  NotFoundError,
  TransportError,
  ValidationError,
  errorMessage,
} from "@core/errors/app-errors";
import { Sleeper, sleep as defaultSleep, withTimeout } from "@core/utils/async";
import { RandomSource } from "@core/utils/random";
import { CampaignRepository, CampaignTemplate } from "@features/campaign/campaign.repository";
import { DeliveryAuthenticator } from "@features/email/authentication/delivery-authenticator";
import { ContentPersonalizer, RecipientProfile } from "@features/email/content/personalization.service";
import { SpintaxExpander } from "@features/email/content/spintax.service";
import { ServerSelector } from "@features/email/smtp/server-selector";
import {
  BounceReport,
  MailTransport,
  OutboundMessage,
  SmtpServerConfig,
  SmtpServerRepository,
  TransportReceipt,
} from "@features/email/smtp/smtp.types";
import { SubscriberRepository } from "@features/subscriber/subscriber.repository";
import { TrackingInjector, issueTrackingId } from "@features/tracking/tracking-injector.service";
import { DispatchState, DispatchStateMachine } from "./dispatch-state";
import { backoffMs, batchDelayMs, chunk, interSendDelayMs } from "./rate-shaping";
import { SendRecord, SendRecordRepository } from "./send-record.types";

export type DispatchRecipient = RecipientProfile;

export interface DispatchResult {
  recipientId: string;
  email: string;
  status: "sent" | "failed";
  trackingId: string;
  retryCount: number;
  smtpServer?: string;
  messageId?: string;
  error?: string;
}

export interface DispatchSettings {
  maxAttempts: number;
  batchSize: number;
  sendTimeoutMs: number;
  fromEmail: string;
  fromName: string;
  returnPath?: string;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

export interface DispatchEngineDependencies {
  campaigns: CampaignRepository;
  sends: SendRecordRepository;
  subscribers: SubscriberRepository;
  servers: SmtpServerRepository;
  selector: ServerSelector;
  transport: MailTransport;
  personalizer: ContentPersonalizer;
  spintax: SpintaxExpander;
  injector: TrackingInjector;
  authenticator: DeliveryAuthenticator;
  settings: DispatchSettings;
  sleep?: Sleeper;
  random?: RandomSource;
  now?: () => Date;
}

type SendOutcome =
  | { ok: true; server: SmtpServerConfig; receipt: TransportReceipt }
  | { ok: false; server?: SmtpServerConfig; error: unknown };

const recipientSchema = z.object({
  id: z.string().min(1, "recipient id is required"),
  email: z.string().email("invalid email address"),
});

export function formatAddress(name: string, email: string): string {
  if (!name) return email;
  return `"${name.replace(/["\\]/g, "\\$&")}" <${email}>`;
}

export class DispatchEngine {
  private readonly sleep: Sleeper;
  private readonly random: RandomSource;
  private readonly now: () => Date;

  constructor(private readonly deps: DispatchEngineDependencies) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Sends the campaign to every recipient in order, one send record per
   * recipient. Per-recipient failures are reported in the results; only
   * validation, a missing campaign, an empty pool or an abort reject.
   */
  async dispatch(
    campaignId: string,
    recipients: DispatchRecipient[],
    options: DispatchOptions = {},
  ): Promise<DispatchResult[]> {
    const { signal } = options;

    const template = await this.deps.campaigns.findTemplate(campaignId);
    if (!template) {
      throw new NotFoundError(`Campaign ${campaignId} not found`);
    }
    this.validate(template, recipients);

    const pool = (await this.deps.servers.loadPool()).filter((server) => server.enabled);
    if (pool.length === 0) {
      throw new NoServerAvailableError();
    }

    await this.safely(`marking campaign ${campaignId} dispatched`, () =>
      this.deps.campaigns.markDispatched(campaignId, this.now()),
    );

    logger.info(`Dispatching campaign ${campaignId} to ${recipients.length} recipients`, {
      servers: pool.map((server) => server.name),
    });

    const results: DispatchResult[] = [];
    const batches = chunk(recipients, this.deps.settings.batchSize);

    for (const [batchIndex, batch] of batches.entries()) {
      for (const [index, recipient] of batch.entries()) {
        signal?.throwIfAborted();
        results.push(await this.dispatchRecipient(template, recipient, pool, signal));
        signal?.throwIfAborted();

        if (index < batch.length - 1) {
          await this.sleep(interSendDelayMs(recipient.email, this.random), signal);
        }
      }

      if (batchIndex < batches.length - 1) {
        await this.sleep(batchDelayMs(batch.length), signal);
      }
    }

    const sent = results.filter((result) => result.status === "sent").length;
    logger.info(`Campaign ${campaignId} dispatched: ${sent} sent, ${results.length - sent} failed`);
    return results;
  }

  /** Marks the matching send bounced and updates campaign and subscriber bounce counts. */
  async recordBounce(report: BounceReport): Promise<SendRecord> {
    const at = this.now();
    const record = await this.deps.sends.markBounced(
      { trackingId: report.trackingId, messageId: report.messageId },
      { bounceType: report.bounceType, reason: report.reason, at },
    );
    if (!record) {
      throw new NotFoundError("No sent message matches the bounce report");
    }

    await this.safely(`updating bounce counters for campaign ${record.campaignId}`, () =>
      this.deps.campaigns.applyCounters(record.campaignId, { bounces: 1 }),
    );
    await this.safely(`recording bounce for subscriber ${record.subscriberId}`, () =>
      this.deps.subscribers.recordBounce(record.subscriberId, report.bounceType, report.reason, at),
    );

    logger.info(`Recorded ${report.bounceType} bounce for send ${record.trackingId}`);
    return record;
  }

  private validate(template: CampaignTemplate, recipients: DispatchRecipient[]): void {
    const problems: string[] = [];

    recipients.forEach((recipient, index) => {
      const parsed = recipientSchema.safeParse(recipient);
      if (!parsed.success) {
        problems.push(...parsed.error.issues.map((issue) => `recipients[${index}]: ${issue.message}`));
      }
    });

    for (const field of ["subject", "html", "text"] as const) {
      problems.push(...this.deps.spintax.validate(template[field]).map((error) => `${field}: ${error}`));
    }

    if (problems.length > 0) {
      throw new ValidationError("Dispatch request is invalid", problems);
    }
  }

  private async dispatchRecipient(
    template: CampaignTemplate,
    recipient: DispatchRecipient,
    pool: SmtpServerConfig[],
    signal?: AbortSignal,
  ): Promise<DispatchResult> {
    const machine = new DispatchStateMachine(this.now);
    const trackingId = issueTrackingId();

    try {
      await this.deps.sends.create(
        {
          trackingId,
          campaignId: template.campaignId,
          subscriberId: recipient.id,
          toEmail: recipient.email,
        },
        this.now(),
      );
    } catch (error) {
      machine.transition(DispatchState.FAILED);
      logger.error(`Could not create send record for ${recipient.email}:`, error);
      await this.safely(`updating failure counter for campaign ${template.campaignId}`, () =>
        this.deps.campaigns.applyCounters(template.campaignId, { emailsFailed: 1 }),
      );
      return {
        recipientId: recipient.id,
        email: recipient.email,
        status: "failed",
        trackingId,
        retryCount: 0,
        error: `Send record could not be created: ${errorMessage(error)}`,
      };
    }

    let message: OutboundMessage;
    try {
      message = await this.compose(machine, template, recipient, trackingId);
    } catch (error) {
      logger.error(`Composing message for ${recipient.email} failed:`, error);
      return this.fail(machine, template, recipient, trackingId, { ok: false, error });
    }

    machine.transition(DispatchState.SENDING);
    const outcome = await this.sendWithRetry(machine, message, pool, signal);

    if (outcome.ok) {
      return this.complete(machine, template, recipient, trackingId, outcome.server, message.messageId);
    }
    return this.fail(machine, template, recipient, trackingId, outcome);
  }

  /** composing: personalize then inject tracking; authenticating: headers, MIME composition and DKIM over the final message. */
  private async compose(
    machine: DispatchStateMachine,
    template: CampaignTemplate,
    recipient: DispatchRecipient,
    trackingId: string,
  ): Promise<OutboundMessage> {
    machine.transition(DispatchState.COMPOSING);
    const date = this.now();
    const content = this.deps.personalizer.personalize(template, recipient, { now: date, random: this.random });
    const html = await this.deps.injector.inject(content.html, trackingId, {
      linkVariants: template.linkVariants,
    });

    machine.transition(DispatchState.AUTHENTICATING);
    const { settings } = this.deps;
    const senderAddress = template.fromEmail ?? settings.fromEmail;
    const from = formatAddress(template.fromName ?? settings.fromName, senderAddress);
    const messageId = this.deps.authenticator.createMessageId();
    const headers = this.deps.authenticator.authenticate({
      from,
      to: recipient.email,
      subject: content.subject,
      recipientId: recipient.id,
      campaignId: template.campaignId,
      date,
      messageId,
    });

    const raw = await this.deps.authenticator.seal({
      from,
      to: recipient.email,
      subject: content.subject,
      html,
      text: content.text,
      messageId,
      date,
      headers,
    });

    await this.deps.sends.saveComposition(trackingId, {
      subject: content.subject,
      htmlContent: html,
      textContent: content.text,
      messageId,
    });

    return {
      from,
      to: recipient.email,
      subject: content.subject,
      html,
      text: content.text,
      messageId,
      date,
      envelope: { from: settings.returnPath ?? senderAddress, to: recipient.email },
      headers,
      raw,
    };
  }

  private async sendWithRetry(
    machine: DispatchStateMachine,
    message: OutboundMessage,
    pool: SmtpServerConfig[],
    signal?: AbortSignal,
  ): Promise<SendOutcome> {
    const { selector, transport, settings } = this.deps;
    let last: SendOutcome = { ok: false, error: new NoServerAvailableError() };

    while (machine.canRetry(settings.maxAttempts)) {
      const attempt = machine.beginAttempt();
      let server: SmtpServerConfig | undefined;
      const startedAt = Date.now();

      try {
        server = selector.next(pool);
        const serverName = server.name;
        const receipt = await withTimeout(
          transport.send(server, message, signal),
          settings.sendTimeoutMs,
          () => new TransportError(`Send timed out after ${settings.sendTimeoutMs}ms`, serverName),
          signal,
        );

        selector.recordOutcome(server, true, receipt.responseTimeMs);
        await this.recordServerOutcome(server, true);
        return { ok: true, server, receipt };
      } catch (error) {
        last = { ok: false, server, error };
        if (signal?.aborted || !server) {
          return last;
        }

        selector.recordOutcome(server, false, Date.now() - startedAt);
        await this.recordServerOutcome(server, false);
        logger.warn(
          `Send attempt ${attempt}/${settings.maxAttempts} to ${message.to} via ${server.name} failed: ${errorMessage(error)}`,
        );
      }

      if (machine.canRetry(settings.maxAttempts)) {
        try {
          await this.sleep(backoffMs(attempt), signal);
        } catch (abortError) {
          return { ok: false, server: last.server, error: abortError };
        }
      }
    }

    return last;
  }

  private async complete(
    machine: DispatchStateMachine,
    template: CampaignTemplate,
    recipient: DispatchRecipient,
    trackingId: string,
    server: SmtpServerConfig,
    messageId: string,
  ): Promise<DispatchResult> {
    machine.transition(DispatchState.SENT);
    const sentAt = this.now();
    const { retryCount } = machine;

    // The message is out; bookkeeping failures are logged and left to reconciliation.
    await this.safely(`marking send ${trackingId} sent`, () =>
      this.deps.sends.markSent(trackingId, { smtpServer: server.name, retryCount, sentAt, messageId }),
    );
    await this.safely(`updating sent counter for campaign ${template.campaignId}`, () =>
      this.deps.campaigns.applyCounters(template.campaignId, { emailsSent: 1 }),
    );
    await this.safely(`updating sent counter for subscriber ${recipient.id}`, () =>
      this.deps.subscribers.recordEngagement(recipient.id, { sent: 1 }, 0, sentAt),
    );

    eventBus.emitEvent(EventType.SEND_COMPLETED, {
      campaignId: template.campaignId,
      subscriberId: recipient.id,
      trackingId,
      retryCount,
      smtpServer: server.name,
      messageId,
    });

    return {
      recipientId: recipient.id,
      email: recipient.email,
      status: "sent",
      trackingId,
      retryCount,
      smtpServer: server.name,
      messageId,
    };
  }

  private async fail(
    machine: DispatchStateMachine,
    template: CampaignTemplate,
    recipient: DispatchRecipient,
    trackingId: string,
    outcome: Extract<SendOutcome, { ok: false }>,
  ): Promise<DispatchResult> {
    if (machine.canTransition(DispatchState.FAILED)) {
      machine.transition(DispatchState.FAILED);
    }
    const reason = errorMessage(outcome.error);
    const { retryCount } = machine;

    await this.safely(`marking send ${trackingId} failed`, () =>
      this.deps.sends.markFailed(trackingId, {
        smtpServer: outcome.server?.name,
        retryCount,
        errorMessage: reason,
      }),
    );
    await this.safely(`updating failure counter for campaign ${template.campaignId}`, () =>
      this.deps.campaigns.applyCounters(template.campaignId, { emailsFailed: 1 }),
    );

    // Never accepted, so only the subscriber tally moves; campaign bounces count sent messages.
    const { error } = outcome;
    if (error instanceof TransportError && error.bounceType) {
      const bounceType = error.bounceType;
      await this.safely(`recording bounce for subscriber ${recipient.id}`, () =>
        this.deps.subscribers.recordBounce(recipient.id, bounceType, reason, this.now()),
      );
    }

    eventBus.emitEvent(EventType.SEND_FAILED, {
      campaignId: template.campaignId,
      subscriberId: recipient.id,
      trackingId,
      retryCount,
      error: reason,
    });

    return {
      recipientId: recipient.id,
      email: recipient.email,
      status: "failed",
      trackingId,
      retryCount,
      smtpServer: outcome.server?.name,
      error: reason,
    };
  }

  private async recordServerOutcome(server: SmtpServerConfig, success: boolean): Promise<void> {
    await this.safely(`updating stats for SMTP server ${server.name}`, () =>
      this.deps.servers.recordOutcome(server.name, success, this.now()),
    );
  }

  private async safely(action: string, operation: () => Promise<void>): Promise<void> {
    try {
      await operation();
    } catch (error) {
      logger.error(`Error ${action}:`, error);
    }
  }
}
