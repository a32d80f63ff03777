import { RandomSource, randomInt } from "@core/utils/random";
import { logger } from "@config/logger";
import { SpintaxExpander } from "./spintax.service";

export interface EmailTemplate {
  subject: string;
  html: string;
  text: string;
  /** Honour `:weight` suffixes on spintax options. */
  weightedSpintax?: boolean;
}

export interface RecipientProfile {
  id: string;
  email: string;
  firstName?: string;
  lastName?: string;
  company?: string;
  city?: string;
  country?: string;
  /** IANA zone, e.g. "Europe/Berlin". */
  timezone?: string;
  industry?: string;
}

export interface SendContext {
  now: Date;
  random: RandomSource;
}

export interface PersonalizedContent {
  subject: string;
  html: string;
  text: string;
}

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

export const INDUSTRY_CONTENT: Record<string, string> = {
  technology: "Latest tech innovations and digital solutions",
  healthcare: "Advanced healthcare solutions and patient care",
  finance: "Financial insights and investment opportunities",
  education: "Educational resources and learning opportunities",
};

export const DEFAULT_INDUSTRY_CONTENT = "Personalized content for your business";

export function timeGreeting(hour: number): string {
  if (hour < 12) return "Good morning";
  if (hour < 17) return "Good afternoon";
  return "Good evening";
}

/** "March 5, 2026" from the server clock. */
export function formatDate(date: Date): string {
  return `${MONTHS[date.getMonth()]} ${date.getDate()}, ${date.getFullYear()}`;
}

/** "3:07 PM" from the server clock. */
export function formatTime(date: Date): string {
  return formatClock(date.getHours(), date.getMinutes());
}

function formatClock(hours24: number, minutes: number): string {
  const period = hours24 < 12 ? "AM" : "PM";
  const hours12 = hours24 % 12 === 0 ? 12 : hours24 % 12;
  return `${hours12}:${String(minutes).padStart(2, "0")} ${period}`;
}

/** Wall-clock time in `timeZone`; throws RangeError for unknown zones. */
export function formatTimeInZone(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hour: "numeric",
    minute: "numeric",
    hourCycle: "h23",
  }).formatToParts(date);

  const hour = Number(parts.find((part) => part.type === "hour")?.value ?? "0");
  const minute = Number(parts.find((part) => part.type === "minute")?.value ?? "0");
  return formatClock(hour % 24, minute);
}

export function industryContent(industry: string): string {
  return INDUSTRY_CONTENT[industry.trim().toLowerCase()] ?? DEFAULT_INDUSTRY_CONTENT;
}

const MERGE_TAG = /\{\{\w+\}\}/g;

export class ContentPersonalizer {
  constructor(private readonly spintax: SpintaxExpander = new SpintaxExpander()) {}

  personalize(
    template: EmailTemplate,
    recipient: RecipientProfile,
    context: SendContext,
  ): PersonalizedContent {
    const spin = (text: string): string =>
      template.weightedSpintax
        ? this.spintax.expandWeighted(text, context.random)
        : this.spintax.expand(text, context.random);

    const expanded = {
      subject: spin(template.subject),
      html: spin(template.html),
      text: spin(template.text),
    };

    const tokens = this.buildTokens(recipient, context);
    // One pass: a value that itself looks like a merge tag stays literal.
    const apply = (text: string): string =>
      text.replace(MERGE_TAG, (tag) => (Object.hasOwn(tokens, tag) ? tokens[tag] : tag));

    return {
      subject: apply(expanded.subject),
      html: apply(expanded.html),
      text: apply(expanded.text),
    };
  }

  /** Profile fields, then date and time values, greeting, local time and industry content. */
  private buildTokens(recipient: RecipientProfile, context: SendContext): Record<string, string> {
    const { now, random } = context;

    return {
      "{{first_name}}": recipient.firstName ?? "",
      "{{last_name}}": recipient.lastName ?? "",
      "{{email}}": recipient.email,
      "{{company}}": recipient.company ?? "",
      "{{city}}": recipient.city ?? "",
      "{{country}}": recipient.country ?? "",
      "{{current_date}}": formatDate(now),
      "{{current_time}}": formatTime(now),
      "{{random_number}}": String(randomInt(random, 1000, 9999)),
      "{{time_greeting}}": timeGreeting(now.getHours()),
      "{{local_time}}": this.localTime(recipient, now),
      "{{industry_content}}": recipient.industry ? industryContent(recipient.industry) : "",
    };
  }

  private localTime(recipient: RecipientProfile, now: Date): string {
    if (!recipient.timezone) {
      return "";
    }
    try {
      return formatTimeInZone(now, recipient.timezone);
    } catch (error) {
      logger.warn(`Unknown timezone "${recipient.timezone}" for recipient ${recipient.id}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return formatTime(now);
    }
  }
}
