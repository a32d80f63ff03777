import { RandomSource } from "@core/utils/random";

/** Seconds to wait after sending to a mailbox at this provider. */
export const DOMAIN_DELAY_SECONDS: Readonly<Record<string, number>> = {
  "gmail.com": 2,
  "yahoo.com": 3,
  "outlook.com": 2,
  "hotmail.com": 3,
};

export const DEFAULT_DOMAIN_DELAY_SECONDS = 1;
export const MAX_JITTER_MS = 2000;
export const BATCH_DELAY_PER_RECIPIENT_MS = 500;

export function recipientDomain(email: string): string {
  return email.slice(email.lastIndexOf("@") + 1).toLowerCase();
}

export function interSendDelayMs(email: string, random: RandomSource): number {
  const domain = recipientDomain(email);
  const baseSeconds = Object.hasOwn(DOMAIN_DELAY_SECONDS, domain)
    ? DOMAIN_DELAY_SECONDS[domain]
    : DEFAULT_DOMAIN_DELAY_SECONDS;
  return baseSeconds * 1000 + Math.floor(random() * (MAX_JITTER_MS + 1));
}

export function batchDelayMs(batchSize: number): number {
  return batchSize * BATCH_DELAY_PER_RECIPIENT_MS;
}

/** 2s after the first failure, 4s after the second, ... */
export function backoffMs(failedAttempts: number): number {
  return 2 ** failedAttempts * 1000;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    batches.push(items.slice(index, index + size));
  }
  return batches;
}
