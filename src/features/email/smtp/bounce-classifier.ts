import { BounceType } from "@core/errors/app-errors";

const BOUNCE_MARKERS = ["bounce", "rejected", "blocked", "invalid recipient", "does not exist", "mailbox unavailable"];
const HARD_BOUNCE_MARKERS = ["does not exist", "invalid recipient", "permanent", "hard bounce", "user unknown", "no such user"];
const HARD_SMTP_CODE = /\b5\d{2}\b/;

export function isBounceError(message: string): boolean {
  const normalized = message.toLowerCase();
  return BOUNCE_MARKERS.some((marker) => normalized.includes(marker));
}

export function getBounceType(message: string, responseCode?: number): BounceType {
  const normalized = message.toLowerCase();

  if (HARD_BOUNCE_MARKERS.some((marker) => normalized.includes(marker))) {
    return "hard";
  }
  if (responseCode !== undefined ? responseCode >= 500 && responseCode < 600 : HARD_SMTP_CODE.test(normalized)) {
    return "hard";
  }
  return "soft";
}

/** Bounce type for a transport failure, or undefined when it does not look like a bounce. */
export function classifyTransportFailure(message: string, responseCode?: number): BounceType | undefined {
  if (!isBounceError(message)) {
    return undefined;
  }
  return getBounceType(message, responseCode);
}
