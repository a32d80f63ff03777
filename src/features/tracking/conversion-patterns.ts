import { ConversionType } from "./tracking.types";

export const CONVERSION_PATTERNS: ReadonlyArray<[ConversionType, readonly string[]]> = [
  ["purchase", ["purchase", "buy", "order", "checkout", "payment"]],
  ["signup", ["signup", "register", "join", "subscribe"]],
  ["download", ["download", "pdf", "ebook", "whitepaper"]],
  ["contact", ["contact", "demo", "consultation", "meeting"]],
];

/** First matching conversion type for a destination URL, checked in table order. */
export function matchConversionType(url: string): ConversionType | null {
  const normalized = url.toLowerCase();
  for (const [type, keywords] of CONVERSION_PATTERNS) {
    if (keywords.some((keyword) => normalized.includes(keyword))) {
      return type;
    }
  }
  return null;
}
