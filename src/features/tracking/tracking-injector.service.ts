import { createHash, randomBytes } from "crypto";
import { joinUrl } from "@core/utils/url";
import { LinkMapping, LinkMappingRepository } from "./tracking.types";

const SKIPPED_PREFIXES = ["mailto:", "tel:", "sms:", "#", "javascript:", "data:", "ftp:", "file:"];
// Quoted values, or an unquoted value running to whitespace or the tag end.
const HREF_PATTERN = /(\s)(href\s*=\s*)(?:(["'])(.*?)\3|([^\s"'>]+))/gi;

export interface InjectOptions {
  /** Alternative destinations keyed by the original URL. */
  linkVariants?: Record<string, string[]>;
}

export interface TrackingInjectorOptions {
  publicBaseUrl: string;
  linkTtlDays?: number;
  now?: () => Date;
}

/** 64 hex characters from the CSPRNG; the opaque token in pixel URLs. */
export function issueTrackingId(): string {
  return randomBytes(32).toString("hex");
}

export function issueLinkId(): string {
  return randomBytes(16).toString("hex");
}

export function shouldSkipTracking(url: string): boolean {
  const normalized = url.trim().toLowerCase();
  if (normalized.length === 0) return true;
  return SKIPPED_PREFIXES.some((prefix) => normalized.startsWith(prefix)) || normalized.includes("unsubscribe");
}

/**
 * Picks a variant from the tracking token so the same send always lands on
 * the same destination. Tags are "A", "B", ...
 */
export function selectVariant(trackingId: string, variants: readonly string[]): { url: string; tag: string } {
  const digest = createHash("md5").update(trackingId).digest("hex");
  const index = Number.parseInt(digest.slice(0, 8), 16) % variants.length;
  return { url: variants[index], tag: String.fromCharCode(65 + index) };
}

export function pixelHtml(pixelUrl: string): string {
  return `<img src="${pixelUrl}" width="1" height="1" style="display:none;border:0;outline:none;" alt="" />`;
}

export class TrackingInjector {
  private readonly now: () => Date;

  constructor(
    private readonly links: LinkMappingRepository,
    private readonly options: TrackingInjectorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  pixelUrl(trackingId: string): string {
    return joinUrl(this.options.publicBaseUrl, `/track/pixel/${trackingId}`);
  }

  clickUrl(linkId: string): string {
    return joinUrl(this.options.publicBaseUrl, `/track/click/${linkId}`);
  }

  async inject(html: string, trackingId: string, options: InjectOptions = {}): Promise<string> {
    const createdAt = this.now();
    const expiresAt = this.options.linkTtlDays
      ? new Date(createdAt.getTime() + this.options.linkTtlDays * 24 * 60 * 60 * 1000)
      : undefined;

    const mappings: LinkMapping[] = [];

    const rewritten = html.replace(
      HREF_PATTERN,
      (
        match: string,
        space: string,
        attribute: string,
        quote: string | undefined,
        quotedUrl: string | undefined,
        bareUrl: string | undefined,
      ) => {
        const url = quotedUrl ?? bareUrl ?? "";
        if (shouldSkipTracking(url)) {
          return match;
        }

        const originalUrl = url.trim().replace(/&amp;/g, "&");
        const variants = options.linkVariants?.[originalUrl];
        const variant = variants && variants.length > 0 ? selectVariant(trackingId, variants) : undefined;

        const linkId = issueLinkId();
        mappings.push({
          linkId,
          originalUrl: variant?.url ?? originalUrl,
          trackingId,
          position: mappings.length + 1,
          variant: variant?.tag,
          createdAt,
          expiresAt,
        });

        const delimiter = quote ?? '"';
        return `${space}${attribute}${delimiter}${this.clickUrl(linkId)}${delimiter}`;
      },
    );

    await this.links.createMany(mappings);
    return this.appendPixel(rewritten, trackingId);
  }

  private appendPixel(html: string, trackingId: string): string {
    const pixel = pixelHtml(this.pixelUrl(trackingId));
    const bodyClose = html.toLowerCase().lastIndexOf("</body>");
    if (bodyClose === -1) {
      return html + pixel;
    }
    return html.slice(0, bodyClose) + pixel + html.slice(bodyClose);
  }
}
