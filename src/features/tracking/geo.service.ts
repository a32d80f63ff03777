import axios, { AxiosInstance } from "axios";
import { isIP } from "net";
import { z } from "zod";
import { logger } from "@config/logger";
import { GeoInfo, UNKNOWN } from "./tracking.types";

export interface GeoResolver {
  lookup(ip: string): Promise<GeoInfo>;
}

export const UNKNOWN_GEO: Readonly<GeoInfo> = Object.freeze({
  country: UNKNOWN,
  countryCode: UNKNOWN,
  region: UNKNOWN,
  city: UNKNOWN,
  timezone: UNKNOWN,
  isp: UNKNOWN,
});

const PRIVATE_RANGES = [
  /^10\./,
  /^127\./,
  /^0\./,
  /^169\.254\./,
  /^192\.168\./,
  /^172\.(1[6-9]|2\d|3[01])\./,
  /^::1$/,
  /^::$/,
  /^f[cd][0-9a-f]{2}:/i,
  /^fe80:/i,
];

export function isPublicIp(ip: string): boolean {
  return isIP(ip) !== 0 && !PRIVATE_RANGES.some((range) => range.test(ip));
}

const ipApiResponseSchema = z.object({
  status: z.string(),
  country: z.string().optional(),
  countryCode: z.string().optional(),
  regionName: z.string().optional(),
  city: z.string().optional(),
  timezone: z.string().optional(),
  isp: z.string().optional(),
  lat: z.number().optional(),
  lon: z.number().optional(),
});

export interface IpApiGeoResolverOptions {
  /** `{ip}` is replaced with the address. */
  urlTemplate: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

export class IpApiGeoResolver implements GeoResolver {
  private readonly http: AxiosInstance;

  constructor(private readonly options: IpApiGeoResolverOptions) {
    this.http = options.http ?? axios.create();
  }

  async lookup(ip: string): Promise<GeoInfo> {
    if (!isPublicIp(ip)) {
      return { ...UNKNOWN_GEO };
    }

    try {
      const url = this.options.urlTemplate.replace("{ip}", encodeURIComponent(ip));
      const { data } = await this.http.get<unknown>(url, { timeout: this.options.timeoutMs });
      const parsed = ipApiResponseSchema.safeParse(data);

      if (!parsed.success || parsed.data.status !== "success") {
        logger.debug(`Geo lookup returned no data for ${ip}`);
        return { ...UNKNOWN_GEO };
      }

      const geo = parsed.data;
      return {
        country: geo.country || UNKNOWN,
        countryCode: geo.countryCode || UNKNOWN,
        region: geo.regionName || UNKNOWN,
        city: geo.city || UNKNOWN,
        timezone: geo.timezone || UNKNOWN,
        isp: geo.isp || UNKNOWN,
        latitude: geo.lat,
        longitude: geo.lon,
      };
    } catch (error) {
      logger.warn(`Geo lookup failed for ${ip}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return { ...UNKNOWN_GEO };
    }
  }
}
