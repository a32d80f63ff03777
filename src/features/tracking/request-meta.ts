import { Request } from "express";
import { isIP } from "net";
import { RequestMeta, UNKNOWN } from "./tracking.types";

const IP_HEADERS = ["cf-connecting-ip", "x-client-ip", "x-forwarded-for"];

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  return raw?.split(",")[0]?.trim();
}

function normalizeIp(ip: string): string {
  return ip.startsWith("::ffff:") ? ip.slice(7) : ip;
}

export function clientIp(req: Pick<Request, "headers" | "socket">): string {
  for (const header of IP_HEADERS) {
    const candidate = firstHeaderValue(req.headers[header]);
    if (candidate && isIP(normalizeIp(candidate)) !== 0) {
      return normalizeIp(candidate);
    }
  }
  const remote = req.socket.remoteAddress;
  return remote ? normalizeIp(remote) : UNKNOWN;
}

export function extractRequestMeta(req: Pick<Request, "headers" | "socket">): RequestMeta {
  return {
    ip: clientIp(req),
    userAgent: firstUserAgent(req.headers["user-agent"]),
    referer: req.headers.referer,
  };
}

function firstUserAgent(value: string | undefined): string {
  return value?.slice(0, 1024) ?? "";
}
