import { TransportError } from "@core/errors/app-errors";
import { Sleeper } from "@core/utils/async";
import {
  MailTransport,
  OutboundMessage,
  SmtpServerConfig,
  TransportReceipt,
} from "@features/email/smtp/smtp.types";
import { GeoResolver } from "@features/tracking/geo.service";
import { GeoInfo } from "@features/tracking/tracking.types";

export function smtpServer(overrides: Partial<SmtpServerConfig> = {}): SmtpServerConfig {
  return {
    name: "primary",
    host: "smtp.test",
    port: 587,
    secure: false,
    priority: 1,
    enabled: true,
    ...overrides,
  };
}

export type TransportStep = "ok" | Error;

/**
 * Plays back `script` one step per send; once it is exhausted every send
 * succeeds. Records each call for assertions.
 */
export class ScriptedTransport implements MailTransport {
  readonly calls: Array<{ server: string; message: OutboundMessage }> = [];
  /** Runs before the step is applied, e.g. to inspect store state mid-send. */
  onSend?: (message: OutboundMessage) => void | Promise<void>;

  constructor(private readonly script: TransportStep[] = []) {}

  async send(server: SmtpServerConfig, message: OutboundMessage): Promise<TransportReceipt> {
    this.calls.push({ server: server.name, message });
    await this.onSend?.(message);

    const step = this.script.shift() ?? "ok";
    if (step instanceof Error) {
      throw step;
    }
    return { messageId: message.messageId, response: "250 OK", responseTimeMs: 120 };
  }
}

export function transportFailure(message: string, serverName = "primary"): TransportError {
  return new TransportError(message, serverName);
}

/** Transport whose sends never settle; exercises the per-attempt timeout. */
export class HangingTransport implements MailTransport {
  calls = 0;

  send(): Promise<TransportReceipt> {
    this.calls += 1;
    return new Promise<TransportReceipt>(() => undefined);
  }
}

export function recordingSleeper(): { sleep: Sleeper; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms, signal) => {
      signal?.throwIfAborted();
      delays.push(ms);
    },
  };
}

export class FixedGeoResolver implements GeoResolver {
  readonly lookups: string[] = [];

  constructor(private readonly result: GeoInfo | Error) {}

  async lookup(ip: string): Promise<GeoInfo> {
    this.lookups.push(ip);
    if (this.result instanceof Error) {
      throw this.result;
    }
    return { ...this.result };
  }
}

export const BERLIN_GEO: GeoInfo = {
  country: "Germany",
  countryCode: "DE",
  region: "Berlin",
  city: "Berlin",
  timezone: "Europe/Berlin",
  isp: "Example ISP",
  latitude: 52.52,
  longitude: 13.405,
};

/** Returns the queued values in order, then repeats the last one. */
export function sequenceRandom(values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)];
    index += 1;
    return value;
  };
}
