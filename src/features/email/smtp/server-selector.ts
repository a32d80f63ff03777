import { NoServerAvailableError } from "@core/errors/app-errors";
import { SmtpServerConfig } from "./smtp.types";

export interface ServerSelector {
  next(pool: readonly SmtpServerConfig[]): SmtpServerConfig;
  recordOutcome(server: SmtpServerConfig, success: boolean, responseTimeMs?: number): void;
}

export interface ServerPerformance {
  name: string;
  priority: number;
  enabled: boolean;
  score: number;
  successRate: number;
  averageResponseTimeSeconds: number;
  load: number;
  successes: number;
  failures: number;
}

export interface ScoringOptions {
  /** Weight of the newest observation in the moving averages. */
  smoothing?: number;
  initialSuccessRate?: number;
  initialResponseTimeSeconds?: number;
}

interface ServerStats {
  successRate: number;
  averageResponseTimeSeconds: number;
  load: number;
  successes: number;
  failures: number;
}

/**
 * score = 100 + priority * 10 + successRate * 50 - avgResponseSeconds, floored
 * at 0. Success rate and response time are exponential moving averages kept
 * per server name for the lifetime of the process. Only successful sends
 * feed the response-time average.
 */
export class ScoringServerSelector implements ServerSelector {
  private readonly stats = new Map<string, ServerStats>();
  private readonly smoothing: number;
  private readonly initialSuccessRate: number;
  private readonly initialResponseTimeSeconds: number;

  constructor(options: ScoringOptions = {}) {
    this.smoothing = options.smoothing ?? 0.3;
    this.initialSuccessRate = options.initialSuccessRate ?? 0.95;
    this.initialResponseTimeSeconds = options.initialResponseTimeSeconds ?? 2.5;
  }

  next(pool: readonly SmtpServerConfig[]): SmtpServerConfig {
    let best: { server: SmtpServerConfig; score: number; load: number } | null = null;

    for (const server of pool) {
      if (!server.enabled) continue;

      const score = this.score(server);
      const load = this.statsFor(server.name).load;
      if (!best || score > best.score || (score === best.score && load < best.load)) {
        best = { server, score, load };
      }
    }

    if (!best) {
      throw new NoServerAvailableError();
    }

    this.statsFor(best.server.name).load++;
    return best.server;
  }

  recordOutcome(server: SmtpServerConfig, success: boolean, responseTimeMs?: number): void {
    const stats = this.statsFor(server.name);
    const alpha = this.smoothing;

    if (!success) {
      stats.failures++;
      stats.successRate = stats.successRate * (1 - alpha);
      // A failed attempt's duration is time-to-error, not a delivery latency.
      return;
    }

    stats.successes++;
    stats.successRate = stats.successRate + alpha * (1 - stats.successRate);

    if (responseTimeMs !== undefined && responseTimeMs >= 0) {
      const seconds = responseTimeMs / 1000;
      stats.averageResponseTimeSeconds =
        stats.averageResponseTimeSeconds + alpha * (seconds - stats.averageResponseTimeSeconds);
    }
  }

  score(server: SmtpServerConfig): number {
    const stats = this.statsFor(server.name);
    const raw =
      100 + server.priority * 10 + stats.successRate * 50 - stats.averageResponseTimeSeconds;
    return Math.max(0, raw);
  }

  performance(pool: readonly SmtpServerConfig[]): ServerPerformance[] {
    return pool.map((server) => {
      const stats = this.statsFor(server.name);
      return {
        name: server.name,
        priority: server.priority,
        enabled: server.enabled,
        score: round(this.score(server)),
        successRate: round(stats.successRate, 4),
        averageResponseTimeSeconds: round(stats.averageResponseTimeSeconds, 3),
        load: stats.load,
        successes: stats.successes,
        failures: stats.failures,
      };
    });
  }

  private statsFor(name: string): ServerStats {
    let stats = this.stats.get(name);
    if (!stats) {
      stats = {
        successRate: this.initialSuccessRate,
        averageResponseTimeSeconds: this.initialResponseTimeSeconds,
        load: 0,
        successes: 0,
        failures: 0,
      };
      this.stats.set(name, stats);
    }
    return stats;
  }
}

function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
