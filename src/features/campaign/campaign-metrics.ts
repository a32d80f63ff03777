export const COUNTER_FIELDS = [
  "emailsSent",
  "emailsFailed",
  "emailsOpened",
  "uniqueOpens",
  "clicks",
  "uniqueClicks",
  "conversions",
  "bounces",
] as const;

export type CounterField = (typeof COUNTER_FIELDS)[number];
export type CampaignCounters = Record<CounterField, number>;
export type CounterDelta = Partial<CampaignCounters>;

/** Each rate is numerator / denominator as a percentage. */
export const RATE_DEFINITIONS = {
  openRate: ["emailsOpened", "emailsSent"],
  uniqueOpenRate: ["uniqueOpens", "emailsSent"],
  clickRate: ["clicks", "emailsSent"],
  clickToOpenRate: ["clicks", "uniqueOpens"],
  conversionRate: ["conversions", "emailsSent"],
  bounceRate: ["bounces", "emailsSent"],
} as const satisfies Record<string, readonly [CounterField, CounterField]>;

export type RateField = keyof typeof RATE_DEFINITIONS;
export type CampaignRates = Record<RateField, number>;

export interface CampaignMetrics extends CampaignCounters, CampaignRates {}

export const METRICS_PATH = "metrics";

export function emptyCounters(): CampaignCounters {
  return {
    emailsSent: 0,
    emailsFailed: 0,
    emailsOpened: 0,
    uniqueOpens: 0,
    clicks: 0,
    uniqueClicks: 0,
    conversions: 0,
    bounces: 0,
  };
}

/** Percentage rounded to two decimals; 0 when the denominator is 0. */
export function ratePercent(numerator: number, denominator: number): number {
  if (denominator <= 0) return 0;
  return Math.round((numerator / denominator) * 10000) / 100;
}

export function computeRates(counters: CampaignCounters): CampaignRates {
  const rate = (field: RateField): number => {
    const [numerator, denominator] = RATE_DEFINITIONS[field];
    return ratePercent(counters[numerator], counters[denominator]);
  };

  return {
    openRate: rate("openRate"),
    uniqueOpenRate: rate("uniqueOpenRate"),
    clickRate: rate("clickRate"),
    clickToOpenRate: rate("clickToOpenRate"),
    conversionRate: rate("conversionRate"),
    bounceRate: rate("bounceRate"),
  };
}

export function applyDelta(counters: CampaignCounters, delta: CounterDelta): CampaignCounters {
  const next = { ...counters };
  for (const field of COUNTER_FIELDS) {
    next[field] += delta[field] ?? 0;
  }
  return next;
}

const counterPath = (field: CounterField) => `$${METRICS_PATH}.${field}`;

function rateExpression(numerator: CounterField, denominator: CounterField) {
  return {
    $cond: [
      { $gt: [counterPath(denominator), 0] },
      {
        $divide: [
          { $round: [{ $multiply: [{ $divide: [counterPath(numerator), counterPath(denominator)] }, 10000] }, 0] },
          100,
        ],
      },
      0,
    ],
  };
}

/**
 * Two-stage update pipeline: bump the counters, then recompute every rate
 * from the bumped values. Runs as one single-document write.
 */
export function buildMetricsUpdatePipeline(delta: CounterDelta): Array<{ $set: Record<string, unknown> }> {
  const counterStage: Record<string, unknown> = {};
  for (const field of COUNTER_FIELDS) {
    const increment = delta[field] ?? 0;
    counterStage[`${METRICS_PATH}.${field}`] = {
      $add: [{ $ifNull: [counterPath(field), 0] }, increment],
    };
  }

  return [{ $set: counterStage }, { $set: buildRateStage() }];
}

/** Pipeline that overwrites the counters (reconciliation) and recomputes rates. */
export function buildMetricsResetPipeline(counters: CampaignCounters): Array<{ $set: Record<string, unknown> }> {
  const counterStage: Record<string, unknown> = {};
  for (const field of COUNTER_FIELDS) {
    counterStage[`${METRICS_PATH}.${field}`] = { $literal: counters[field] };
  }
  return [{ $set: counterStage }, { $set: buildRateStage() }];
}

function buildRateStage(): Record<string, unknown> {
  const stage: Record<string, unknown> = {};
  for (const [rate, [numerator, denominator]] of Object.entries(RATE_DEFINITIONS)) {
    stage[`${METRICS_PATH}.${rate}`] = rateExpression(numerator, denominator);
  }
  return stage;
}
