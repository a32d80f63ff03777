import schedule from "node-schedule";
import { logger } from "@config/logger";
import { CampaignService } from "@features/campaign/campaign.service";

export const RECONCILE_SCHEDULE = "0 * * * *";

export class SchedulerService {
  private jobs: schedule.Job[] = [];

  constructor(private readonly campaigns: Pick<CampaignService, "reconcileRecentlyActive">) {}

  initializeScheduledTasks(): void {
    this.jobs.push(
      schedule.scheduleJob("reconcile-campaign-counters", RECONCILE_SCHEDULE, () => this.reconcileCounters()),
    );
  }

  /** Exposed so the job body can be run outside the schedule. */
  async reconcileCounters(): Promise<void> {
    try {
      logger.info("Starting scheduled counter reconciliation");
      const reconciled = await this.campaigns.reconcileRecentlyActive();
      logger.info(`Completed scheduled counter reconciliation for ${reconciled} campaigns`);
    } catch (error) {
      logger.error("Error during counter reconciliation:", error);
    }
  }

  async shutdown(): Promise<void> {
    this.jobs.forEach((job) => job.cancel());
    this.jobs = [];
    await schedule.gracefulShutdown();
  }
}
