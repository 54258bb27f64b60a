/**
 * Scheduling Policy - Business-hours aware sync cadence
 *
 * Every decision is derived from the injected clock and the configured
 * window alone, so uncoordinated triggers calling it at the same minute
 * reach the same answer.
 */

import { addMinutes, getLocalTimeParts, startOfMinute } from "../../utils/time.js";

import type { BusinessHoursConfig, ScheduleConfig } from "../../config.js";

export interface SchedulingConfig {
  businessHours: BusinessHoursConfig;
  schedule: ScheduleConfig;
}

export interface ScheduleSnapshot {
  enabled: boolean;
  timezone: string;
  businessHours: string;
  weekdaysOnly: boolean;
  businessHoursInterval: number;
  offHoursInterval: number;
  fullSyncTime: string;
  isBusinessHours: boolean;
  currentInterval: number;
  shouldSyncNow: boolean;
  nextSync: string;
}

export class SchedulingPolicy {
  private readonly config: BusinessHoursConfig;
  private readonly fullSyncTime: string;

  constructor(
    config: SchedulingConfig,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.config = config.businessHours;
    this.fullSyncTime = config.schedule.fullSyncTime;
  }

  /**
   * Always true when business hours are disabled. A window whose start is
   * not before its end never matches.
   */
  isBusinessHours(): boolean {
    if (!this.config.enabled) {
      return true;
    }

    const { hour, weekday } = this.local();
    if (this.config.weekdaysOnly && (weekday === 0 || weekday === 6)) {
      return false;
    }

    return hour >= this.config.startHour && hour < this.config.endHour;
  }

  /** Minutes between syncs right now */
  getSyncInterval(): number {
    return this.isBusinessHours()
      ? this.config.businessHoursInterval
      : this.config.offHoursInterval;
  }

  shouldSyncNow(): boolean {
    return this.local().minute % this.getSyncInterval() === 0;
  }

  /**
   * Start of the next minute on an interval boundary; the current minute
   * when it already is one. Boundaries restart at the top of every hour.
   */
  getNextSyncTime(): Date {
    const now = startOfMinute(this.clock());
    const { minute } = this.local();
    const interval = this.getSyncInterval();

    if (minute % interval === 0) {
      return now;
    }

    const next = Math.ceil(minute / interval) * interval;
    return addMinutes(now, Math.min(next, 60) - minute);
  }

  /**
   * True during the configured local full-sync minute
   */
  isFullSyncDue(): boolean {
    const { hour, minute } = this.local();
    const [fullHour, fullMinute] = this.fullSyncTime.split(":").map(Number);
    return hour === fullHour && minute === fullMinute;
  }

  describe(): string {
    if (!this.config.enabled) {
      return `Business hours disabled: syncing every ${String(this.config.businessHoursInterval)} minutes`;
    }
    const mode = this.isBusinessHours() ? "Business hours" : "Off hours";
    return `${mode}: syncing every ${String(this.getSyncInterval())} minutes (${this.config.timezone})`;
  }

  getConfiguration(): ScheduleSnapshot {
    return {
      enabled: this.config.enabled,
      timezone: this.config.timezone,
      businessHours: `${String(this.config.startHour)}:00 - ${String(this.config.endHour)}:00`,
      weekdaysOnly: this.config.weekdaysOnly,
      businessHoursInterval: this.config.businessHoursInterval,
      offHoursInterval: this.config.offHoursInterval,
      fullSyncTime: this.fullSyncTime,
      isBusinessHours: this.isBusinessHours(),
      currentInterval: this.getSyncInterval(),
      shouldSyncNow: this.shouldSyncNow(),
      nextSync: this.getNextSyncTime().toISOString(),
    };
  }

  private local() {
    return getLocalTimeParts(this.clock(), this.config.timezone);
  }
}
