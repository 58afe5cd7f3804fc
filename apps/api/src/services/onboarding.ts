import { addDays, dateRange, localDateString, normalizeHandle, parseCalendarDate, type PeriodEntry } from "@replyledger/shared";
import type { TrackerSettings } from "../config.js";
import { ConflictError, ValidationError, asPersistenceError } from "../errors.js";
import { logger as baseLogger, type Logger } from "../logger.js";
import type { TrackerStore } from "../store/types.js";
import type { KeyedQueue } from "./keyedQueue.js";
import type { ReportSink } from "./reportSink.js";

export type OnboardingCompletion = {
  external_id: string;
  display_name: string;
  claimed_handle: string;
  target_per_day: number;
  start_date: string;
  resource_ref: string | null;
};

export type OnboardingResult = PeriodEntry & { report_ref: string | null };

/**
 * Terminal action of the onboarding flow: upserts the account, opens its tracking period and
 * creates the empty report. Runs in the per-account queue so two completions for the same
 * member cannot both open an active period.
 */
export function createOnboardingService(deps: {
  store: TrackerStore;
  reports: ReportSink;
  settings: TrackerSettings;
  accounts: KeyedQueue;
  now?: () => Date;
  logger?: Logger;
}) {
  const now = deps.now ?? (() => new Date());
  const log = deps.logger ?? baseLogger;

  function validate(input: OnboardingCompletion) {
    const handle = normalizeHandle(input.claimed_handle);
    if (!handle) throw new ValidationError("invalid_handle", "Handle must be 1-15 letters, digits or underscores");
    const target = input.target_per_day;
    if (!Number.isInteger(target) || target < 1 || target > deps.settings.maxDailyTarget) {
      throw new ValidationError("invalid_target", `Daily target must be a whole number from 1 to ${deps.settings.maxDailyTarget}`);
    }
    const start = parseCalendarDate(input.start_date);
    if (!start) throw new ValidationError("invalid_date", "Start date must be YYYY-MM-DD");
    const today = localDateString(now(), deps.settings.timeZone);
    if (start < today) throw new ValidationError("past_date", `Start date cannot be before ${today}`);
    return { handle, target, start };
  }

  return {
    async complete(input: OnboardingCompletion): Promise<OnboardingResult> {
      const { handle, target, start } = validate(input);
      const end = addDays(start, deps.settings.periodDays);

      const entry = await deps.accounts.run(input.external_id, async () => {
        try {
          const current = await deps.store.getActiveTrackingPeriod(input.external_id);
          if (current) throw new ConflictError("already_active", "This member already has an active tracking period");
          const account = await deps.store.upsertAccount({
            external_id: input.external_id,
            display_name: input.display_name,
            claimed_handle: handle,
            resource_ref: input.resource_ref
          });
          const period = await deps.store.createTrackingPeriod({
            account_id: account.id,
            target_per_day: target,
            start_date: start,
            end_date: end
          });
          return { account, period };
        } catch (e) {
          throw asPersistenceError(e, "Tracking period was not created");
        }
      });

      let reportRef: string | null = null;
      try {
        const ref = await deps.reports.generateEmptyTemplate(entry.period.id, target, dateRange(start, end));
        await deps.store.setReportRef(entry.period.id, ref);
        reportRef = ref;
      } catch (e) {
        log.warn({ evt: "report_template_failed", external_id: input.external_id, period_id: entry.period.id, err: e }, "report template not created");
      }

      log.info(
        { evt: "onboarding_completed", external_id: input.external_id, period_id: entry.period.id, target_per_day: target, start_date: start, end_date: end },
        "tracking period opened"
      );
      return { ...entry, period: { ...entry.period, report_ref: reportRef }, report_ref: reportRef };
    }
  };
}

export type OnboardingService = ReturnType<typeof createOnboardingService>;
