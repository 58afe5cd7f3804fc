import { getLocalParts, localDateString } from "@replyledger/shared";
import type { TrackerClient } from "./apiClient.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { reminderNotice } from "./messages.js";
import type { Platform } from "./platform.js";
import type { OnboardingStore } from "./state.js";

export const REMINDER_TICK_MS = 15 * 60 * 1000;
export const SESSION_SWEEP_MS = 60 * 1000;

export type ReminderTickResult = { status: "early" | "done_today" | "sent"; sent: number; failed: number };

/**
 * Sends the daily reminders once per tracker day, on the first tick at or after the reminder
 * hour. A tick that fails to fetch the list leaves the day open for the next one.
 */
export function createReminderTicker(deps: {
  tracker: TrackerClient;
  platform: Platform;
  timeZone: string;
  hour: number;
  logger: Logger;
  now?: () => Date;
}) {
  const now = deps.now ?? (() => new Date());
  let lastDay: string | null = null;

  return {
    async tick(): Promise<ReminderTickResult> {
      const at = now();
      const day = localDateString(at, deps.timeZone);
      if (lastDay === day) return { status: "done_today", sent: 0, failed: 0 };
      if (getLocalParts(at, deps.timeZone).hour < deps.hour) return { status: "early", sent: 0, failed: 0 };

      const { due } = await deps.tracker.remindersDue();
      lastDay = day;
      let sent = 0;
      let failed = 0;
      for (const d of due) {
        try {
          await deps.platform.sendMessage(d.resource_ref, reminderNotice(d));
          sent++;
        } catch (e) {
          failed++;
          deps.logger.warn({ evt: "reminder_failed", external_id: d.external_id, err: errorMessage(e) }, "reminder not delivered");
        }
      }
      deps.logger.info({ evt: "reminders_sent", day, sent, failed }, "daily reminders sent");
      return { status: "sent", sent, failed };
    }
  };
}

export function startSweeps(deps: {
  sessions: OnboardingStore;
  reminders: ReturnType<typeof createReminderTicker>;
  platform: Platform;
  logger: Logger;
}) {
  const log = deps.logger;
  let reminderRunning = false;

  const sessionTimer = setInterval(() => {
    for (const s of deps.sessions.sweep()) {
      log.info({ evt: "onboarding_expired", external_id: s.external_id, step: s.step }, "onboarding session expired");
      deps.platform
        .sendMessage(s.resource_ref, {
          title: "Setup timed out",
          tone: "warning",
          body: "Your setup was not finished in time. Ask an admin to restart it."
        })
        .catch((e: unknown) => log.warn({ evt: "expiry_notice_failed", external_id: s.external_id, err: errorMessage(e) }, "expiry notice failed"));
    }
  }, SESSION_SWEEP_MS);

  // Overlapping ticks are skipped, not queued.
  const reminderTimer = setInterval(() => {
    if (reminderRunning) return;
    reminderRunning = true;
    deps.reminders
      .tick()
      .catch((e: unknown) => log.error({ evt: "reminder_tick_failed", err: errorMessage(e) }, "reminder tick failed"))
      .finally(() => {
        reminderRunning = false;
      });
  }, REMINDER_TICK_MS);

  return {
    stop() {
      clearInterval(sessionTimer);
      clearInterval(reminderTimer);
    }
  };
}
