import { canTransition, statusLabel, type DbTrackingPeriod, type PeriodEntry, type PeriodStatus } from "@replyledger/shared";
import type { TrackerSettings } from "../config.js";
import { NotFoundError, ValidationError, asPersistenceError } from "../errors.js";
import { logger as baseLogger, type Logger } from "../logger.js";
import type { TrackerStore } from "../store/types.js";
import type { KeyedQueue } from "./keyedQueue.js";

export type StatusChange = {
  entry: PeriodEntry;
  previous: PeriodStatus;
  // Resource the caller should tear down, if any.
  resource_ref: string | null;
};

// Status actions on tracking periods. Every change goes through the transition table.
// Writes to a period take its slot in `writes`, the queue the quota ledger counts and inserts in.
export function createPeriodService(deps: {
  store: TrackerStore;
  settings: TrackerSettings;
  accounts: KeyedQueue;
  writes: KeyedQueue;
  logger?: Logger;
}) {
  const log = deps.logger ?? baseLogger;

  async function findOpen(externalId: string, statuses: readonly PeriodStatus[]): Promise<PeriodEntry> {
    for (const status of statuses) {
      const entry = await deps.store.getTrackingPeriodByStatus(externalId, status);
      if (entry) return entry;
    }
    const wanted = statuses.map((s) => statusLabel(s).toLowerCase()).join(" or ");
    throw new NotFoundError("no_period", `No ${wanted} tracking period for this member`);
  }

  async function move(externalId: string, from: readonly PeriodStatus[], to: PeriodStatus, opts: { clearResource?: boolean } = {}): Promise<StatusChange> {
    return deps.accounts.run(externalId, async () => {
      try {
        const entry = await findOpen(externalId, from);
        const previous = entry.period.status;
        if (!canTransition(previous, to)) {
          throw new ValidationError("invalid_transition", `Cannot move a ${statusLabel(previous).toLowerCase()} period to ${statusLabel(to).toLowerCase()}`);
        }
        const period: DbTrackingPeriod = await deps.writes.run(entry.period.id, () => deps.store.updateTrackingPeriodStatus(entry.period.id, to));
        const resourceRef = entry.account.resource_ref;
        if (opts.clearResource && resourceRef) await deps.store.setResourceRef(externalId, null);
        log.info({ evt: "period_status_changed", external_id: externalId, period_id: period.id, from: previous, to }, "period status changed");
        return {
          entry: { account: { ...entry.account, resource_ref: opts.clearResource ? null : resourceRef }, period },
          previous,
          resource_ref: resourceRef
        };
      } catch (e) {
        throw asPersistenceError(e, "Period status was not changed");
      }
    });
  }

  return {
    pause(externalId: string) {
      return move(externalId, ["active"], "paused");
    },

    resume(externalId: string) {
      return move(externalId, ["paused"], "active");
    },

    // Admin removal: the resource ref is cleared and handed back for deletion.
    remove(externalId: string) {
      return move(externalId, ["active", "paused"], "deleted", { clearResource: true });
    },

    markLeftServer(externalId: string) {
      return move(externalId, ["active", "paused"], "left_server", { clearResource: true });
    },

    async changeTarget(externalId: string, target: number): Promise<PeriodEntry> {
      if (!Number.isInteger(target) || target < 1 || target > deps.settings.maxDailyTarget) {
        throw new ValidationError("invalid_target", `Daily target must be a whole number from 1 to ${deps.settings.maxDailyTarget}`);
      }
      return deps.accounts.run(externalId, async () => {
        try {
          const entry = await findOpen(externalId, ["active", "paused"]);
          const period = await deps.writes.run(entry.period.id, () => deps.store.updateTrackingPeriodTarget(entry.period.id, target));
          log.info({ evt: "target_changed", external_id: externalId, period_id: period.id, from: entry.period.target_per_day, to: target }, "daily target changed");
          return { account: entry.account, period };
        } catch (e) {
          throw asPersistenceError(e, "Daily target was not changed");
        }
      });
    },

    async setResource(externalId: string, resourceRef: string | null): Promise<void> {
      try {
        await deps.store.setResourceRef(externalId, resourceRef);
      } catch (e) {
        throw asPersistenceError(e, "Resource ref was not stored");
      }
    }
  };
}

export type PeriodService = ReturnType<typeof createPeriodService>;
