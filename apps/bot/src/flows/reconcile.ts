import type { PeriodEntry } from "@replyledger/shared";
import type { TrackerClient } from "../apiClient.js";
import { ApiError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Platform } from "../platform.js";

export type ReconcileDeps = {
  platform: Platform;
  tracker: TrackerClient;
  trackingRoleName: string;
  adminRoleName: string;
  logger: Logger;
};

export type ReconcileSummary = {
  checked: number;
  healthy: number;
  departed: number;
  recreated: number;
  attempted: number;
  skipped: number;
  failed: number;
};

type Outcome = "healthy" | "departed" | "recreated" | "skipped";

async function bestEffort(log: Logger, evt: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (e) {
    log.warn({ evt, err: errorMessage(e) }, "best-effort step failed");
  }
}

/**
 * Closes out a member who left the server: the period becomes left_server, the channel goes
 * away and admins get a short report. Returns false when there was no period to close.
 */
export async function handleDeparture(deps: ReconcileDeps, externalId: string): Promise<boolean> {
  const log = deps.logger.child({ external_id: externalId });
  const change = await deps.tracker.markLeftServer(externalId).catch((e: unknown) => {
    if (e instanceof ApiError && e.code === "no_period") return null;
    throw e;
  });
  if (!change) return false;
  const ref = change.resource_ref;
  if (ref) await bestEffort(log, "resource_delete_failed", () => deps.platform.deleteResource(ref));
  const { account, period } = change.entry;
  log.info({ evt: "member_departed", period_id: period.id, previous: change.previous }, "member left, period closed");
  await bestEffort(log, "departure_report_failed", () =>
    deps.platform.sendAdminMessage({
      title: "Member left the server",
      tone: "warning",
      fields: [
        { name: "Member", value: `${account.display_name} (${account.external_id})` },
        { name: "Handle", value: `@${account.claimed_handle}`, inline: true },
        { name: "Target", value: String(period.target_per_day), inline: true },
        { name: "Period", value: `${period.start_date} to ${period.end_date}` },
        { name: "Status before leaving", value: change.previous, inline: true }
      ]
    })
  );
  return true;
}

async function reconcileOne(deps: ReconcileDeps, entry: PeriodEntry, onAttempt: () => void): Promise<Outcome> {
  const { account } = entry;
  const log = deps.logger.child({ external_id: account.external_id });

  if (!(await deps.platform.isMember(account.external_id))) {
    await handleDeparture(deps, account.external_id);
    return "departed";
  }
  if (account.resource_ref && (await deps.platform.resourceExists(account.resource_ref))) return "healthy";

  const roles = await deps.platform.getRoles(account.external_id);
  if (!roles.includes(deps.trackingRoleName)) {
    log.info({ evt: "reconcile_skipped", reason: "role_missing" }, "channel missing but member no longer holds the role");
    return "skipped";
  }

  onAttempt();
  const ref = await deps.platform.createPrivateResource(
    { external_id: account.external_id, display_name: account.display_name },
    deps.adminRoleName
  );
  try {
    await deps.tracker.setResource(account.external_id, ref);
  } catch (e) {
    // An unrecorded channel would be recreated again on the next pass.
    await bestEffort(log, "orphan_delete_failed", () => deps.platform.deleteResource(ref));
    throw e;
  }
  log.info({ evt: "resource_recreated", previous: account.resource_ref, resource_ref: ref }, "tracking channel recreated");
  await bestEffort(log, "recreate_notice_failed", () =>
    deps.platform.sendMessage(ref, {
      title: "Your tracking channel was restored",
      body: "The previous channel was removed. Your period, target and every recorded reply are unchanged; keep posting links here.",
      tone: "info"
    })
  );
  return "recreated";
}

/**
 * Brings every active period with a channel back in line with the server: departed members are
 * closed out and missing channels recreated. Accounts are handled one at a time and a failure on
 * one never stops the rest.
 */
export async function reconcile(deps: ReconcileDeps): Promise<ReconcileSummary> {
  const entries = await deps.tracker.listPeriods("active", { withResource: true });
  const summary: ReconcileSummary = { checked: 0, healthy: 0, departed: 0, recreated: 0, attempted: 0, skipped: 0, failed: 0 };

  for (const entry of entries) {
    summary.checked++;
    try {
      const outcome = await reconcileOne(deps, entry, () => {
        summary.attempted++;
      });
      summary[outcome]++;
    } catch (e) {
      summary.failed++;
      deps.logger.error({ evt: "reconcile_failed", external_id: entry.account.external_id, err: errorMessage(e) }, "reconcile step failed");
    }
  }

  deps.logger.info({ evt: "reconcile_done", ...summary }, "reconcile finished");
  if (summary.departed + summary.attempted + summary.skipped + summary.failed > 0) {
    await bestEffort(deps.logger, "reconcile_report_failed", () =>
      deps.platform.sendAdminMessage({
        title: "Channel check finished",
        tone: summary.failed > 0 ? "warning" : "info",
        fields: [
          { name: "Recreated", value: `${summary.recreated} / ${summary.attempted}`, inline: true },
          { name: "Departed", value: String(summary.departed), inline: true },
          { name: "Skipped", value: String(summary.skipped), inline: true },
          { name: "Failed", value: String(summary.failed), inline: true },
          { name: "Checked", value: String(summary.checked), inline: true }
        ]
      })
    );
  }
  return summary;
}
