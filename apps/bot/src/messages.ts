import {
  statusLabel,
  type Dashboard,
  type DuplicateScan,
  type PerformanceRow,
  type PeriodEntry,
  type PeriodProgress,
  type ReminderDue,
  type SubmitResult
} from "@replyledger/shared";
import type { Notice } from "./platform.js";

const PHASE_LABELS: Record<PeriodProgress["phase"], string> = {
  not_started: "Not started",
  active: "Active",
  completed: "Completed"
};

// Discord caps embed field values at 1024 characters.
function clip(lines: string[], max = 1000): string {
  let out = "";
  for (const line of lines) {
    if (out.length + line.length + 1 > max) return `${out}…`;
    out += (out ? "\n" : "") + line;
  }
  return out || "-";
}

/** Reply to a message in a tracking channel; null when the message deserves no answer. */
export function submitReply(result: SubmitResult, opts: { truncated: boolean; limit: number }): Notice | null {
  const note = opts.truncated ? `Only the first ${opts.limit} links of that message were read.` : undefined;
  const invalid = result.rejected.filter((r) => r.reason === "invalid_link").map((r) => r.link);
  const invalidField = invalid.length
    ? [{ name: `Not your posts (${invalid.length})`, value: clip(invalid) }]
    : [];

  switch (result.status) {
    case "no_links":
      return null;
    case "accepted": {
      const first = result.accepted[0]?.ordinal;
      const last = result.accepted[result.accepted.length - 1]?.ordinal;
      const range = first === last ? `#${first}` : `#${first} to #${last}`;
      return {
        title: `Recorded ${result.accepted.length} ${result.accepted.length === 1 ? "reply" : "replies"} (${range})`,
        tone: "success",
        ...(note ? { body: note } : {}),
        fields: [
          { name: "Today", value: `${result.day_count ?? 0} / ${result.target_per_day}`, inline: true },
          { name: "Remaining", value: String(result.remaining ?? 0), inline: true },
          ...invalidField
        ]
      };
    }
    case "quota_exceeded":
      return {
        title: "Not recorded: daily target would be exceeded",
        tone: "warning",
        body: [`None of these links were saved. You can still add ${result.remaining ?? 0} today.`, note].filter(Boolean).join("\n"),
        fields: [{ name: "Today", value: `${result.day_count ?? 0} / ${result.target_per_day}`, inline: true }, ...invalidField]
      };
    case "outside_period":
      return {
        title: result.boundary === "not_started" ? "Your tracking period has not started yet" : "Your tracking period has ended",
        tone: "warning",
        body: "Nothing was recorded."
      };
    case "period_inactive":
      return { title: "Tracking is paused", tone: "warning", body: "Nothing was recorded. Use /resume_tracking to continue." };
    case "no_valid_links":
      return {
        title: "No links to your own posts",
        tone: "warning",
        body: "Only links to replies posted from your registered handle are counted.",
        fields: invalidField
      };
    default: {
      const never: never = result.status;
      return never;
    }
  }
}

export function progressNotice(entry: PeriodEntry, progress: PeriodProgress, today: string): Notice {
  const p = entry.period;
  return {
    title: `Progress for @${entry.account.claimed_handle}`,
    tone: p.status === "active" ? "info" : "warning",
    fields: [
      { name: "Status", value: `${statusLabel(p.status)} (${PHASE_LABELS[progress.phase]})`, inline: true },
      { name: "Daily target", value: String(p.target_per_day), inline: true },
      { name: "Today", value: `${progress.today_count} / ${p.target_per_day} (${today})`, inline: true },
      { name: "Total", value: `${progress.total} / ${progress.expected} expected`, inline: true },
      { name: "Completion", value: `${progress.completion_pct}%`, inline: true },
      { name: "Active days", value: `${progress.active_days} of ${progress.elapsed_days} elapsed (${progress.total_days} total)`, inline: true },
      { name: "Period", value: `${p.start_date} to ${p.end_date}` }
    ]
  };
}

export function reminderNotice(due: ReminderDue): Notice {
  return {
    title: "Daily reminder",
    tone: "info",
    body: `You have ${due.day_count} of ${due.target_per_day} replies today. ${due.remaining} to go.`
  };
}

const rowLine = (r: PerformanceRow, i: number) =>
  `${i + 1}. ${r.display_name} (@${r.claimed_handle}): ${r.day_count}/${r.target_per_day} (${r.completion_pct}%)`;

export function dashboardNotice(d: Dashboard): Notice {
  const attention = d.needs_attention.map((r) => `${r.display_name} (@${r.claimed_handle}): 0/${r.target_per_day}`);
  if (d.needs_attention_more > 0) attention.push(`and ${d.needs_attention_more} more`);
  return {
    title: `Dashboard for ${d.day}`,
    tone: "info",
    fields: [
      { name: "Accounts", value: String(d.total_accounts), inline: true },
      { name: "Active periods", value: String(d.active_periods), inline: true },
      { name: "Active today", value: String(d.active_today), inline: true },
      { name: "Submissions today", value: String(d.submissions_today), inline: true },
      { name: "Average completion", value: d.avg_completion_pct === null ? "-" : `${d.avg_completion_pct}%`, inline: true },
      { name: "Top performers", value: clip(d.top.map(rowLine)) },
      { name: "Needs attention", value: clip(attention) }
    ]
  };
}

export function dailySummaryNotice(day: string, rows: PerformanceRow[]): Notice {
  return {
    title: `Daily summary for ${day}`,
    tone: "info",
    body: rows.length ? clip(rows.map(rowLine), 4000) : "No active periods today."
  };
}

export function duplicatesNotice(scan: DuplicateScan): Notice {
  const internal = scan.internal
    .filter((r) => r.duplicates.length > 0)
    .map((r) => `${r.display_name} (@${r.claimed_handle}): ${r.duplicates.length} repeated of ${r.total}`);
  const cross = scan.cross_account.map(
    (g) => `post ${g.post_id}: ${g.accounts.map((a) => `${a.display_name} x${a.submissions}`).join(", ")}`
  );
  return {
    title: "Duplicate scan",
    tone: internal.length || cross.length ? "warning" : "success",
    body: `Scanned ${scan.accounts_scanned} accounts. Shared posts across accounts are worth a look, not proof of cheating.`,
    fields: [
      { name: "Repeats within an account", value: clip(internal.length ? internal : ["none"]) },
      { name: "Same post, several accounts", value: clip(cross.length ? cross : ["none"]) }
    ]
  };
}

export function statusNotice(displayName: string, entry: PeriodEntry | null, present: boolean, channelLive: boolean | null): Notice {
  if (!entry) {
    return { title: `${displayName}: not tracked`, tone: "info", body: present ? "Member is on the server without a period." : "Member is not on the server." };
  }
  const p = entry.period;
  return {
    title: `${displayName}: ${statusLabel(p.status)}`,
    tone: present && channelLive !== false ? "info" : "warning",
    fields: [
      { name: "Handle", value: `@${entry.account.claimed_handle}`, inline: true },
      { name: "Target", value: String(p.target_per_day), inline: true },
      { name: "Period", value: `${p.start_date} to ${p.end_date}`, inline: true },
      { name: "On server", value: present ? "yes" : "no", inline: true },
      { name: "Channel", value: entry.account.resource_ref ? (channelLive ? `<#${entry.account.resource_ref}>` : "missing") : "none", inline: true }
    ]
  };
}
