import { addDays, localDateString, normalizeHandle, parseCalendarDate } from "@replyledger/shared";
import type { TrackerClient } from "../apiClient.js";
import type { BotSettings } from "../config.js";
import { ApiError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Notice, Platform, ResourceOwner } from "../platform.js";
import type { OnboardingSession, OnboardingStore } from "../state.js";

export type Completion = {
  claimed_handle: string;
  target_per_day: number;
  start_date: string;
  end_date: string;
};

export type OnboardingOutcome =
  | { kind: "reprompt"; session: OnboardingSession; reply: Notice }
  | { kind: "advance"; session: OnboardingSession; reply: Notice }
  | { kind: "complete"; session: OnboardingSession; completion: Completion };

export type StepContext = { today: string; maxTarget: number; periodDays: number };

export const HANDLE_PROMPT: Notice = {
  title: "Welcome to reply tracking",
  body: "What is your X (Twitter) handle? Send it without the link, for example `myhandle` or `@myhandle`."
};

function targetPrompt(maxTarget: number): Notice {
  return { title: "Daily target", body: `How many replies will you post per day? Send a whole number from 1 to ${maxTarget}.` };
}

function datePrompt(today: string): Notice {
  return { title: "Start date", body: `When do you start? Send a date as YYYY-MM-DD, today (${today}) or later.` };
}

/**
 * One step of the onboarding conversation. Pure: the caller stores the returned session and
 * sends the reply. Invalid input keeps the step and re-prompts; nothing about earlier attempts
 * is remembered.
 */
export function advanceOnboarding(session: OnboardingSession, input: string, ctx: StepContext): OnboardingOutcome {
  const text = input.trim();
  switch (session.step) {
    case "awaiting_handle": {
      const handle = normalizeHandle(text);
      if (!handle) {
        return {
          kind: "reprompt",
          session,
          reply: { title: "That handle does not look right", body: "Use 1-15 letters, digits or underscores, for example `myhandle`.", tone: "warning" }
        };
      }
      return {
        kind: "advance",
        session: { ...session, step: "awaiting_target", collected: { ...session.collected, handle } },
        reply: targetPrompt(ctx.maxTarget)
      };
    }
    case "awaiting_target": {
      const n = /^\d{1,6}$/.test(text) ? Number(text) : NaN;
      if (!Number.isInteger(n) || n < 1 || n > ctx.maxTarget) {
        return {
          kind: "reprompt",
          session,
          reply: { ...targetPrompt(ctx.maxTarget), title: "Please send a number in range", tone: "warning" }
        };
      }
      return {
        kind: "advance",
        session: { ...session, step: "awaiting_start_date", collected: { ...session.collected, target_per_day: n } },
        reply: datePrompt(ctx.today)
      };
    }
    case "awaiting_start_date": {
      const date = parseCalendarDate(text);
      if (!date || date < ctx.today) {
        return {
          kind: "reprompt",
          session,
          reply: { ...datePrompt(ctx.today), title: date ? "That date is in the past" : "That is not a valid date", tone: "warning" }
        };
      }
      const { handle, target_per_day } = session.collected;
      // Unreachable through the steps above; restart rather than complete with gaps.
      if (!handle || !target_per_day) {
        return { kind: "reprompt", session: { ...session, step: "awaiting_handle", collected: {} }, reply: HANDLE_PROMPT };
      }
      return {
        kind: "complete",
        session,
        completion: { claimed_handle: handle, target_per_day, start_date: date, end_date: addDays(date, ctx.periodDays) }
      };
    }
    default: {
      const never: never = session.step;
      return never;
    }
  }
}

export type OnboardingDeps = {
  platform: Platform;
  tracker: TrackerClient;
  sessions: OnboardingStore;
  settings: BotSettings;
  logger: Logger;
  now?: () => Date;
};

async function tell(deps: OnboardingDeps, send: () => Promise<void>, evt: string, externalId: string) {
  try {
    await send();
  } catch (e) {
    deps.logger.warn({ evt, external_id: externalId, err: errorMessage(e) }, "notification failed");
  }
}

export type SetupResult =
  | { status: "started"; resource_ref: string }
  | { status: "already_tracked" }
  | { status: "in_progress" }
  | { status: "failed"; reason: string };

/**
 * Creates the member's private channel and opens an onboarding session in it.
 * Members who already have a period (active or paused) or an open session are left alone.
 */
export async function beginOnboarding(deps: OnboardingDeps, member: ResourceOwner): Promise<SetupResult> {
  const log = deps.logger.child({ external_id: member.external_id });
  if (deps.sessions.get(member.external_id)) return { status: "in_progress" };
  try {
    if (await deps.tracker.getPeriod(member.external_id)) return { status: "already_tracked" };
  } catch (e) {
    log.error({ evt: "setup_lookup_failed", err: errorMessage(e) }, "could not check for an existing period");
    return { status: "failed", reason: errorMessage(e) };
  }

  let resourceRef: string;
  try {
    resourceRef = await deps.platform.createPrivateResource(member, deps.settings.adminRoleName);
  } catch (e) {
    log.error({ evt: "resource_create_failed", err: errorMessage(e) }, "could not create tracking channel");
    await tell(
      deps,
      () =>
        deps.platform.sendAdminMessage({
          title: "Setup failed",
          body: `Could not create a tracking channel for ${member.display_name} (${member.external_id}): ${errorMessage(e)}`,
          tone: "error"
        }),
      "admin_notify_failed",
      member.external_id
    );
    return { status: "failed", reason: errorMessage(e) };
  }

  // Returning members already have an account row; new ones get the ref at completion.
  try {
    await deps.tracker.setResource(member.external_id, resourceRef);
  } catch (e) {
    if (!(e instanceof ApiError && e.code === "account_not_found")) {
      log.warn({ evt: "resource_ref_not_stored", resource_ref: resourceRef, err: errorMessage(e) }, "resource ref not stored yet");
    }
  }

  deps.sessions.start({ external_id: member.external_id, display_name: member.display_name, resource_ref: resourceRef });
  log.info({ evt: "onboarding_started", resource_ref: resourceRef }, "onboarding started");
  await tell(deps, () => deps.platform.sendMessage(resourceRef, HANDLE_PROMPT), "onboarding_prompt_failed", member.external_id);
  return { status: "started", resource_ref: resourceRef };
}

/** Feeds one message from the session's own channel into the state machine. */
export async function handleOnboardingInput(deps: OnboardingDeps, session: OnboardingSession, text: string): Promise<OnboardingOutcome> {
  const now = deps.now ?? (() => new Date());
  const ctx: StepContext = {
    today: localDateString(now(), deps.settings.timeZone),
    maxTarget: deps.settings.maxDailyTarget,
    periodDays: deps.settings.periodDays
  };
  const outcome = advanceOnboarding(session, text, ctx);
  const ref = session.resource_ref;

  if (outcome.kind !== "complete") {
    const reply = outcome.reply;
    deps.sessions.save(outcome.session);
    await tell(deps, () => deps.platform.sendMessage(ref, reply), "onboarding_prompt_failed", session.external_id);
    return outcome;
  }

  // Completion is attempted once; a failure leaves the member without a period until re-triggered.
  deps.sessions.delete(session.external_id);
  const c = outcome.completion;
  try {
    const res = await deps.tracker.completeOnboarding({
      external_id: session.external_id,
      display_name: session.display_name,
      claimed_handle: c.claimed_handle,
      target_per_day: c.target_per_day,
      start_date: c.start_date,
      resource_ref: ref
    });
    const p = res.entry.period;
    deps.logger.info({ evt: "onboarding_completed", external_id: session.external_id, period_id: p.id }, "onboarding completed");
    await tell(
      deps,
      () =>
        deps.platform.sendMessage(ref, {
          title: "You're all set",
          tone: "success",
          body: "Post links to your replies in this channel. Only links to your own posts count.",
          fields: [
            { name: "Handle", value: `@${res.entry.account.claimed_handle}`, inline: true },
            { name: "Daily target", value: String(p.target_per_day), inline: true },
            { name: "Period", value: `${p.start_date} to ${p.end_date}` }
          ]
        }),
      "onboarding_confirm_failed",
      session.external_id
    );
  } catch (e) {
    const reason = e instanceof ApiError ? `${e.code}: ${e.message}` : errorMessage(e);
    deps.logger.error({ evt: "onboarding_failed", external_id: session.external_id, err: reason }, "onboarding completion failed");
    await tell(
      deps,
      () =>
        deps.platform.sendMessage(ref, {
          title: "Setup failed",
          body: "Something went wrong while saving your details. An admin has been notified and will restart your setup.",
          tone: "error"
        }),
      "onboarding_failure_notice_failed",
      session.external_id
    );
    await tell(
      deps,
      () =>
        deps.platform.sendAdminMessage({
          title: "Onboarding failed",
          body: `${session.display_name} (${session.external_id}) could not be set up: ${reason}. Use /setup_user to retry.`,
          tone: "error"
        }),
      "admin_notify_failed",
      session.external_id
    );
  }
  return outcome;
}
