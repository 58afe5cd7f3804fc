import { Events, type Client, type GuildMember, type PartialGuildMember } from "discord.js";
import { beginOnboarding, type OnboardingDeps } from "../flows/onboarding.js";
import { handleDeparture, type ReconcileDeps } from "../flows/reconcile.js";
import { errorMessage } from "../errors.js";

function hasRole(member: GuildMember | PartialGuildMember, name: string): boolean {
  return member.roles.cache.some((r) => r.name === name);
}

export function registerMemberHandlers(opts: {
  client: Client;
  onboarding: OnboardingDeps;
  reconcile: ReconcileDeps;
  trackingRoleName: string;
}) {
  const { client, onboarding, reconcile, trackingRoleName } = opts;
  const log = onboarding.logger;

  // A partial old member has no role cache; beginOnboarding skips anyone already tracked.
  client.on(Events.GuildMemberUpdate, async (oldMember, newMember) => {
    if (newMember.user.bot) return;
    if (!hasRole(newMember, trackingRoleName)) return;
    if (!oldMember.partial && hasRole(oldMember, trackingRoleName)) return;
    try {
      const res = await beginOnboarding(onboarding, { external_id: newMember.id, display_name: newMember.displayName });
      log.info({ evt: "role_granted", external_id: newMember.id, result: res.status }, "tracking role granted");
    } catch (e) {
      log.error({ evt: "role_setup_failed", external_id: newMember.id, err: errorMessage(e) }, "setup after role grant failed");
    }
  });

  client.on(Events.GuildMemberRemove, async (member) => {
    const session = onboarding.sessions.get(member.id);
    onboarding.sessions.delete(member.id);
    try {
      const closed = await handleDeparture(reconcile, member.id);
      if (closed) log.info({ evt: "member_removed", external_id: member.id }, "departure handled");
      // Left halfway through onboarding: nothing was stored, only the channel remains.
      if (!closed && session) await onboarding.platform.deleteResource(session.resource_ref);
    } catch (e) {
      log.error({ evt: "departure_failed", external_id: member.id, err: errorMessage(e) }, "departure handling failed");
    }
  });
}
