// Onboarding sessions live in bot memory only. Restarting the bot drops them; the member is
// set up again by an admin (/setup_user) or by losing and regaining the tracking role.

export type OnboardingStep = "awaiting_handle" | "awaiting_target" | "awaiting_start_date";

export type OnboardingSession = {
  external_id: string;
  display_name: string;
  resource_ref: string;
  step: OnboardingStep;
  collected: { handle?: string; target_per_day?: number };
  created_at: number;
};

export type OnboardingStore = ReturnType<typeof createOnboardingStore>;

export function createOnboardingStore(opts: { ttlMs: number; now?: () => number }) {
  const now = opts.now ?? Date.now;
  const sessions = new Map<string, OnboardingSession>();

  return {
    get(externalId: string): OnboardingSession | undefined {
      return sessions.get(externalId);
    },

    start(init: { external_id: string; display_name: string; resource_ref: string }): OnboardingSession {
      const session: OnboardingSession = { ...init, step: "awaiting_handle", collected: {}, created_at: now() };
      sessions.set(init.external_id, session);
      return session;
    },

    // Replaces the stored session; the TTL still counts from when onboarding started.
    save(session: OnboardingSession): void {
      sessions.set(session.external_id, session);
    },

    delete(externalId: string): boolean {
      return sessions.delete(externalId);
    },

    /** Drops sessions older than the TTL and returns them. */
    sweep(): OnboardingSession[] {
      const cutoff = now() - opts.ttlMs;
      const expired: OnboardingSession[] = [];
      for (const s of sessions.values()) {
        if (s.created_at < cutoff) expired.push(s);
      }
      for (const s of expired) sessions.delete(s.external_id);
      return expired;
    },

    size(): number {
      return sessions.size;
    }
  };
}
