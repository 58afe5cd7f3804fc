import type { PeriodStatus } from "./types.js";

const TRANSITIONS: Record<PeriodStatus, readonly PeriodStatus[]> = {
  active: ["paused", "deleted", "left_server"],
  paused: ["active", "deleted", "left_server"],
  deleted: [],
  left_server: []
};

export function canTransition(from: PeriodStatus, to: PeriodStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

// Only active periods accept submissions and receive reminders.
export function acceptsSubmissions(status: PeriodStatus): boolean {
  return status === "active";
}

export function statusLabel(status: PeriodStatus): string {
  switch (status) {
    case "active":
      return "Active";
    case "paused":
      return "Paused";
    case "deleted":
      return "Deleted";
    case "left_server":
      return "Left server";
    default: {
      const never: never = status;
      return never;
    }
  }
}
