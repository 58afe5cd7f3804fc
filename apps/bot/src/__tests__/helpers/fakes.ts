import pino from "pino";
import type { PeriodEntry, PeriodStatus } from "@replyledger/shared";
import type { ApiFn, ApiResponse } from "../../apiClient.js";
import { DEFAULT_BOT_SETTINGS, type BotSettings } from "../../config.js";
import type { Attachment, MemberInfo, Outgoing, Platform, ResourceOwner } from "../../platform.js";

export const silentLogger = pino({ level: "silent" });

export const settings: BotSettings = { ...DEFAULT_BOT_SETTINGS, timeZone: "UTC" };

export class FakePlatform implements Platform {
  members = new Map<string, MemberInfo>();
  resources = new Set<string>();
  sent: Array<{ ref: string; message: Outgoing }> = [];
  admin: Outgoing[] = [];
  created: Array<{ owner: ResourceOwner; adminRole: string; ref: string }> = [];
  failCreateFor = new Set<string>();
  failSendTo = new Set<string>();
  private seq = 0;

  addMember(externalId: string, displayName: string, roles: string[] = [settings.trackingRoleName]) {
    this.members.set(externalId, { external_id: externalId, display_name: displayName, roles, bot: false });
  }

  async sendMessage(resourceRef: string, message: Outgoing, _files?: Attachment[]) {
    if (this.failSendTo.has(resourceRef) || !this.resources.has(resourceRef)) throw new Error(`cannot send to ${resourceRef}`);
    this.sent.push({ ref: resourceRef, message });
  }

  async sendAdminMessage(message: Outgoing) {
    this.admin.push(message);
  }

  async createPrivateResource(owner: ResourceOwner, adminRole: string) {
    if (this.failCreateFor.has(owner.external_id)) throw new Error("missing permissions");
    const ref = `chan-new-${++this.seq}`;
    this.resources.add(ref);
    this.created.push({ owner, adminRole, ref });
    return ref;
  }

  async deleteResource(resourceRef: string) {
    this.resources.delete(resourceRef);
  }

  async listMembers() {
    return [...this.members.values()];
  }

  async resourceExists(resourceRef: string) {
    return this.resources.has(resourceRef);
  }

  async isMember(externalId: string) {
    return this.members.has(externalId);
  }

  async getRoles(externalId: string) {
    return this.members.get(externalId)?.roles ?? [];
  }
}

export function titleOf(message: Outgoing | undefined): string | undefined {
  if (message === undefined) return undefined;
  return typeof message === "string" ? message : message.title;
}

type Handler = (body: unknown) => { status?: number; json: unknown };

/**
 * Stand-in for the HTTP transport: answers from a "METHOD /path" table and records every call.
 * Unknown routes answer 404 the way the API does.
 */
export function fakeApi(routes: Record<string, Handler>) {
  const calls: Array<{ method: string; path: string; body: unknown }> = [];
  const api: ApiFn = async (path, init) => {
    const method = init?.method ?? "GET";
    const body: unknown = init?.body ? JSON.parse(init.body) : undefined;
    calls.push({ method, path, body });
    const handler = routes[`${method} ${path}`];
    const res = handler
      ? handler(body)
      : { status: 404, json: { ok: false, error: "not_found", kind: "validation", message: `no route ${method} ${path}` } };
    const status = res.status ?? 200;
    const out: ApiResponse = { status, ok: status < 400, json: res.json, text: JSON.stringify(res.json) };
    return out;
  };
  return { api, calls };
}

export function errorBody(error: string, kind: string, message = error) {
  return { ok: false, error, kind, message };
}

export function periodEntry(opts: {
  external_id: string;
  display_name: string;
  handle?: string;
  resource_ref?: string | null;
  status?: PeriodStatus;
  target?: number;
}): PeriodEntry {
  return {
    account: {
      id: `acc-${opts.external_id}`,
      external_id: opts.external_id,
      display_name: opts.display_name,
      claimed_handle: opts.handle ?? opts.display_name.toLowerCase(),
      resource_ref: opts.resource_ref === undefined ? `chan-${opts.external_id}` : opts.resource_ref,
      created_at: "2026-05-01T00:00:00.000Z",
      updated_at: null
    },
    period: {
      id: `period-${opts.external_id}`,
      account_id: `acc-${opts.external_id}`,
      target_per_day: opts.target ?? 5,
      start_date: "2026-05-01",
      end_date: "2026-06-30",
      status: opts.status ?? "active",
      report_ref: null,
      created_at: "2026-05-01T00:00:00.000Z",
      updated_at: null
    }
  };
}
