import {
  AttachmentBuilder,
  ChannelType,
  DiscordAPIError,
  EmbedBuilder,
  PermissionFlagsBits,
  RESTJSONErrorCodes,
  type CategoryChannel,
  type Client,
  type Guild,
  type OverwriteResolvable,
  type TextChannel
} from "discord.js";
import { PlatformError } from "./errors.js";

export type Tone = "info" | "success" | "warning" | "error";

// Structured message; the adapter decides how it looks (an embed on Discord).
export type Notice = {
  title: string;
  body?: string;
  tone?: Tone;
  fields?: Array<{ name: string; value: string; inline?: boolean }>;
};

export type Outgoing = string | Notice;
export type Attachment = { name: string; data: Buffer };

export type MemberInfo = {
  external_id: string;
  display_name: string;
  roles: string[];
  bot: boolean;
};

export type ResourceOwner = { external_id: string; display_name: string };

/** What the flows need from the chat platform. Every call is fallible I/O without retries. */
export interface Platform {
  sendMessage(resourceRef: string, message: Outgoing, files?: Attachment[]): Promise<void>;
  sendAdminMessage(message: Outgoing, files?: Attachment[]): Promise<void>;
  createPrivateResource(owner: ResourceOwner, adminRole: string): Promise<string>;
  deleteResource(resourceRef: string): Promise<void>;
  listMembers(): Promise<MemberInfo[]>;
  resourceExists(resourceRef: string): Promise<boolean>;
  isMember(externalId: string): Promise<boolean>;
  getRoles(externalId: string): Promise<string[]>;
}

const TONE_COLORS: Record<Tone, number> = {
  info: 0x3498db,
  success: 0x2ecc71,
  warning: 0xf1c40f,
  error: 0xe74c3c
};

export function resourceName(displayName: string, externalId: string): string {
  const slug = displayName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 80);
  return `tracking-${slug || externalId}`;
}

export function renderMessage(message: Outgoing, files: Attachment[] = []) {
  const attachments = files.map((f) => new AttachmentBuilder(f.data, { name: f.name }));
  if (typeof message === "string") return { content: message, files: attachments };
  const embed = new EmbedBuilder().setTitle(message.title).setColor(TONE_COLORS[message.tone ?? "info"]);
  if (message.body) embed.setDescription(message.body);
  if (message.fields?.length) embed.addFields(message.fields.map((f) => ({ name: f.name, value: f.value, inline: f.inline ?? false })));
  return { embeds: [embed], files: attachments };
}

function isApiError(e: unknown, code: RESTJSONErrorCodes): boolean {
  return e instanceof DiscordAPIError && e.code === code;
}

const MEMBER_ACCESS = [
  PermissionFlagsBits.ViewChannel,
  PermissionFlagsBits.SendMessages,
  PermissionFlagsBits.ReadMessageHistory,
  PermissionFlagsBits.AttachFiles,
  PermissionFlagsBits.EmbedLinks
];

export type DiscordPlatformOptions = {
  guildId?: string | undefined;
  trackingCategoryName: string;
  adminCategoryName: string;
  adminChannelName: string;
  adminRoleName: string;
};

export type DiscordPlatform = Platform & {
  guild(): Promise<Guild>;
};

export function createDiscordPlatform(client: Client, opts: DiscordPlatformOptions): DiscordPlatform {
  async function guild(): Promise<Guild> {
    if (opts.guildId) return client.guilds.fetch(opts.guildId);
    const first = client.guilds.cache.first();
    if (!first) throw new PlatformError("no_guild", "The bot is not in any server");
    return first;
  }

  async function ensureCategory(g: Guild, name: string, overwrites?: OverwriteResolvable[]): Promise<CategoryChannel> {
    const existing = g.channels.cache.find((c): c is CategoryChannel => c.type === ChannelType.GuildCategory && c.name === name);
    if (existing) return existing;
    return g.channels.create({ name, type: ChannelType.GuildCategory, ...(overwrites ? { permissionOverwrites: overwrites } : {}) });
  }

  function privateOverwrites(g: Guild, adminRole: string, ownerId?: string): OverwriteResolvable[] {
    const overwrites: OverwriteResolvable[] = [{ id: g.roles.everyone.id, deny: [PermissionFlagsBits.ViewChannel] }];
    if (ownerId) overwrites.push({ id: ownerId, allow: MEMBER_ACCESS });
    const role = g.roles.cache.find((r) => r.name === adminRole);
    if (role) overwrites.push({ id: role.id, allow: MEMBER_ACCESS });
    const me = g.members.me;
    if (me) overwrites.push({ id: me.id, allow: [...MEMBER_ACCESS, PermissionFlagsBits.ManageChannels] });
    return overwrites;
  }

  async function adminChannel(): Promise<TextChannel> {
    const g = await guild();
    const existing = g.channels.cache.find((c): c is TextChannel => c.type === ChannelType.GuildText && c.name === opts.adminChannelName);
    if (existing) return existing;
    const overwrites = privateOverwrites(g, opts.adminRoleName);
    const category = await ensureCategory(g, opts.adminCategoryName, overwrites);
    return g.channels.create({ name: opts.adminChannelName, type: ChannelType.GuildText, parent: category.id, permissionOverwrites: overwrites });
  }

  async function fetchChannel(ref: string) {
    try {
      return await client.channels.fetch(ref);
    } catch (e) {
      if (isApiError(e, RESTJSONErrorCodes.UnknownChannel)) return null;
      throw e;
    }
  }

  return {
    guild,

    async sendMessage(resourceRef, message, files) {
      const channel = await fetchChannel(resourceRef);
      if (!channel || !channel.isSendable()) throw new PlatformError("resource_missing", `Channel ${resourceRef} cannot receive messages`);
      await channel.send(renderMessage(message, files));
    },

    async sendAdminMessage(message, files) {
      const channel = await adminChannel();
      await channel.send(renderMessage(message, files));
    },

    async createPrivateResource(owner, adminRole) {
      const g = await guild();
      const category = await ensureCategory(g, opts.trackingCategoryName);
      const channel = await g.channels.create({
        name: resourceName(owner.display_name, owner.external_id),
        type: ChannelType.GuildText,
        parent: category.id,
        topic: `Reply tracking for ${owner.display_name}`,
        permissionOverwrites: privateOverwrites(g, adminRole, owner.external_id)
      });
      return channel.id;
    },

    async deleteResource(resourceRef) {
      const channel = await fetchChannel(resourceRef);
      if (!channel || channel.isDMBased()) return;
      await channel.delete("Reply tracking ended");
    },

    async listMembers() {
      const g = await guild();
      const members = await g.members.fetch();
      return members.map((m) => ({
        external_id: m.id,
        display_name: m.displayName,
        roles: m.roles.cache.map((r) => r.name),
        bot: m.user.bot
      }));
    },

    async resourceExists(resourceRef) {
      return (await fetchChannel(resourceRef)) !== null;
    },

    async isMember(externalId) {
      const g = await guild();
      try {
        await g.members.fetch(externalId);
        return true;
      } catch (e) {
        if (isApiError(e, RESTJSONErrorCodes.UnknownMember) || isApiError(e, RESTJSONErrorCodes.UnknownUser)) return false;
        throw e;
      }
    },

    async getRoles(externalId) {
      const g = await guild();
      const member = await g.members.fetch(externalId);
      return member.roles.cache.map((r) => r.name);
    }
  };
}
