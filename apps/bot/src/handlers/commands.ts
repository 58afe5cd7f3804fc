import {
  Collection,
  Events,
  MessageFlags,
  PermissionFlagsBits,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type Client,
  type Guild,
  type RESTPostAPIChatInputApplicationCommandsJSONBody
} from "discord.js";
import { beginOnboarding, type OnboardingDeps, type SetupResult } from "../flows/onboarding.js";
import { reconcile, type ReconcileDeps } from "../flows/reconcile.js";
import { ApiError, errorMessage } from "../errors.js";
import {
  dailySummaryNotice,
  dashboardNotice,
  duplicatesNotice,
  progressNotice,
  statusNotice
} from "../messages.js";
import { renderMessage, type Attachment, type Outgoing } from "../platform.js";

export type CommandDeps = { onboarding: OnboardingDeps; reconcile: ReconcileDeps };

type Reply = { message: Outgoing; files?: Attachment[] };

type Command = {
  data: { name: string; toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody };
  admin: boolean;
  execute(interaction: ChatInputCommandInteraction, deps: CommandDeps): Promise<Reply>;
};

async function memberName(interaction: ChatInputCommandInteraction, userId: string, fallback: string): Promise<string> {
  const member = await interaction.guild?.members.fetch(userId).catch(() => null);
  return member?.displayName ?? fallback;
}

const USER_COMMANDS: Command[] = [
  {
    data: new SlashCommandBuilder().setName("progress").setDescription("Show your reply tracking progress"),
    admin: false,
    async execute(interaction, { onboarding }) {
      const res = await onboarding.tracker.progress(interaction.user.id);
      return { message: progressNotice(res.entry, res.progress, res.today) };
    }
  },
  {
    data: new SlashCommandBuilder()
      .setName("change_target")
      .setDescription("Change your daily reply target")
      .addIntegerOption((o) => o.setName("target").setDescription("Replies per day").setRequired(true).setMinValue(1).setMaxValue(500)),
    admin: false,
    async execute(interaction, { onboarding }) {
      const entry = await onboarding.tracker.changeTarget(interaction.user.id, interaction.options.getInteger("target", true));
      return { message: { title: "Daily target updated", tone: "success", body: `Your new target is ${entry.period.target_per_day} replies per day.` } };
    }
  },
  {
    data: new SlashCommandBuilder().setName("pause_tracking").setDescription("Pause your tracking period"),
    admin: false,
    async execute(interaction, { onboarding }) {
      await onboarding.tracker.pause(interaction.user.id);
      return { message: { title: "Tracking paused", tone: "info", body: "Links are not counted until you use /resume_tracking." } };
    }
  },
  {
    data: new SlashCommandBuilder().setName("resume_tracking").setDescription("Resume your paused tracking period"),
    admin: false,
    async execute(interaction, { onboarding }) {
      await onboarding.tracker.resume(interaction.user.id);
      return { message: { title: "Tracking resumed", tone: "success", body: "Post your reply links in your tracking channel." } };
    }
  }
];

const ADMIN_COMMANDS: Command[] = [
  {
    data: new SlashCommandBuilder().setName("dashboard").setDescription("Today's tracking overview"),
    admin: true,
    async execute(_interaction, { onboarding }) {
      return { message: dashboardNotice(await onboarding.tracker.dashboard()) };
    }
  },
  {
    data: new SlashCommandBuilder()
      .setName("daily_summary")
      .setDescription("Per-member counts for one day")
      .addStringOption((o) => o.setName("date").setDescription("YYYY-MM-DD, defaults to today")),
    admin: true,
    async execute(interaction, { onboarding }) {
      const date = interaction.options.getString("date")?.trim() || undefined;
      const res = await onboarding.tracker.dailySummary(date);
      return { message: dailySummaryNotice(res.day, res.rows) };
    }
  },
  {
    data: new SlashCommandBuilder()
      .setName("scan_duplicates")
      .setDescription("Find links submitted more than once")
      .addUserOption((o) => o.setName("member").setDescription("Limit the scan to one member")),
    admin: true,
    async execute(interaction, { onboarding }) {
      const user = interaction.options.getUser("member");
      return { message: duplicatesNotice(await onboarding.tracker.scanDuplicates(user ? [user.id] : undefined)) };
    }
  },
  {
    data: new SlashCommandBuilder().setName("restore_channels").setDescription("Recreate missing tracking channels and close out departed members"),
    admin: true,
    async execute(_interaction, deps) {
      const s = await reconcile(deps.reconcile);
      return {
        message: {
          title: "Channel check finished",
          tone: s.failed > 0 ? "warning" : "success",
          body: `Checked ${s.checked}: ${s.healthy} healthy, ${s.recreated}/${s.attempted} recreated, ${s.departed} departed, ${s.skipped} skipped, ${s.failed} failed.`
        }
      };
    }
  },
  {
    data: new SlashCommandBuilder()
      .setName("setup_user")
      .setDescription("Start onboarding for a member")
      .addUserOption((o) => o.setName("member").setDescription("Member to set up").setRequired(true)),
    admin: true,
    async execute(interaction, { onboarding }) {
      const user = interaction.options.getUser("member", true);
      const name = await memberName(interaction, user.id, user.username);
      const res = await beginOnboarding(onboarding, { external_id: user.id, display_name: name });
      return { message: setupMessage(name, res) };
    }
  },
  {
    data: new SlashCommandBuilder().setName("setup_all_role_holders").setDescription("Start onboarding for every tracking role holder without a period"),
    admin: true,
    async execute(_interaction, { onboarding }) {
      const role = onboarding.settings.trackingRoleName;
      const members = (await onboarding.platform.listMembers()).filter((m) => !m.bot && m.roles.includes(role));
      const counts: Record<SetupResult["status"], number> = { started: 0, already_tracked: 0, in_progress: 0, failed: 0 };
      for (const m of members) {
        const res = await beginOnboarding(onboarding, { external_id: m.external_id, display_name: m.display_name });
        counts[res.status]++;
      }
      return {
        message: {
          title: `Setup for ${role} holders`,
          tone: counts.failed > 0 ? "warning" : "success",
          body: `${members.length} holders: ${counts.started} started, ${counts.already_tracked} already tracked, ${counts.in_progress} mid-onboarding, ${counts.failed} failed.`
        }
      };
    }
  },
  {
    data: new SlashCommandBuilder()
      .setName("check_user_status")
      .setDescription("Show a member's tracking status")
      .addUserOption((o) => o.setName("member").setDescription("Member to check").setRequired(true)),
    admin: true,
    async execute(interaction, { onboarding }) {
      const user = interaction.options.getUser("member", true);
      const entry = await onboarding.tracker.getPeriod(user.id);
      const present = await onboarding.platform.isMember(user.id);
      const ref = entry?.account.resource_ref;
      const live = ref ? await onboarding.platform.resourceExists(ref) : null;
      return { message: statusNotice(await memberName(interaction, user.id, user.username), entry, present, live) };
    }
  },
  {
    data: new SlashCommandBuilder()
      .setName("delete_user_channel")
      .setDescription("End a member's tracking and delete their channel")
      .addUserOption((o) => o.setName("member").setDescription("Member to remove").setRequired(true)),
    admin: true,
    async execute(interaction, { onboarding }) {
      const user = interaction.options.getUser("member", true);
      onboarding.sessions.delete(user.id);
      const change = await onboarding.tracker.deletePeriod(user.id);
      let channelNote = "No channel was stored.";
      if (change.resource_ref) {
        try {
          await onboarding.platform.deleteResource(change.resource_ref);
          channelNote = "Channel deleted.";
        } catch (e) {
          onboarding.logger.warn({ evt: "resource_delete_failed", external_id: user.id, err: errorMessage(e) }, "channel delete failed");
          channelNote = `The channel could not be deleted: ${errorMessage(e)}`;
        }
      }
      return { message: { title: `Tracking deleted for ${user.username}`, tone: "success", body: `Period was ${change.previous}. ${channelNote}` } };
    }
  },
  {
    data: new SlashCommandBuilder().setName("get_all_reports").setDescription("Download one spreadsheet with every active period"),
    admin: true,
    async execute(_interaction, { onboarding }) {
      const report = await onboarding.tracker.combinedReport();
      return {
        message: { title: "Combined report", tone: "info", body: `${report.periods} active periods.` },
        files: [{ name: report.filename, data: Buffer.from(report.content_base64, "base64") }]
      };
    }
  }
];

export const COMMANDS: Command[] = [...USER_COMMANDS, ...ADMIN_COMMANDS];

function setupMessage(name: string, res: SetupResult): Outgoing {
  switch (res.status) {
    case "started":
      return { title: `Onboarding started for ${name}`, tone: "success", body: `Channel: <#${res.resource_ref}>` };
    case "already_tracked":
      return { title: `${name} is already tracked`, tone: "info" };
    case "in_progress":
      return { title: `${name} is already onboarding`, tone: "info" };
    case "failed":
      return { title: `Setup failed for ${name}`, tone: "error", body: res.reason };
    default: {
      const never: never = res;
      return never;
    }
  }
}

export function errorReply(e: unknown): Outgoing {
  if (e instanceof ApiError) {
    if (e.code === "no_period") return { title: "No tracking period found", tone: "warning" };
    if (e.kind === "validation" || e.kind === "quota") return { title: "Not possible", tone: "warning", body: e.message };
    if (e.kind === "persistence") return { title: "Not saved", tone: "error", body: "The change did not take effect. Please try again." };
  }
  return { title: "Something went wrong", tone: "error", body: "Sorry, please try again later." };
}

export function registerCommandHandlers(opts: { client: Client; deps: CommandDeps; adminRoleName: string }) {
  const { client, deps, adminRoleName } = opts;
  const log = deps.onboarding.logger;
  const commands = new Collection<string, Command>(COMMANDS.map((c) => [c.data.name, c]));

  client.on(Events.InteractionCreate, async (interaction) => {
    if (!interaction.isChatInputCommand() || !interaction.inCachedGuild()) return;
    const command = commands.get(interaction.commandName);
    if (!command) return;

    const isAdmin =
      interaction.member.permissions.has(PermissionFlagsBits.Administrator) ||
      interaction.member.roles.cache.some((r) => r.name === adminRoleName);
    if (command.admin && !isAdmin) {
      await interaction
        .reply({ content: "This command is for admins.", flags: MessageFlags.Ephemeral })
        .catch((e: unknown) => log.warn({ evt: "reply_failed", err: errorMessage(e) }, "reply failed"));
      return;
    }

    const started = Date.now();
    try {
      await interaction.deferReply({ flags: MessageFlags.Ephemeral });
      let reply: Reply;
      try {
        reply = await command.execute(interaction, deps);
      } catch (e) {
        log.warn({ evt: "command_failed", cmd: interaction.commandName, user: interaction.user.id, err: errorMessage(e) }, "command failed");
        reply = { message: errorReply(e) };
      }
      await interaction.editReply(renderMessage(reply.message, reply.files));
      log.info({ evt: "command", cmd: interaction.commandName, user: interaction.user.id, ms: Date.now() - started }, "command handled");
    } catch (e) {
      log.error({ evt: "command_reply_failed", cmd: interaction.commandName, err: errorMessage(e) }, "could not answer command");
    }
  });
}

export async function syncCommands(guild: Guild): Promise<number> {
  const body = COMMANDS.map((c) => c.data.toJSON());
  await guild.commands.set(body);
  return body.length;
}
