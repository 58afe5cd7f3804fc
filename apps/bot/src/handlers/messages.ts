import { ChannelType, Events, type Client, type Message } from "discord.js";
import { handleOnboardingInput, type OnboardingDeps } from "../flows/onboarding.js";
import { ApiError, errorMessage } from "../errors.js";
import { submitReply } from "../messages.js";

export type InboundMessage = {
  author_id: string;
  resource_ref: string;
  // whether the channel sits under the tracking category
  in_tracking_area: boolean;
  text: string;
};

export type MessageRoute = "onboarding" | "ignored" | "submitted" | "dropped" | "failed";

/** Decides what one guild message means for the tracker and acts on it. */
export async function routeMessage(deps: OnboardingDeps, msg: InboundMessage): Promise<MessageRoute> {
  const session = deps.sessions.get(msg.author_id);
  if (session) {
    if (session.resource_ref !== msg.resource_ref) {
      if (msg.in_tracking_area) {
        deps.logger.warn(
          { evt: "consistency_signal", code: "session_elsewhere", external_id: msg.author_id, resource_ref: msg.resource_ref },
          "onboarding member posted in a tracking channel that is not theirs"
        );
      }
      return "ignored";
    }
    await handleOnboardingInput(deps, session, msg.text);
    return "onboarding";
  }
  if (!msg.in_tracking_area) return "ignored";

  try {
    const res = await deps.tracker.submit(msg.author_id, msg.resource_ref, msg.text);
    const reply = submitReply(res.result, { truncated: res.truncated, limit: deps.settings.maxLinksPerMessage });
    if (reply) await deps.platform.sendMessage(msg.resource_ref, reply);
    return "submitted";
  } catch (e) {
    if (e instanceof ApiError && (e.kind === "consistency" || e.code === "no_period")) {
      deps.logger.warn(
        { evt: "consistency_signal", code: e.code, external_id: msg.author_id, resource_ref: msg.resource_ref },
        "message in a tracking channel the author does not own"
      );
      return "dropped";
    }
    deps.logger.error({ evt: "submission_failed", external_id: msg.author_id, err: errorMessage(e) }, "submission failed");
    const persistence = e instanceof ApiError && e.kind === "persistence";
    try {
      await deps.platform.sendMessage(msg.resource_ref, {
        title: persistence ? "Not recorded" : "Something went wrong",
        body: persistence
          ? "Your links were not saved. Please send them again in a moment."
          : "Sorry, that message could not be processed. Please try again later.",
        tone: "error"
      });
    } catch (sendErr) {
      deps.logger.warn({ evt: "failure_notice_failed", err: errorMessage(sendErr) }, "could not tell the member");
    }
    return "failed";
  }
}

export function registerMessageHandlers(opts: {
  client: Client;
  deps: OnboardingDeps;
  trackingCategoryName: string;
}) {
  opts.client.on(Events.MessageCreate, async (message: Message) => {
    if (message.author.bot || !message.inGuild()) return;
    if (message.channel.type !== ChannelType.GuildText) return;
    try {
      await routeMessage(opts.deps, {
        author_id: message.author.id,
        resource_ref: message.channelId,
        in_tracking_area: message.channel.parent?.name === opts.trackingCategoryName,
        text: message.content
      });
    } catch (e) {
      opts.deps.logger.error({ evt: "message_handler_failed", err: errorMessage(e) }, "message handler failed");
    }
  });
}
