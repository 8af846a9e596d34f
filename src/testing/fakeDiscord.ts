import { Collection, type Interaction, type Message } from "discord.js";
import { vi } from "vitest";
import type { AttachmentSource } from "../utils/attachments.js";

export const BOT_USER_ID = "999";

export interface FakeUser {
  id: string;
  username: string;
  displayName: string;
}

export interface FakeMessageOptions {
  content?: string;
  authorId?: string;
  authorIsBot?: boolean;
  mentionsBot?: boolean;
  guildId?: string | null;
  channelId?: string;
  attachments?: AttachmentSource[];
  mentionedUsers?: FakeUser[];
}

/**
 * Just enough of a discord.js Message for the reply pipeline
 */
export function fakeMessage(options: FakeMessageOptions = {}) {
  const {
    content = `<@${BOT_USER_ID}> hello`,
    authorId = "42",
    authorIsBot = false,
    mentionsBot = true,
    guildId = "g1",
    channelId = "c1",
    attachments = [],
    mentionedUsers = [{ id: BOT_USER_ID, username: "abstruse", displayName: "Abstruse" }],
  } = options;

  const reply = vi.fn().mockResolvedValue(undefined);
  const send = vi.fn().mockResolvedValue(undefined);
  const sendTyping = vi.fn().mockResolvedValue(undefined);
  const has = vi.fn((id: string) => mentionsBot && id === BOT_USER_ID);

  const raw = {
    id: `m-${Math.random().toString(36).slice(2)}`,
    content,
    author: { id: authorId, bot: authorIsBot, username: "tester", displayName: "Tester" },
    guildId,
    channelId,
    attachments: new Collection(attachments.map((att, i): [string, AttachmentSource] => [String(i), att])),
    mentions: {
      has,
      users: new Collection(mentionedUsers.map((user): [string, FakeUser] => [user.id, user])),
      members: null,
    },
    channel: { send, sendTyping },
    reply,
  };

  return { message: raw as unknown as Message, reply, send, sendTyping, has };
}

export interface FakeCommandOptions {
  userId?: string;
  guildId?: string | null;
  channelId?: string;
  enable?: boolean | null;
  isChatInputCommand?: boolean;
}

/**
 * Just enough of a ChatInputCommandInteraction for the command handler
 */
export function fakeCommand(commandName: string, options: FakeCommandOptions = {}) {
  const { userId = "42", guildId = "g1", channelId = "c1", enable = null, isChatInputCommand = true } = options;

  const reply = vi.fn().mockResolvedValue(undefined);
  const getBoolean = vi.fn((name: string) => (name === "enable" ? enable : null));

  const raw = {
    isChatInputCommand: () => isChatInputCommand,
    commandName,
    user: { id: userId, tag: "tester#0001" },
    guildId,
    channelId,
    options: { getBoolean },
    replied: false,
    deferred: false,
    reply,
  };

  return { interaction: raw as unknown as Interaction, reply, getBoolean };
}
