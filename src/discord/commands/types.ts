import type { ChatInputCommandInteraction, Client } from 'discord.js';
import type { RESTPostAPIApplicationCommandsJSONBody } from 'discord.js';
import type { HuntCore } from '../../app/huntCore';

export type CommandContext = {
  client: Client;
  core: HuntCore;
  timeZone: string;
  commands: readonly CommandModule[];
};

export type CommandAudience = 'participant' | 'maintainer';

export type CommandModule = {
  name: string;
  audience: CommandAudience;
  // Participant commands only answer in a direct message with the bot.
  directMessageOnly: boolean;
  data: {
    toJSON: () => RESTPostAPIApplicationCommandsJSONBody;
  };
  execute: (ctx: CommandContext, interaction: ChatInputCommandInteraction) => Promise<void>;
};
