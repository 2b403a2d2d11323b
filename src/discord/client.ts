import { Client, Events, GatewayIntentBits, Partials, type Interaction } from 'discord.js';
import type { HuntCore } from '../app/huntCore';
import { logger } from '../lib/logger';
import { commandModules } from './commandDefinitions';
import { handleChatInputCommand } from './commands';
import type { CommandContext } from './commands/types';
import { routeInteractionComponent } from './interactions/router';
import { handleDirectMessage } from './submissions/directMessageHandler';

type CreateDiscordRuntimeParams = {
  client: Client;
  token: string;
  core: HuntCore;
  timeZone: string;
};

export type DiscordRuntime = {
  client: Client;
  login: () => Promise<void>;
  destroy: () => Promise<void>;
  isReady: () => boolean;
  guildCount: () => number;
};

// DMs arrive on uncached channels, hence the Channel partial.
export function createDiscordClient(): Client {
  return new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.DirectMessages],
    partials: [Partials.Channel]
  });
}

export function createDiscordRuntime(params: CreateDiscordRuntimeParams): DiscordRuntime {
  const { client } = params;
  let ready = false;

  client.once(Events.ClientReady, (c) => {
    ready = true;
    logger.info({ feature: 'discord', bot_user_id: c.user.id, guild_count: c.guilds.cache.size }, 'Discord ready');
  });

  client.on(Events.ShardDisconnect, (event, shardId) => {
    ready = false;
    logger.warn({ feature: 'discord', shard_id: shardId, code: event.code }, 'Discord shard disconnected');
  });

  client.on(Events.ShardResume, (shardId, replayedEvents) => {
    ready = true;
    logger.info({ feature: 'discord', shard_id: shardId, replayed_events: replayedEvents }, 'Discord shard resumed');
  });

  const commandContext: CommandContext = {
    client,
    core: params.core,
    timeZone: params.timeZone,
    commands: commandModules
  };

  client.on(Events.InteractionCreate, async (interaction: Interaction) => {
    if (interaction.isChatInputCommand()) {
      await handleChatInputCommand(commandContext, interaction);
      return;
    }

    if (interaction.isButton() || interaction.isStringSelectMenu()) {
      await routeInteractionComponent({ core: params.core }, interaction);
    }
  });

  client.on(Events.MessageCreate, async (message) => {
    try {
      await handleDirectMessage(params.core, message);
    } catch (error) {
      logger.error({ feature: 'discord.dm', message_id: message.id, error }, 'Direct message handling failed');
    }
  });

  return {
    client,
    // Resolves once the gateway session is ready, not just authenticated.
    async login() {
      const readyEvent = new Promise<void>((resolve) => {
        client.once(Events.ClientReady, () => resolve());
      });
      await client.login(params.token);
      await readyEvent;
    },
    async destroy() {
      await client.destroy();
      ready = false;
    },
    isReady() {
      return ready;
    },
    guildCount() {
      return client.guilds.cache.size;
    }
  };
}
