import type { RouteLike } from '@discordjs/rest';
import { Routes } from 'discord.js';
import type { Env } from '../config/env';
import type { CommandModule } from './commands/types';

export type CommandDeployTarget = {
  mode: Env['COMMAND_DEPLOY_MODE'];
  route: RouteLike;
};

export function resolveCommandRoute(
  config: Pick<Env, 'COMMAND_DEPLOY_MODE' | 'DISCORD_GUILD_ID'>,
  appId: string,
): CommandDeployTarget {
  if (config.COMMAND_DEPLOY_MODE === 'global') {
    return { mode: 'global', route: Routes.applicationCommands(appId) };
  }

  if (!config.DISCORD_GUILD_ID) {
    throw new Error('COMMAND_DEPLOY_MODE=guild requires DISCORD_GUILD_ID');
  }

  return { mode: 'guild', route: Routes.applicationGuildCommands(appId, config.DISCORD_GUILD_ID) };
}

export type CommandSetSummary = {
  participant: string[];
  maintainer: string[];
  // Direct messages only see globally registered commands.
  hiddenInGuildDeploy: string[];
};

export function summarizeCommandSet(modules: readonly CommandModule[]): CommandSetSummary {
  return {
    participant: modules.filter((command) => command.audience === 'participant').map((command) => command.name),
    maintainer: modules.filter((command) => command.audience === 'maintainer').map((command) => command.name),
    hiddenInGuildDeploy: modules.filter((command) => command.directMessageOnly).map((command) => command.name)
  };
}
