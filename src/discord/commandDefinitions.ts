import type { RESTPostAPIApplicationCommandsJSONBody } from 'discord.js';
import { emergencyCommand, scheduleCommand, survivalGuideCommand } from './commands/eventInfo';
import { helpCommand } from './commands/help';
import { huntAdminCommand } from './commands/huntAdmin';
import { scoreCommand } from './commands/score';
import { teamCommand } from './commands/team';
import type { CommandModule } from './commands/types';

export const commandModules: readonly CommandModule[] = [
  teamCommand,
  scoreCommand,
  scheduleCommand,
  survivalGuideCommand,
  emergencyCommand,
  helpCommand,
  huntAdminCommand,
];

export const commandDefinitions: RESTPostAPIApplicationCommandsJSONBody[] = commandModules.map(
  (command) => command.data.toJSON(),
);
