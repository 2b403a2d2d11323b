import { DiscordAPIError, REST } from '@discordjs/rest';
import { z } from 'zod';
import { env } from '../src/config/env';
import { commandDefinitions, commandModules } from '../src/discord/commandDefinitions';
import { resolveCommandRoute, summarizeCommandSet } from '../src/discord/commandDeploy';
import { logger } from '../src/lib/logger';

const deployedCommandsSchema = z.array(z.object({ name: z.string() }).passthrough());

async function main() {
  if (!env.DISCORD_TOKEN || !env.DISCORD_APP_ID) {
    throw new Error('DISCORD_TOKEN and DISCORD_APP_ID are required to deploy commands');
  }

  const target = resolveCommandRoute(env, env.DISCORD_APP_ID);
  const summary = summarizeCommandSet(commandModules);
  logger.info(
    { mode: target.mode, participant: summary.participant, maintainer: summary.maintainer },
    'Deploying commands',
  );

  if (target.mode === 'guild' && summary.hiddenInGuildDeploy.length > 0) {
    logger.warn(
      { commands: summary.hiddenInGuildDeploy },
      'Guild deploy: these commands answer in direct messages and need a global deploy there',
    );
  }

  const rest = new REST({ version: '10' }).setToken(env.DISCORD_TOKEN);
  const deployed = deployedCommandsSchema.parse(await rest.put(target.route, { body: commandDefinitions }));
  logger.info({ mode: target.mode, deployed: deployed.map((command) => command.name) }, 'Commands deployed');
}

main()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    if (error instanceof DiscordAPIError) {
      logger.error(
        { status: error.status, code: error.code, method: error.method, url: error.url, body: error.rawError },
        'Discord rejected the command payload',
      );
    } else {
      logger.error({ error }, 'Command deploy failed');
    }
    process.exit(1);
  });
