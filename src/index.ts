import { env, assertRuntimeDiscordEnv } from './config/env';
import { isFeatureEnabled } from './config/featureFlags';
import { createHuntCore } from './app/huntCore';
import { logger } from './lib/logger';
import { runWithCorrelation, createCorrelationId } from './lib/correlation';
import { initSentry, captureException } from './infra/sentry/sentry';
import { createQueueRuntime } from './infra/queue/boss';
import { drizzleHuntStore } from './infra/db/huntStore';
import { FileMediaArchive } from './infra/storage/mediaArchive';
import { createDiscordClient, createDiscordRuntime } from './discord/client';
import { DiscordChatTransport } from './discord/transport';
import { createHttpRuntime } from './http/server';
import { checkDbHealth, pgPool } from './infra/db/client';

assertRuntimeDiscordEnv(env);

initSentry();

const discordClient = createDiscordClient();

const core = createHuntCore({
  store: drizzleHuntStore,
  transport: new DiscordChatTransport(discordClient),
  archive: new FileMediaArchive(env.SUBMISSIONS_DIR),
  judgeChannelId: env.JUDGE_CHANNEL_ID,
  maintainerIds: env.MAINTAINER_IDS,
  submissionsEnabled: isFeatureEnabled('submissions'),
  timeZone: env.EVENT_TIMEZONE
});

const queueRuntime = isFeatureEnabled('scheduledReconcile')
  ? createQueueRuntime({
    databaseUrl: env.DATABASE_URL,
    reconcileCron: env.TOPOLOGY_RECONCILE_CRON,
    core
  })
  : null;

const discordRuntime = createDiscordRuntime({
  client: discordClient,
  token: env.DISCORD_TOKEN,
  core,
  timeZone: env.EVENT_TIMEZONE
});

const httpRuntime = createHttpRuntime({
  isDiscordReady: discordRuntime.isReady,
  isBossReady: () => (queueRuntime ? queueRuntime.isReady() : null),
  submissionsEnabled: core.submissionsEnabled
});

let shuttingDown = false;

async function runStartupSelfCheck(): Promise<void> {
  const dbOk = await checkDbHealth();
  const bossOk = queueRuntime ? queueRuntime.isReady() : true;
  const discordConnected = discordRuntime.isReady();
  const schedules = (queueRuntime?.getScheduleStatus() ?? [])
    .map((schedule) => `${schedule.name}:${schedule.enabled ? 'enabled' : 'disabled'}`);

  logger.info(
    {
      feature: 'boot.self_check',
      discord: {
        connected: discordConnected,
        guild_count: discordRuntime.guildCount()
      },
      db: dbOk ? 'ok' : 'fail',
      boss: queueRuntime ? (bossOk ? 'ok' : 'fail') : 'disabled',
      schedules,
      submissions: core.submissionsEnabled() ? 'enabled' : 'disabled',
      maintainers: env.MAINTAINER_IDS.length
    },
    'Startup self-check',
  );

  if (!dbOk || !bossOk || !discordConnected) {
    throw new Error('Startup self-check failed');
  }
}

async function start(): Promise<void> {
  await queueRuntime?.start();
  await discordRuntime.login();
  await httpRuntime.start();
  await runStartupSelfCheck();

  const report = await runWithCorrelation({ correlationId: createCorrelationId(), source: 'boot' }, () =>
    core.reconcileTopology('startup'),
  );
  logger.info(
    {
      feature: 'boot',
      topology_created: report.created.length,
      topology_closed: report.closed.length,
      topology_failed: report.failures.length
    },
    'Initial team channel reconciliation finished',
  );

  logger.info({ feature: 'boot', node_env: env.NODE_ENV }, 'Application started');
}

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }

  shuttingDown = true;
  logger.info({ feature: 'shutdown', signal }, 'Shutdown started');

  const failures: Array<{ step: string; error: unknown }> = [];

  const runStep = async (step: string, work: () => Promise<void>) => {
    try {
      await work();
    } catch (error) {
      failures.push({ step, error });
      logger.error({ feature: 'shutdown', signal, step, error }, 'Shutdown step failed');
    }
  };

  await runStep('discord.destroy', async () => {
    await discordRuntime.destroy();
  });
  await runStep('boss.stop', async () => {
    await queueRuntime?.stop();
  });
  await runStep('db.pool.end', async () => {
    await pgPool.end();
  });
  await runStep('http.stop', async () => {
    await httpRuntime.stop();
  });

  if (failures.length === 0) {
    logger.info({ feature: 'shutdown', signal }, 'Shutdown complete');
    process.exit(0);
    return;
  }

  logger.error({ feature: 'shutdown', signal, failed_steps: failures.map((failure) => failure.step) }, 'Shutdown failed');
  process.exit(1);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

start().catch((error) => {
  captureException(error, { feature: 'boot' });
  logger.error({ error }, 'Boot failure');
  void shutdown('BOOT_FAILURE');
});
