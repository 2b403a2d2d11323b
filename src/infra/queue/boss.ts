import PgBoss from 'pg-boss';
import type { HuntCore } from '../../app/huntCore';
import { JOB_RETRY_DELAY_SECONDS, JOB_RETRY_LIMIT } from '../../config/constants';
import { runWithCorrelation } from '../../lib/correlation';
import { logger } from '../../lib/logger';
import { captureException } from '../sentry/sentry';
import { AllJobNames, type JobName, JobNames, topologyReconcilePayloadSchema } from './jobs';
import { configureRecurringSchedules, recurringScheduleDefinitions, type RecurringScheduleStatus } from './scheduler';

type QueueRuntimeParams = {
  databaseUrl: string;
  reconcileCron: string;
  core: Pick<HuntCore, 'reconcileTopology'>;
};

export type QueueRuntime = {
  boss: PgBoss;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  isReady: () => boolean;
  getScheduleStatus: () => RecurringScheduleStatus[];
};

function isQueueExistsError(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }

  if ('code' in error && error.code === '23505') {
    return true;
  }

  const message = 'message' in error && typeof error.message === 'string' ? error.message.toLowerCase() : '';
  return message.includes('queue') && message.includes('already exists');
}

export async function ensureQueues(boss: PgBoss, jobNames: readonly JobName[]): Promise<void> {
  logger.info(
    { feature: 'queue', action: 'ensureQueues', queue_count: jobNames.length },
    'Ensuring pg-boss queues',
  );

  for (const name of jobNames) {
    try {
      await boss.createQueue(name);
    } catch (error) {
      if (isQueueExistsError(error)) {
        continue;
      }

      throw error;
    }
  }

  logger.info({ feature: 'queue', action: 'ensureQueues' }, 'pg-boss queues ensured');
}

export function createQueueRuntime(params: QueueRuntimeParams): QueueRuntime {
  const boss = new PgBoss({
    connectionString: params.databaseUrl,
    schema: 'public',
    migrate: true,
    retryLimit: JOB_RETRY_LIMIT,
    retryDelay: JOB_RETRY_DELAY_SECONDS,
    monitorStateIntervalSeconds: 15,
    maintenanceIntervalSeconds: 60
  });

  let ready = false;
  let scheduleStatus: RecurringScheduleStatus[] = [];

  async function registerHandlers(): Promise<void> {
    await boss.work(JobNames.TopologyReconcile, async (jobs) => {
      for (const job of jobs) {
        const parsed = topologyReconcilePayloadSchema.parse(job.data);

        await runWithCorrelation({ correlationId: parsed.correlationId, source: 'job' }, async () => {
          logger.info({ feature: parsed.feature, action: parsed.action, job_id: job.id }, 'job started');

          const report = await params.core.reconcileTopology(parsed.reason);

          logger.info(
            {
              feature: parsed.feature,
              action: parsed.action,
              job_id: job.id,
              created: report.created.length,
              closed: report.closed.length,
              failed: report.failures.length
            },
            'job completed',
          );
        });
      }
    });
  }

  boss.on('error', (error) => {
    logger.error({ error, feature: 'queue' }, 'pg-boss error');
    captureException(error, { feature: 'queue' });
  });

  return {
    boss,
    async start() {
      try {
        await boss.start();
        await ensureQueues(boss, AllJobNames);
        await registerHandlers();
        scheduleStatus = await configureRecurringSchedules(boss, recurringScheduleDefinitions(params.reconcileCron));
        ready = true;
        logger.info({ feature: 'queue' }, 'pg-boss started');
      } catch (error) {
        ready = false;
        scheduleStatus = [];
        captureException(error, { feature: 'queue.start' });
        throw error;
      }
    },
    async stop() {
      ready = false;
      scheduleStatus = [];
      await boss.stop();
      logger.info({ feature: 'queue' }, 'pg-boss stopped');
    },
    isReady() {
      return ready;
    },
    getScheduleStatus() {
      return [...scheduleStatus];
    }
  };
}
