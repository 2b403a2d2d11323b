import type PgBoss from 'pg-boss';
import { logger } from '../../lib/logger';
import { type JobName, JobNames } from './jobs';

function schedulerPayload(feature: string, action: string) {
  return {
    correlationId: '00000000-0000-0000-0000-000000000000',
    feature,
    action
  };
}

export type RecurringScheduleDefinition = {
  name: JobName;
  cron: string;
  payloadFeature: string;
  payloadAction: string;
};

export type RecurringScheduleStatus = {
  name: JobName;
  cron: string;
  enabled: boolean;
};

export function recurringScheduleDefinitions(reconcileCron: string): RecurringScheduleDefinition[] {
  return [
    {
      name: JobNames.TopologyReconcile,
      cron: reconcileCron,
      payloadFeature: 'topology',
      payloadAction: 'scheduled_reconcile'
    }
  ];
}

async function applyScheduleState(boss: PgBoss, definition: RecurringScheduleDefinition, enabled: boolean): Promise<void> {
  if (enabled) {
    await boss.schedule(
      definition.name,
      definition.cron,
      schedulerPayload(definition.payloadFeature, definition.payloadAction),
    );
    return;
  }

  try {
    await boss.unschedule(definition.name);
  } catch (error) {
    logger.debug(
      {
        feature: 'queue.scheduler',
        schedule: definition.name,
        error
      },
      'Unable to unschedule disabled recurring job',
    );
  }
}

// A blank cron expression turns the schedule off.
export async function configureRecurringSchedules(
  boss: PgBoss,
  definitions: readonly RecurringScheduleDefinition[],
): Promise<RecurringScheduleStatus[]> {
  const statuses: RecurringScheduleStatus[] = [];

  for (const definition of definitions) {
    const enabled = definition.cron.trim().length > 0;
    await applyScheduleState(boss, definition, enabled);
    statuses.push({ name: definition.name, cron: definition.cron, enabled });
  }

  logger.info(
    {
      feature: 'queue.scheduler',
      enabled_schedules: statuses.filter((status) => status.enabled).map((status) => status.name),
      disabled_schedules: statuses.filter((status) => !status.enabled).map((status) => status.name)
    },
    'Recurring schedules configured',
  );

  return statuses;
}
