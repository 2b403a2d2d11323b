import { z } from 'zod';

export const JobNames = {
  TopologyReconcile: 'topology.reconcile'
} as const;

export type JobName = (typeof JobNames)[keyof typeof JobNames];

export const AllJobNames: readonly JobName[] = Object.values(JobNames);

export const baseJobSchema = z.object({
  correlationId: z.string().uuid(),
  feature: z.string(),
  action: z.string()
});

export const topologyReconcilePayloadSchema = baseJobSchema.extend({
  reason: z.enum(['scheduled', 'maintainer_command']).default('scheduled')
});

export type TopologyReconcilePayload = z.infer<typeof topologyReconcilePayloadSchema>;
