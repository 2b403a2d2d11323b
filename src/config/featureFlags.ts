import { env } from './env';

export const featureFlags = {
  submissions: env.SUBMISSIONS_ENABLED,
  scheduledReconcile: env.TOPOLOGY_RECONCILE_CRON.length > 0
} as const;

export type FeatureFlagKey = keyof typeof featureFlags;

export function isFeatureEnabled(feature: FeatureFlagKey): boolean {
  return featureFlags[feature];
}
