import { DEFAULT_CITY_GUIDE_SOURCE, DEFAULT_SCHEDULE_SOURCE, SAFETY_DAY_ROLLOVER_HOUR } from '../../config/constants';
import { parseConfigLocator, type ConfigLocator } from '../../domain/hunt/configLocator';
import type { SafetyContact } from '../../domain/hunt/model';
import { logger } from '../../lib/logger';
import { addHours, zonedDateOnly, zonedHour } from '../../lib/time';
import type { HuntStore } from '../ports/huntStore';

export const configKeys = {
  scheduleSource: 'schedule_source',
  cityGuide: 'city_guide'
} as const;

export type EmergencyInfo = {
  dutyDate: string;
  contacts: SafetyContact[];
};

async function resolveLocator(store: HuntStore, name: string, fallback: string): Promise<ConfigLocator> {
  const stored = await store.getConfigValue(name);
  const value = stored ?? fallback;
  logger.debug({ feature: 'event_info', config: name, value, defaulted: stored === null }, 'Resolved config locator');
  return parseConfigLocator(name, value);
}

export async function resolveSchedule(store: HuntStore): Promise<ConfigLocator> {
  return resolveLocator(store, configKeys.scheduleSource, DEFAULT_SCHEDULE_SOURCE);
}

export async function resolveSurvivalGuide(store: HuntStore): Promise<ConfigLocator> {
  return resolveLocator(store, configKeys.cityGuide, DEFAULT_CITY_GUIDE_SOURCE);
}

export function safetyDutyDate(now: Date, timeZone: string): string {
  const shifted = zonedHour(now, timeZone) < SAFETY_DAY_ROLLOVER_HOUR ? addHours(now, -24) : now;
  return zonedDateOnly(shifted, timeZone);
}

export async function emergencyInfo(store: HuntStore, now: Date, timeZone: string): Promise<EmergencyInfo> {
  const dutyDate = safetyDutyDate(now, timeZone);
  const contacts = await store.listSafetyContacts(dutyDate);
  return { dutyDate, contacts };
}
