import { ActionRowBuilder, ButtonBuilder, ButtonStyle, StringSelectMenuBuilder } from 'discord.js';
import { z } from 'zod';
import type { JudgingPrompt } from '../../app/ports/chatTransport';
import {
  DISCORD_SELECT_MENU_ROW_LIMIT,
  DISCORD_SELECT_OPTION_LIMIT,
  INVALID_CHOICE,
  UNCLEAR_CHOICE
} from '../../config/constants';
import type { Challenge } from '../../domain/hunt/model';
import { t, type AppLocale } from '../../i18n';
import { logger } from '../../lib/logger';
import { encodeCustomId, type CustomIdEnvelope } from './customId';

export const JUDGE_FEATURE = 'judge';

const SELECT_LABEL_LIMIT = 100;

export const judgeActions = {
  select: 'select',
  unclear: 'unclear',
  invalid: 'invalid'
} as const;

const judgePayloadSchema = z.object({
  u: z.string().min(1),
  s: z.string().min(1),
  p: z.string().optional()
});

export type JudgeComponent = {
  participantId: string;
  submissionId: string;
  // Fixed for the sentinel buttons, taken from the selected option otherwise.
  fixedChoice: string | null;
};

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size));
  }
  return chunks;
}

function judgePayload(prompt: Pick<JudgingPrompt, 'participantId' | 'submissionId'>): Record<string, string> {
  return { u: prompt.participantId, s: prompt.submissionId };
}

function buildChallengeSelect(
  prompt: JudgingPrompt,
  challenges: readonly Challenge[],
  page: number,
  pages: number,
  locale: AppLocale,
): ActionRowBuilder<StringSelectMenuBuilder> {
  const select = new StringSelectMenuBuilder()
    .setCustomId(
      encodeCustomId({
        feature: JUDGE_FEATURE,
        action: judgeActions.select,
        payload: { ...judgePayload(prompt), p: String(page) }
      }),
    )
    .setPlaceholder(t(locale, 'judge.select_placeholder', { page: page + 1, pages }))
    .setMinValues(1)
    .setMaxValues(1)
    .addOptions(
      challenges.map((challenge) => ({
        label: challenge.shortName.slice(0, SELECT_LABEL_LIMIT),
        value: challenge.name
      })),
    );

  return new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(select);
}

/**
 * Remaining challenges as select menus of 25 options each, followed by one
 * row with the Unclear and Invalid buttons.
 */
export function buildJudgingPromptRows(
  prompt: JudgingPrompt,
  locale: AppLocale = 'en',
): Array<ActionRowBuilder<StringSelectMenuBuilder> | ActionRowBuilder<ButtonBuilder>> {
  const pages = chunk(prompt.challenges, DISCORD_SELECT_OPTION_LIMIT);
  const visiblePages = pages.slice(0, DISCORD_SELECT_MENU_ROW_LIMIT);

  if (visiblePages.length < pages.length) {
    logger.warn(
      {
        feature: 'judge.prompt',
        submission_id: prompt.submissionId,
        challenge_count: prompt.challenges.length,
        shown: visiblePages.length * DISCORD_SELECT_OPTION_LIMIT
      },
      'Too many remaining challenges for one prompt; use /hunt-admin judge for the rest',
    );
  }

  const rows: Array<ActionRowBuilder<StringSelectMenuBuilder> | ActionRowBuilder<ButtonBuilder>> = visiblePages.map(
    (challenges, page) => buildChallengeSelect(prompt, challenges, page, visiblePages.length, locale),
  );

  rows.push(
    new ActionRowBuilder<ButtonBuilder>().addComponents(
      new ButtonBuilder()
        .setCustomId(encodeCustomId({ feature: JUDGE_FEATURE, action: judgeActions.unclear, payload: judgePayload(prompt) }))
        .setLabel(t(locale, 'judge.unclear_button'))
        .setStyle(ButtonStyle.Secondary),
      new ButtonBuilder()
        .setCustomId(encodeCustomId({ feature: JUDGE_FEATURE, action: judgeActions.invalid, payload: judgePayload(prompt) }))
        .setLabel(t(locale, 'judge.invalid_button'))
        .setStyle(ButtonStyle.Danger),
    ),
  );

  return rows;
}

export function parseJudgeComponent(envelope: CustomIdEnvelope): JudgeComponent | null {
  if (envelope.feature !== JUDGE_FEATURE) {
    return null;
  }

  const parsed = judgePayloadSchema.safeParse(envelope.payload);
  if (!parsed.success) {
    return null;
  }

  const base = { participantId: parsed.data.u, submissionId: parsed.data.s };
  switch (envelope.action) {
    case judgeActions.select:
      return { ...base, fixedChoice: null };
    case judgeActions.unclear:
      return { ...base, fixedChoice: UNCLEAR_CHOICE };
    case judgeActions.invalid:
      return { ...base, fixedChoice: INVALID_CHOICE };
    default:
      return null;
  }
}
