import { describe, expect, it } from 'vitest';
import type { Challenge } from '../../src/domain/hunt/model';
import { buildJudgingPromptRows, parseJudgeComponent } from '../../src/discord/interactions/components';
import { decodeCustomId } from '../../src/discord/interactions/customId';

function challenges(count: number): Challenge[] {
  return Array.from({ length: count }, (_, index) => ({
    name: `challenge_${String(index).padStart(3, '0')}`,
    shortName: `Challenge ${index}`
  }));
}

type ComponentJson = Record<string, unknown>;

function componentsOf(rows: ReturnType<typeof buildJudgingPromptRows>): ComponentJson[][] {
  return rows.map((row) => {
    const components: ReadonlyArray<object> = row.toJSON().components;
    return components.map((component) => Object.fromEntries(Object.entries(component)));
  });
}

function customIdOf(component: ComponentJson | undefined): string {
  const customId = component?.custom_id;
  if (typeof customId !== 'string') {
    throw new Error('component has no custom_id');
  }
  return customId;
}

const prompt = { participantId: '1234567890123456789', submissionId: '9876543210987654321' };

describe('judging prompt components', () => {
  it('pages the challenges into select menus of 25 followed by the sentinel buttons', () => {
    const rows = componentsOf(buildJudgingPromptRows({ ...prompt, challenges: challenges(30) }));

    expect(rows).toHaveLength(3);
    const [firstPage, secondPage, buttons] = rows;

    expect(firstPage?.[0]?.options).toHaveLength(25);
    expect(firstPage?.[0]?.placeholder).toBe('Challenge (1/2)');
    expect(secondPage?.[0]?.options).toHaveLength(5);
    expect(buttons?.map((button) => button.label)).toEqual(['⚠️ Unclear', '❌ Invalid']);

    for (const row of rows) {
      for (const component of row) {
        expect(customIdOf(component).length).toBeLessThanOrEqual(100);
      }
    }
  });

  it('shows at most four pages', () => {
    const rows = componentsOf(buildJudgingPromptRows({ ...prompt, challenges: challenges(110) }));

    expect(rows).toHaveLength(5);
    expect(rows[3]?.[0]?.placeholder).toBe('Challenge (4/4)');
  });

  it('still offers the sentinel buttons when nothing is left', () => {
    const rows = componentsOf(buildJudgingPromptRows({ ...prompt, challenges: [] }));

    expect(rows).toHaveLength(1);
    expect(rows[0]).toHaveLength(2);
  });

  it('round-trips the prompt payload through the custom ids', () => {
    const rows = componentsOf(
      buildJudgingPromptRows({ ...prompt, challenges: [{ name: 'photo_tower', shortName: 'Tower' }] }),
    );
    const [selectRow, buttonRow] = rows;

    expect(parseJudgeComponent(decodeCustomId(customIdOf(selectRow?.[0])))).toEqual({
      participantId: prompt.participantId,
      submissionId: prompt.submissionId,
      fixedChoice: null
    });
    expect(parseJudgeComponent(decodeCustomId(customIdOf(buttonRow?.[0])))?.fixedChoice).toBe('___unclear');
    expect(parseJudgeComponent(decodeCustomId(customIdOf(buttonRow?.[1])))?.fixedChoice).toBe('___invalid');
  });

  it('ignores components of other features and unknown actions', () => {
    const payload = { u: '1', s: '2' };
    expect(parseJudgeComponent({ prefix: 'hb', version: '1', feature: 'other', action: 'select', payload })).toBeNull();
    expect(parseJudgeComponent({ prefix: 'hb', version: '1', feature: 'judge', action: 'approve', payload })).toBeNull();
    expect(
      parseJudgeComponent({ prefix: 'hb', version: '1', feature: 'judge', action: 'select', payload: { u: '1' } }),
    ).toBeNull();
  });
});
