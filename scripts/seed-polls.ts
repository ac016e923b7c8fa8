import './utils/env-loader';
import { readFileSync } from 'fs';
import { z } from 'zod';
import { STATE_DIR } from './utils/env-loader';
import { PollsStore } from '../libs/shared/src/storage/polls.store';
import {
  CHOICE_TEXT_MAX_LENGTH,
  Choice,
  QUESTION_TEXT_MAX_LENGTH,
  QuestionWithChoices,
} from '../libs/shared/src/types/poll.types';
import { addDays } from '../libs/shared/src/utils/date.utils';

// About a century either way
const MAX_DAYS_OFFSET = 36500;

const seedEntrySchema = z.object({
  questionText: z.string().trim().min(1).max(QUESTION_TEXT_MAX_LENGTH),
  /** Days from now; negative for questions already published */
  daysOffset: z.number().finite().min(-MAX_DAYS_OFFSET).max(MAX_DAYS_OFFSET),
  choices: z.array(z.string().trim().min(1).max(CHOICE_TEXT_MAX_LENGTH)).default([]),
});

export const seedFileSchema = z.array(seedEntrySchema);

export type SeedEntry = z.infer<typeof seedEntrySchema>;

export function parseSeedFile(content: string): SeedEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new Error(`Seed file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = seedFileSchema.safeParse(raw);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new Error(`Invalid seed entry at ${first.path.join('.')}: ${first.message}`);
  }
  return result.data;
}

export async function seedPolls(
  store: PollsStore,
  entries: SeedEntry[],
  now: Date = new Date(),
): Promise<QuestionWithChoices[]> {
  const created: QuestionWithChoices[] = [];
  for (const entry of entries) {
    const question = await store.createQuestion(
      entry.questionText,
      addDays(now, entry.daysOffset),
    );
    const choices: Choice[] = [];
    for (const text of entry.choices) {
      const choice = await store.addChoice(question.id, text);
      if (choice) choices.push(choice);
    }
    created.push({ ...question, choices });
  }
  return created;
}

async function main(): Promise<void> {
  const file = process.argv[2];
  if (!file) {
    throw new Error('Usage: seed-polls <seed-file.json>');
  }

  const entries = parseSeedFile(readFileSync(file, 'utf8'));
  const store = new PollsStore({ stateDir: STATE_DIR });
  const created = await seedPolls(store, entries);

  console.log(`Seeded ${created.length} question(s) into ${store.getStorePath()}`);
}

if (require.main === module) {
  main().catch((e: unknown) => {
    console.error('[seed-polls]', e instanceof Error ? e.message : e);
    process.exit(1);
  });
}
