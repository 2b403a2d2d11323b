import { sql } from 'drizzle-orm';
import {
  boolean,
  date,
  index,
  integer,
  pgTable,
  serial,
  text,
  timestamp,
  uniqueIndex,
  varchar
} from 'drizzle-orm/pg-core';

export const participants = pgTable(
  'participants',
  {
    userId: varchar('user_id', { length: 32 }).primaryKey(),
    username: varchar('username', { length: 64 }),
    displayName: varchar('display_name', { length: 128 }).notNull(),
    team: varchar('team', { length: 128 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => ({
    teamIdx: index('participants_team_idx').on(table.team)
  }),
);

export const teamChannels = pgTable(
  'team_channels',
  {
    id: serial('id').primaryKey(),
    teamName: varchar('team_name', { length: 128 }).notNull(),
    channelId: varchar('channel_id', { length: 32 }).notNull(),
    open: boolean('open').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    closedAt: timestamp('closed_at', { withTimezone: true })
  },
  (table) => ({
    openTeamUnique: uniqueIndex('team_channels_open_team_uq')
      .on(table.teamName)
      .where(sql`${table.open}`)
  }),
);

export const submissions = pgTable(
  'submissions',
  {
    messageId: varchar('message_id', { length: 32 }).primaryKey(),
    userId: varchar('user_id', { length: 32 })
      .notNull()
      .references(() => participants.userId),
    team: varchar('team', { length: 128 }).notNull(),
    caption: text('caption').notNull().default(''),
    mediaType: varchar('media_type', { length: 16 }).notNull(),
    mediaPath: text('media_path'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => ({
    userIdx: index('submissions_user_idx').on(table.userId),
    teamIdx: index('submissions_team_idx').on(table.team)
  }),
);

export const challenges = pgTable('challenges', {
  name: varchar('name', { length: 64 }).primaryKey(),
  shortName: varchar('short_name', { length: 100 }).notNull(),
  description: text('description').notNull().default(''),
  points: integer('points').notNull().default(1)
});

export const judgements = pgTable('judgements', {
  submissionId: varchar('submission_id', { length: 32 })
    .primaryKey()
    .references(() => submissions.messageId),
  challengeName: varchar('challenge_name', { length: 64 }).notNull(),
  points: integer('points').notNull(),
  valid: boolean('valid').notNull(),
  judgedBy: varchar('judged_by', { length: 32 }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
});

export const config = pgTable('config', {
  name: varchar('name', { length: 64 }).primaryKey(),
  value: text('value').notNull()
});

export const safetyTeam = pgTable(
  'safety_team',
  {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 128 }).notNull(),
    phone: varchar('phone', { length: 64 }).notNull(),
    dutyDate: date('duty_date', { mode: 'string' }).notNull()
  },
  (table) => ({
    dutyDateIdx: index('safety_team_duty_date_idx').on(table.dutyDate)
  }),
);
