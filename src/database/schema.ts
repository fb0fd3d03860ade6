import {
  index,
  integer,
  pgTable,
  serial,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from 'drizzle-orm/pg-core';

export const destinations = pgTable(
  'destinations',
  {
    id: serial('id').primaryKey(),
    name: varchar('name', { length: 255 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => ({
    nameIdx: uniqueIndex('ix_destinations_name').on(table.name),
  }),
);

// Notes live in `knowledge_base`; rows go away with their destination.
export const knowledgeBase = pgTable(
  'knowledge_base',
  {
    id: serial('id').primaryKey(),
    destinationId: integer('destination_id')
      .notNull()
      .references(() => destinations.id, { onDelete: 'cascade' }),
    content: text('content').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => ({
    destinationIdx: index('ix_knowledge_base_destination_id').on(
      table.destinationId,
    ),
  }),
);

export type DestinationRow = typeof destinations.$inferSelect;
export type NoteRow = typeof knowledgeBase.$inferSelect;
