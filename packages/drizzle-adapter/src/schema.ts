import { integer, jsonb, pgTable, primaryKey, text, timestamp, varchar, index } from "drizzle-orm/pg-core";

// =============================================================================
// LIPA RECORD
// =============================================================================
// One row per (model, key). `version` starts at 1 and is bumped by every write;
// conditional writes compare it to detect concurrent modification.

export const lipaRecord = pgTable(
	"lipa_record",
	{
		model: varchar("model", { length: 32 }).notNull(),
		key: text("key").notNull(),
		version: integer("version").notNull(),
		value: jsonb("value").notNull(),
		updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
	},
	(table) => [
		primaryKey({ columns: [table.model, table.key] }),
		index("idx_lipa_record_model_updated").on(table.model, table.updatedAt),
	],
);

export type LipaRecordRow = typeof lipaRecord.$inferSelect;
export type LipaRecordInsert = typeof lipaRecord.$inferInsert;
