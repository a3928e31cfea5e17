// Database Schema - Tables

import { boolean, index, pgTable, text, timestamp, uniqueIndex, uuid } from "drizzle-orm/pg-core";

// ═══════════════════════════════════════════════════════════════════════════
// SUBJECTS (registered participants)
// ═══════════════════════════════════════════════════════════════════════════

export const subjects = pgTable(
  "subjects",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    // QR payload and attendance lookup key
    indexKey: text("index_key").notNull(),
    contactAddress: text("contact_address").notNull(),
    displayName: text("display_name").notNull(),
    category: text("category").notNull(),
    phone: text("phone"),
    attended: boolean("attended").notNull().default(false),
    registeredAt: timestamp("registered_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex("subjects_index_key_unique").on(table.indexKey),
    // Uniqueness of contact addresses is a runtime option, enforced under an advisory lock
    index("subjects_contact_address_idx").on(table.contactAddress),
    index("subjects_registered_at_idx").on(table.registeredAt),
  ],
);

export type SubjectRow = typeof subjects.$inferSelect;
export type NewSubjectRow = typeof subjects.$inferInsert;
