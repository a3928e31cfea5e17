/**
 * Registry Store
 * Drizzle/PostgreSQL implementation of SubjectStore
 */

import { and, count, desc, eq, ne, type SQL, sql } from "drizzle-orm";
import type { Database } from "@/db";
import { type NewSubjectRow, type SubjectRow, subjects } from "@/db/schema";
import { TransientStoreError } from "@/middleware/error-handler";
import type {
  AttendanceOutcome,
  InsertOutcome,
  ListOptions,
  ProfilePatch,
  Subject,
  SubjectStore,
  UpdateOutcome,
} from "./registry.types";

const UNIQUE_VIOLATION = "23505";

// Explicit row -> value mapping; rows never leave this module
export function toSubject(row: SubjectRow): Subject {
  return Object.freeze({
    id: row.id,
    indexKey: row.indexKey,
    contactAddress: row.contactAddress,
    displayName: row.displayName,
    category: row.category,
    phone: row.phone,
    attended: row.attended,
    registeredAt: row.registeredAt,
    updatedAt: row.updatedAt,
  });
}

function toPatchRow(patch: ProfilePatch): Partial<NewSubjectRow> {
  const row: Partial<NewSubjectRow> = {};
  if (patch.indexKey !== undefined) row.indexKey = patch.indexKey;
  if (patch.contactAddress !== undefined) row.contactAddress = patch.contactAddress;
  if (patch.displayName !== undefined) row.displayName = patch.displayName;
  if (patch.category !== undefined) row.category = patch.category;
  if (patch.phone !== undefined) row.phone = patch.phone;
  return row;
}

/**
 * Find the SQLSTATE of a postgres error, looking through drizzle's wrappers
 */
export function pgErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5; depth++) {
    if (typeof current !== "object" || current === null) return undefined;
    if ("code" in current && typeof current.code === "string" && /^[0-9A-Z]{5}$/.test(current.code)) {
      return current.code;
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return undefined;
}

// Serializes writers claiming the same contact address until commit
function contactAddressLock(contactAddress: string): SQL {
  return sql`SELECT pg_advisory_xact_lock(hashtext(${`contact:${contactAddress}`}))`;
}

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw new TransientStoreError(`Subject store ${operation} failed`, error);
  }
}

export function createSubjectStore(db: Database): SubjectStore {
  async function findByIndexKey(indexKey: string): Promise<Subject | null> {
    const [row] = await guard("lookup", () =>
      db.select().from(subjects).where(eq(subjects.indexKey, indexKey)).limit(1),
    );
    return row ? toSubject(row) : null;
  }

  return {
    async insert(input, options): Promise<InsertOutcome> {
      const values: NewSubjectRow = {
        indexKey: input.indexKey,
        contactAddress: input.contactAddress,
        displayName: input.displayName,
        category: input.category,
        phone: input.phone ?? null,
        attended: false,
        registeredAt: input.registeredAt,
        updatedAt: input.registeredAt,
      };

      try {
        if (!options.uniqueContactAddress) {
          const [row] = await db.insert(subjects).values(values).returning();
          return { ok: true, subject: toSubject(row) };
        }

        return await db.transaction(async (tx): Promise<InsertOutcome> => {
          await tx.execute(contactAddressLock(values.contactAddress));

          const [taken] = await tx
            .select({ id: subjects.id })
            .from(subjects)
            .where(eq(subjects.contactAddress, values.contactAddress))
            .limit(1);

          if (taken) {
            return { ok: false, reason: "duplicate", field: "contactAddress" };
          }

          const [row] = await tx.insert(subjects).values(values).returning();
          return { ok: true, subject: toSubject(row) };
        });
      } catch (error) {
        if (pgErrorCode(error) === UNIQUE_VIOLATION) {
          return { ok: false, reason: "duplicate", field: "indexKey" };
        }
        throw new TransientStoreError("Subject store insert failed", error);
      }
    },

    async update(indexKey, patch, updatedAt, options): Promise<UpdateOutcome> {
      try {
        return await db.transaction(async (tx): Promise<UpdateOutcome> => {
          const [current] = await tx
            .select()
            .from(subjects)
            .where(eq(subjects.indexKey, indexKey))
            .limit(1)
            .for("update");

          if (!current) {
            return { ok: false, reason: "not_found" };
          }

          const before = toSubject(current);
          const newAddress = patch.contactAddress;

          if (
            options.uniqueContactAddress &&
            newAddress !== undefined &&
            newAddress !== before.contactAddress
          ) {
            await tx.execute(contactAddressLock(newAddress));

            const [taken] = await tx
              .select({ id: subjects.id })
              .from(subjects)
              .where(and(eq(subjects.contactAddress, newAddress), ne(subjects.id, before.id)))
              .limit(1);

            if (taken) {
              return { ok: false, reason: "duplicate", field: "contactAddress" };
            }
          }

          const [row] = await tx
            .update(subjects)
            .set({ ...toPatchRow(patch), updatedAt })
            .where(eq(subjects.id, before.id))
            .returning();

          return { ok: true, before, after: toSubject(row) };
        });
      } catch (error) {
        if (pgErrorCode(error) === UNIQUE_VIOLATION) {
          return { ok: false, reason: "duplicate", field: "indexKey" };
        }
        throw new TransientStoreError("Subject store update failed", error);
      }
    },

    async markAttended(indexKey, at): Promise<AttendanceOutcome | null> {
      // Row lock on UPDATE lets exactly one concurrent caller see attended = false
      const [updated] = await guard("scan", () =>
        db
          .update(subjects)
          .set({ attended: true, updatedAt: at })
          .where(and(eq(subjects.indexKey, indexKey), eq(subjects.attended, false)))
          .returning(),
      );

      if (updated) {
        return { subject: toSubject(updated), transitioned: true };
      }

      const existing = await findByIndexKey(indexKey);
      return existing ? { subject: existing, transitioned: false } : null;
    },

    findByIndexKey,

    async list(options: ListOptions) {
      const { page, limit, attended } = options;
      const where = attended === undefined ? undefined : eq(subjects.attended, attended);

      const [rows, [totals]] = await guard("list", () =>
        Promise.all([
          db
            .select()
            .from(subjects)
            .where(where)
            .orderBy(desc(subjects.registeredAt), desc(subjects.id))
            .limit(limit)
            .offset((page - 1) * limit),
          db.select({ total: count() }).from(subjects).where(where),
        ]),
      );

      return { items: rows.map(toSubject), total: totals?.total ?? 0 };
    },

    async countAttendance() {
      const [totals] = await guard("count", () =>
        db
          .select({
            total: count(),
            attended: sql<number>`count(*) filter (where ${subjects.attended})`.mapWith(Number),
          })
          .from(subjects),
      );

      return { total: totals?.total ?? 0, attended: totals?.attended ?? 0 };
    },
  };
}
