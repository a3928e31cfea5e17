/**
 * Registry Types
 * Value types and collaborator interfaces for the subject registry
 */

import type { DuplicateField } from "@/middleware/error-handler";

/**
 * A registered participant. Plain immutable value, mapped explicitly from
 * storage rows.
 */
export interface Subject {
  readonly id: string;
  readonly indexKey: string;
  readonly contactAddress: string;
  readonly displayName: string;
  readonly category: string;
  readonly phone: string | null;
  readonly attended: boolean;
  readonly registeredAt: Date;
  readonly updatedAt: Date;
}

export interface RegisterInput {
  indexKey: string;
  contactAddress: string;
  displayName: string;
  category: string;
  phone?: string | null;
}

// Fields UpdateProfile may overwrite; `phone: null` clears the phone number
export interface ProfilePatch {
  indexKey?: string;
  contactAddress?: string;
  displayName?: string;
  category?: string;
  phone?: string | null;
}

export interface ListOptions {
  page: number;
  limit: number;
  attended?: boolean;
}

export interface Pagination {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
}

export interface SubjectPage {
  data: Subject[];
  pagination: Pagination;
}

export interface AttendanceStats {
  total: number;
  attended: number;
  pending: number;
}

export interface ScanResult {
  subject: Subject;
  alreadyAttended: boolean;
}

// ─────────────────────────────────────────────────────────────
// Store contract
// ─────────────────────────────────────────────────────────────

export interface UniquenessOptions {
  uniqueContactAddress: boolean;
}

export type InsertOutcome =
  | { ok: true; subject: Subject }
  | { ok: false; reason: "duplicate"; field: DuplicateField };

export type UpdateOutcome =
  | { ok: true; before: Subject; after: Subject }
  | { ok: false; reason: "not_found" }
  | { ok: false; reason: "duplicate"; field: DuplicateField };

export interface AttendanceOutcome {
  subject: Subject;
  // true when this call performed the false -> true transition
  transitioned: boolean;
}

/**
 * Persistence for subjects. Every mutating method is one atomic unit in the
 * backing store; the registry never holds state of its own.
 */
export interface SubjectStore {
  insert(
    input: RegisterInput & { registeredAt: Date },
    options: UniquenessOptions,
  ): Promise<InsertOutcome>;

  update(
    indexKey: string,
    patch: ProfilePatch,
    updatedAt: Date,
    options: UniquenessOptions,
  ): Promise<UpdateOutcome>;

  /**
   * Flip attended to true if it is still false. Returns null when no subject
   * has the key.
   */
  markAttended(indexKey: string, at: Date): Promise<AttendanceOutcome | null>;

  findByIndexKey(indexKey: string): Promise<Subject | null>;

  list(options: ListOptions): Promise<{ items: Subject[]; total: number }>;

  countAttendance(): Promise<{ total: number; attended: number }>;
}

// ─────────────────────────────────────────────────────────────
// Ticket dispatch
// ─────────────────────────────────────────────────────────────

export interface DispatchRequest {
  contactAddress: string;
  displayName: string;
  indexKey: string;
}

/**
 * Hands dispatch requests to an out-of-band worker. The returned promise
 * settles once the handoff is done, not when the ticket is delivered.
 */
export interface TicketDispatcher {
  enqueue(request: DispatchRequest): Promise<void>;
}

/**
 * Renders and sends one ticket. Resolves false on failure instead of throwing.
 */
export type SendTicket = (
  contactAddress: string,
  displayName: string,
  indexKey: string,
) => Promise<boolean>;
