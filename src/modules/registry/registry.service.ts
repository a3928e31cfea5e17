/**
 * Registry Service
 * Sole authority over subject creation, lookup and the attendance transition.
 *
 * Consistency lives in the store: the unique index settles concurrent
 * registrations, a conditional update settles concurrent scans. Ticket
 * dispatch is handed off and never awaited.
 */

import { createLogger } from "@/lib/logger";
import {
  DuplicateError,
  type DuplicateField,
  type FieldError,
  NotFoundError,
  ValidationError,
} from "@/middleware/error-handler";
import type {
  AttendanceStats,
  DispatchRequest,
  ListOptions,
  ProfilePatch,
  RegisterInput,
  ScanResult,
  Subject,
  SubjectPage,
  SubjectStore,
  TicketDispatcher,
  UniquenessOptions,
} from "./registry.types";

const logger = createLogger("registry");

export interface RegistryDependencies {
  store: SubjectStore;
  dispatcher: TicketDispatcher;
  options: UniquenessOptions;
  now?: () => Date;
}

const duplicateMessages: Record<DuplicateField, string> = {
  indexKey: "A subject with this index number is already registered",
  contactAddress: "A subject with this email address is already registered",
};

const REQUIRED_FIELDS = ["indexKey", "contactAddress", "displayName", "category"] as const;

function checkRequired(input: RegisterInput): FieldError[] {
  return REQUIRED_FIELDS.filter((field) => input[field].trim().length === 0).map((field) => ({
    field,
    message: `${field} is required`,
  }));
}

function checkPatch(patch: ProfilePatch): FieldError[] {
  const errors: FieldError[] = [];
  for (const field of REQUIRED_FIELDS) {
    const value = patch[field];
    if (value !== undefined && value.trim().length === 0) {
      errors.push({ field, message: `${field} cannot be empty` });
    }
  }
  return errors;
}

// Only a change to what the ticket shows, or where it goes, warrants a new one
function ticketChanged(before: Subject, after: Subject): boolean {
  return (
    before.contactAddress !== after.contactAddress ||
    before.displayName !== after.displayName ||
    before.indexKey !== after.indexKey
  );
}

export function createRegistry(deps: RegistryDependencies) {
  const { store, dispatcher, options } = deps;
  const now = deps.now ?? (() => new Date());

  function scheduleDispatch(subject: Subject): void {
    const request: DispatchRequest = {
      contactAddress: subject.contactAddress,
      displayName: subject.displayName,
      indexKey: subject.indexKey,
    };

    dispatcher.enqueue(request).catch((error: unknown) => {
      logger.error({ err: error, indexKey: subject.indexKey }, "Failed to enqueue ticket dispatch");
    });
  }

  return {
    /**
     * Register a new subject and schedule its ticket
     */
    async register(input: RegisterInput): Promise<Subject> {
      const errors = checkRequired(input);
      if (errors.length > 0) {
        throw new ValidationError("Validation failed", errors);
      }

      const outcome = await store.insert({ ...input, registeredAt: now() }, options);

      if (!outcome.ok) {
        throw new DuplicateError(outcome.field, duplicateMessages[outcome.field]);
      }

      logger.info({ indexKey: outcome.subject.indexKey }, "Subject registered");
      scheduleDispatch(outcome.subject);

      return outcome.subject;
    },

    /**
     * Overwrite descriptive fields of a subject
     */
    async updateProfile(indexKey: string, patch: ProfilePatch): Promise<Subject> {
      const errors = checkPatch(patch);
      if (errors.length > 0) {
        throw new ValidationError("Validation failed", errors);
      }
      if (Object.values(patch).every((value) => value === undefined)) {
        throw new ValidationError("At least one field must be provided");
      }

      const outcome = await store.update(indexKey, patch, now(), options);

      if (!outcome.ok) {
        if (outcome.reason === "not_found") {
          throw new NotFoundError(`No subject registered with index number: ${indexKey}`);
        }
        throw new DuplicateError(outcome.field, duplicateMessages[outcome.field]);
      }

      if (ticketChanged(outcome.before, outcome.after)) {
        scheduleDispatch(outcome.after);
      }

      return outcome.after;
    },

    /**
     * Record attendance. Idempotent: a repeated scan reports alreadyAttended.
     */
    async scan(indexKey: string): Promise<ScanResult> {
      const outcome = await store.markAttended(indexKey, now());

      if (!outcome) {
        throw new NotFoundError(`No subject registered with index number: ${indexKey}`);
      }

      if (outcome.transitioned) {
        logger.info({ indexKey }, "Attendance recorded");
      }

      return { subject: outcome.subject, alreadyAttended: !outcome.transitioned };
    },

    async lookup(indexKey: string): Promise<Subject> {
      const subject = await store.findByIndexKey(indexKey);

      if (!subject) {
        throw new NotFoundError(`No subject with index number: ${indexKey}`);
      }

      return subject;
    },

    async listAll(query: ListOptions): Promise<SubjectPage> {
      const { page, limit } = query;
      const { items, total } = await store.list(query);

      return {
        data: items,
        pagination: {
          page,
          limit,
          total,
          totalPages: Math.ceil(total / limit),
        },
      };
    },

    async stats(): Promise<AttendanceStats> {
      const { total, attended } = await store.countAttendance();
      return { total, attended, pending: total - attended };
    },
  };
}

export type Registry = ReturnType<typeof createRegistry>;
