/**
 * Registry Schema
 * Validation schemas for registration, profile updates and scanning
 */

import { z } from "zod";

const indexKey = z
  .string()
  .trim()
  .min(3, "Index number must be at least 3 characters")
  .max(50, "Index number too long");

const contactAddress = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.email("Invalid email address"));

const displayName = z.string().trim().min(2, "Name is required").max(255, "Name too long");

const category = z
  .string()
  .trim()
  .min(2, "Subject combination is required")
  .max(255, "Subject combination too long");

const phone = z.string().trim().max(20, "Mobile number too long");

// ─────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────

export const registerSubjectBody = z.object({
  indexKey,
  contactAddress,
  displayName,
  category,
  // Empty string from a form means "no phone"
  phone: phone
    .optional()
    .nullable()
    .transform((v) => (v ? v : null)),
});

export const updateSubjectBody = z
  .object({
    indexKey: indexKey.optional(),
    contactAddress: contactAddress.optional(),
    displayName: displayName.optional(),
    category: category.optional(),
    phone: phone
      .optional()
      .nullable()
      .transform((v) => (v === "" ? null : v)),
  })
  .refine((data) => Object.values(data).some((v) => v !== undefined), {
    message: "At least one field must be provided",
  });

export const scanBody = z.object({
  indexKey,
});

export const indexKeyParam = z.object({
  indexKey,
});

export const listSubjectsQuery = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
  attended: z.stringbool().optional(),
});
