/**
 * Catalog Validation Schemas
 *
 * Zod schemas checked by the stores before anything is written.
 */

import { z } from 'zod';

// =============================================================================
// Shared
// =============================================================================

const IdSchema = z.string().min(1, 'Identifier is required');
const NameSchema = z.string().min(1, 'Name is required').max(1024, 'Name too long');
const LocatorSchema = z.string().min(1, 'Locator is required');
const ValidDateSchema = z.date({ invalid_type_error: 'Expected a valid date' });

const AuditDatesSchema = {
  createdDate: ValidDateSchema.optional(),
  lastModifiedDate: ValidDateSchema.optional(),
};

/**
 * YYYY-MM-DD that is an actual calendar day
 */
export const CalendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00.000Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
  }, 'Not a calendar date');

// =============================================================================
// Entity Schemas
// =============================================================================

export const LibrarySchema = z.object({
  id: IdSchema,
  name: NameSchema,
  root: LocatorSchema,
  ...AuditDatesSchema,
});

export const SeriesSchema = z.object({
  id: IdSchema,
  name: NameSchema,
  url: LocatorSchema,
  fileLastModified: ValidDateSchema,
  libraryId: IdSchema,
  ...AuditDatesSchema,
});

export const BookSchema = z.object({
  id: IdSchema,
  name: NameSchema,
  url: LocatorSchema,
  fileLastModified: ValidDateSchema,
  fileSize: z.number().int('File size must be whole bytes').nonnegative('File size cannot be negative'),
  seriesId: IdSchema,
  libraryId: IdSchema,
  ...AuditDatesSchema,
});

// =============================================================================
// Metadata Schemas
// =============================================================================

export const AuthorSchema = z.object({
  name: z.string().min(1, 'Author name is required'),
  role: z.string(),
});

/**
 * Tags are stored trimmed; two tags that trim to the same value are
 * rejected rather than merged.
 */
const TagsSchema = z
  .set(z.string())
  .superRefine((tags, ctx) => {
    const seen = new Set<string>();
    for (const tag of tags) {
      const trimmed = tag.trim();
      if (seen.has(trimmed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate tag "${trimmed}"` });
      }
      seen.add(trimmed);
    }
  })
  .pipe(z.set(z.string().trim().min(1, 'Tags cannot be blank')));

export const BookMetadataSchema = z.object({
  bookId: IdSchema,
  title: z.string(),
  summary: z.string(),
  number: z.string(),
  numberSort: z.number().finite('numberSort must be a finite number'),
  releaseDate: CalendarDateSchema.nullable(),
  authors: z.array(AuthorSchema),
  tags: TagsSchema,
  titleLock: z.boolean(),
  summaryLock: z.boolean(),
  numberLock: z.boolean(),
  numberSortLock: z.boolean(),
  releaseDateLock: z.boolean(),
  authorsLock: z.boolean(),
  tagsLock: z.boolean(),
  ...AuditDatesSchema,
});

/**
 * Format zod issues as "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
