/**
 * Inventory Input Schemas
 *
 * Zod schemas for the form submissions the tracker accepts. Field names match the
 * form fields (`location_id`, `note_content`), so a parsed request body can be passed
 * straight through.
 *
 * Form posts send every field as a string; blank optional fields become null.
 */

import { z } from 'zod';

// ============================================
// FIELD LIMITS
// ============================================

export const SERIAL_MAX_LENGTH = 50;
export const STOCK_FIELD_MAX_LENGTH = 50;
export const NOTE_MAX_LENGTH = 500;
/** Ids are 32-bit integer columns */
export const MAX_ID = 2147483647;

// ============================================
// FIELD HELPERS
// ============================================

/** Optional text field: absent, null or blank → null */
const optionalText = (max: number) =>
    z
        .string()
        .trim()
        .max(max, `Must be at most ${max} characters`)
        .nullish()
        .transform((value) => (value ? value : null));

/** Location reference from a form (string) or JSON (number); blank → null */
export const locationIdSchema = z
    .union([z.number(), z.string().trim()])
    .nullish()
    .transform((value) => (value === undefined || value === null || value === '' ? null : Number(value)))
    .pipe(
        z
            .number({ invalid_type_error: 'Location must be a number' })
            .int()
            .positive()
            .max(MAX_ID, 'Location does not exist')
            .nullable()
    );

// ============================================
// STOCK
// ============================================

export const AddStockSchema = z.object({
    serial: z
        .string({ required_error: 'Serial is required' })
        .trim()
        .min(1, 'Serial is required')
        .max(SERIAL_MAX_LENGTH, `Serial must be at most ${SERIAL_MAX_LENGTH} characters`),
    mfg: optionalText(STOCK_FIELD_MAX_LENGTH),
    dimen: optionalText(STOCK_FIELD_MAX_LENGTH),
    type: optionalText(STOCK_FIELD_MAX_LENGTH),
    modifier: optionalText(STOCK_FIELD_MAX_LENGTH),
    location_id: locationIdSchema,
});

export type AddStockBody = z.input<typeof AddStockSchema>;
export type AddStockInput = z.output<typeof AddStockSchema>;

// ============================================
// NOTES
// ============================================

export const AddNoteSchema = z.object({
    note_content: z
        .string({ required_error: 'Note content is required' })
        .max(NOTE_MAX_LENGTH, `Note must be at most ${NOTE_MAX_LENGTH} characters`)
        .refine((content) => content.trim().length > 0, 'Note content is required'),
});

export type AddNoteBody = z.input<typeof AddNoteSchema>;
export type AddNoteInput = z.output<typeof AddNoteSchema>;

// ============================================
// AUTH
// ============================================

export const LoginSchema = z.object({
    username: z.string().trim().min(1, 'Username is required'),
    password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof LoginSchema>;
