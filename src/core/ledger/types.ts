/**
 * Versioning ledger types.
 */
import { z } from 'zod';


/**
 * One field-level change.
 *
 * Entries are append-only. Values are canonical strings and null (no
 * value) is distinct from the empty string.
 */
export interface VersionEntry {

    id: number;
    recordId: number;
    fieldName: string;
    oldValue: string | null;
    newValue: string | null;
    timestamp: Date;
    actor: string;

}

/**
 * A change to append, before it has an id or timestamp.
 */
export interface VersionDiff {

    field: string;
    oldValue: string | null;
    newValue: string | null;

}

/**
 * Entry attributes a listing can be sorted by.
 */
export const VERSION_SORT_FIELDS = [
    'id',
    'recordId',
    'fieldName',
    'oldValue',
    'newValue',
    'timestamp',
    'actor',
] as const;

export type VersionSortField = (typeof VERSION_SORT_FIELDS)[number];

/**
 * Listing options.
 *
 * `limit` is required; the ledger never returns an unbounded listing.
 */
export const ListVersionsOptionsSchema = z.object({
    recordId: z.number().int().optional(),
    fieldName: z.string().min(1).optional(),
    limit: z.number().int().positive(),
    sortField: z.enum(VERSION_SORT_FIELDS).default('id'),
    order: z.enum(['asc', 'desc']).default('desc'),
});

export type ListVersionsOptions = z.input<typeof ListVersionsOptionsSchema>;
