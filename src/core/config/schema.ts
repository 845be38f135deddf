/**
 * Settings Zod schemas and validation.
 *
 * Every key has a default, so an empty settings file (or none) resolves
 * to a working setup: `tabledrift.db` holding a `product` table.
 */
import { z } from 'zod';


/**
 * Table and column names must already be valid identifiers in settings.
 */
const IdentifierSchema = z
    .string()
    .min(1, 'Name is required')
    .regex(
        /^[A-Za-z0-9_]+$/,
        'Name must contain only letters, numbers, and underscores',
    );

/**
 * Log levels, quietest first.
 */
export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

/**
 * A seed column created with the table.
 */
export const ColumnSpecSchema = z.object({
    name: IdentifierSchema,
    type: z.string().min(1, 'Column type is required'),
    nullable: z.boolean().optional(),
    default: z.union([z.string(), z.number(), z.null()]).optional(),
});

/**
 * Seed columns of the default product table.
 */
export const DEFAULT_SEED_COLUMNS: z.input<typeof ColumnSpecSchema>[] = [
    { name: 'name', type: 'TEXT', nullable: false, default: '' },
    { name: 'description', type: 'TEXT' },
    { name: 'price_cents', type: 'INTEGER', nullable: false, default: 0 },
    { name: 'stock', type: 'INTEGER', nullable: false, default: 0 },
    { name: 'category', type: 'TEXT' },
    { name: 'image_url', type: 'TEXT' },
];

const TableSchema = z.object({
    name: IdentifierSchema.default('product'),
    primaryKey: IdentifierSchema.default('id'),
    columns: z.array(ColumnSpecSchema).default(DEFAULT_SEED_COLUMNS),
});

const LedgerSchema = z.object({
    /** Defaults to `<table>_field_versions` */
    table: IdentifierSchema.optional(),
});

const GuardsSchema = z.object({
    /** Refuse destructive operations unless the caller opts in */
    protected: z.boolean().default(false),

    /** Allow operator-issued raw statements */
    allowRawStatements: z.boolean().default(false),
});

const LockSchema = z.object({
    enabled: z.boolean().default(true),
    timeout: z.number().int().positive().default(5 * 60 * 1000),
    wait: z.boolean().default(false),
    waitTimeout: z.number().int().positive().default(30 * 1000),
});

const LoggingSchema = z.object({
    enabled: z.boolean().default(true),
    level: LogLevelSchema.default('info'),

    /** Log file path, relative to the project root */
    file: z.string().min(1).optional(),
});

/**
 * Full settings schema.
 */
export const SettingsSchema = z.object({
    database: z.string().min(1, 'Database path is required').default('tabledrift.db'),
    table: TableSchema.default({}),
    ledger: LedgerSchema.default({}),
    actor: z.string().min(1, 'Actor is required').default('tabledrift'),
    guards: GuardsSchema.default({}),
    lock: LockSchema.default({}),
    logging: LoggingSchema.default({}),
});

// ─────────────────────────────────────────────────────────────
// Type Exports
// ─────────────────────────────────────────────────────────────

export type Settings = z.output<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

// ─────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────

/**
 * Error thrown when settings validation fails.
 *
 * Carries the path of the first failing field and all issues.
 */
export class ConfigValidationError extends Error {

    override readonly name = 'ConfigValidationError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);

    }

}

/**
 * Parse and validate settings, applying defaults for missing fields.
 *
 * @throws ConfigValidationError if validation fails
 *
 * @example
 * ```typescript
 * const settings = parseSettings({ table: { name: 'book' } })
 * // settings.table.primaryKey === 'id'
 * // settings.lock.enabled === true
 * ```
 */
export function parseSettings(input: unknown): Settings {

    const result = SettingsSchema.safeParse(input);

    if (!result.success) {

        const firstIssue = result.error.issues[0];
        const field = firstIssue?.path.join('.') || 'unknown';

        throw new ConfigValidationError(
            `Invalid setting '${field}': ${firstIssue?.message ?? 'validation failed'}`,
            field,
            result.error.issues,
        );

    }

    return result.data;

}
