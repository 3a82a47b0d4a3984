/**
 * Centralized Environment Variable Validation
 *
 * This module validates ALL environment variables at startup using Zod.
 * If validation fails, the application will fail fast with clear error messages.
 *
 * USAGE:
 * - Import `env` for type-safe access: `import { env } from './config/env.js'`
 * - Engine services never read this directly; index.ts passes values in
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 * 3. Document it in .env.example
 */

// Load dotenv FIRST - must happen before we access process.env
// This is necessary because ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
    // ----------------------------------------
    // SERVER
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Server port */
    PORT: z.coerce.number().int().positive().default(3001),

    /** Log level override (defaults: debug in development, info in production) */
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

    // ----------------------------------------
    // STORE
    // ----------------------------------------

    /** postgres:// connection string, or an embedded PGlite data directory (":memory:" for none) */
    DATABASE_URL: z.string().min(1).default('./stockledger-data'),

    /** Connection-wait and statement timeout for the store, in ms */
    STORAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

    // ----------------------------------------
    // STOCK RULES
    // ----------------------------------------

    /** Quantity at or below which low-stock notifications fire */
    LOW_STOCK_THRESHOLD: z.coerce.number().int().nonnegative().default(5),

    /** Invoice VAT as a fraction (0.13 = 13%) */
    VAT_RATE: z.coerce.number().min(0).max(1).default(0.13),

    /** Periodic drift reconciliation interval in ms; 0 runs it only at start-up */
    RECONCILE_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Parsed and validated environment variables.
 *
 * Exits the process at startup if any variable fails validation,
 * listing every failing variable.
 */
function parseEnv(): Env {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
        const issues = result.error.issues.map(issue => {
            const path = issue.path.join('.');
            return `  - ${path}: ${issue.message}`;
        }).join('\n');
        console.error('Environment validation failed:\n' + issues);
        process.exit(1);
    }
    return result.data;
}

export const env = parseEnv();
