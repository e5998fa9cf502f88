// ss2v2ray/src/lib/loader.ts
// Read the Shadowsocks JSON export.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { ServerRecord } from 'libregion';
import { describeCause, InputError } from './errors.js';
import type { RunLogger } from './logger.js';

/**
 * One entry of the export. Extra keys (`plugin`, `group`, ...) pass through.
 */
export const serverRecordSchema = z.object({
    remarks: z.string().min(1),
    server: z.string().min(1),
    server_port: z.number().int().min(1).max(65535),
    method: z.string().min(1),
    password: z.string(),
}).passthrough();

export interface LoadedRecords {
    records: ServerRecord[];
    /** Entries dropped for missing or malformed required fields. */
    invalidCount: number;
}

function readInput(path: string): string {
    try {
        return readFileSync(path, 'utf8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new InputError(path, 'not found', { cause: error });
        }
        throw new InputError(path, `could not be read: ${describeCause(error)}`, { cause: error });
    }
}

/**
 * Load and validate server records. A missing file, invalid JSON or a
 * non-array top level is fatal; individual bad entries are skipped.
 */
export function loadServerRecords(path: string, logger?: RunLogger): LoadedRecords {
    const text = readInput(path);

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (error) {
        throw new InputError(path, `is not valid JSON: ${describeCause(error)}`, { cause: error });
    }
    if (!Array.isArray(parsed)) {
        throw new InputError(path, 'must contain a JSON array of server records');
    }

    const records: ServerRecord[] = [];
    for (const entry of parsed) {
        const result = serverRecordSchema.safeParse(entry);
        if (result.success) records.push(result.data);
    }
    const invalidCount = parsed.length - records.length;

    logger?.info(`Successfully loaded ${parsed.length} nodes from ${path}`);
    if (invalidCount > 0) {
        logger?.debug(`Skipped ${invalidCount} entries missing required fields`);
    }
    return { records, invalidCount };
}
