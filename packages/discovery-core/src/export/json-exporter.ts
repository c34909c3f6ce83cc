/**
 * JSON Exporter
 *
 * Serializes the record list verbatim, and reads such a file back.
 */

import { ErrorCode, ProfileGraphError } from '../errors';
import { isRecord, toProfileData } from '../profile';
import type { ProfileRecord } from '../profile';

/**
 * Pretty-printed JSON (2-space indent) of the record list
 */
export function exportToJson(profiles: ProfileRecord[]): string {
    return JSON.stringify(profiles, null, 2);
}

/**
 * Parse a JSON export back into records.
 *
 * Accepts a bare record list or an object with a `profiles` list. Entries
 * without `urn` and `username` are skipped; a missing `depth_level` reads
 * as 0 and a missing `source_urn` as ''.
 *
 * @throws ProfileGraphError (INPUT_INVALID) when the content is not such a document
 */
export function parseJsonExport(content: string): ProfileRecord[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch (error) {
        throw new ProfileGraphError('Export file is not valid JSON', {
            code: ErrorCode.INPUT_INVALID,
            cause: error,
        });
    }

    const entries: unknown = isRecord(parsed) ? parsed.profiles : parsed;
    if (!Array.isArray(entries)) {
        throw new ProfileGraphError('Export file does not contain a profile list', {
            code: ErrorCode.INPUT_INVALID,
        });
    }

    const records: ProfileRecord[] = [];
    for (const entry of entries) {
        const profile = toProfileData(entry);
        if (!profile) {
            continue;
        }
        const depth = profile.depth_level;
        const source = profile.source_urn;
        records.push({
            ...profile,
            depth_level: typeof depth === 'number' && Number.isInteger(depth) && depth >= 0 ? depth : 0,
            source_urn: typeof source === 'string' ? source : '',
        });
    }
    return records;
}
