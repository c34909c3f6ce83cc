/**
 * CSV Exporter
 *
 * One flattened row per record. Nested structures (geo, languages,
 * positions, skills, educations) are reduced to scalar or joined-string
 * columns. Columns that are empty, `false` or `0` in every row are left
 * out; the remaining columns are sorted by name.
 */

import {
    getCurrentPosition,
    getFirstSchool,
    getGeo,
    getNamedList,
    getStringField,
    isRecord,
} from '../profile';
import type { ProfileRecord } from '../profile';
import type { FlatProfileRow } from './types';

const MAX_LANGUAGES = 3;
const MAX_SKILLS = 10;

function scalar(value: unknown, fallback: string | number | boolean): string | number | boolean {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        return value;
    }
    return fallback;
}

/**
 * Flatten a record into a CSV row.
 */
export function flattenProfile(profile: ProfileRecord): FlatProfileRow {
    const row: FlatProfileRow = {
        id: scalar(profile.id, ''),
        urn: profile.urn,
        username: profile.username,
        firstName: getStringField(profile, 'firstName'),
        lastName: getStringField(profile, 'lastName'),
        headline: getStringField(profile, 'headline'),
        summary: getStringField(profile, 'summary'),
        isCreator: scalar(profile.isCreator, false),
        isPremium: scalar(profile.isPremium, false),
        profilePicture: getStringField(profile, 'profilePicture'),
        depth_level: profile.depth_level,
        source_urn: profile.source_urn,
    };

    const geo = getGeo(profile);
    if (geo && isRecord(profile.geo) && Object.keys(profile.geo).length > 0) {
        row.location = geo.full ?? '';
        row.country = geo.country ?? '';
        row.city = geo.city ?? '';
    }

    const languages = getNamedList(profile, 'languages', MAX_LANGUAGES);
    if (languages.length > 0) {
        row.languages = languages.join(', ');
    }

    const position = getCurrentPosition(profile);
    if (position) {
        row.current_title = position.title ?? '';
        row.current_company = position.companyName ?? '';
        row.current_company_url = position.companyURL ?? '';
    }

    const skills = getNamedList(profile, 'skills', MAX_SKILLS);
    if (skills.length > 0) {
        row.skills = skills.join(', ');
    }

    const school = getFirstSchool(profile);
    if (school !== undefined) {
        row.education = school;
    }

    return row;
}

/** Falsy cells (`''`, `0`, `false`) do not keep a column alive */
function isEmptyCell(value: string | number | boolean | undefined): boolean {
    return value === undefined || value === '' || value === 0 || value === false;
}

/**
 * Quote a cell when it contains a delimiter, a quote or a line break
 */
export function escapeCsvCell(value: string | number | boolean | undefined): string {
    if (value === undefined) {
        return '';
    }
    const text = String(value);
    if (/[",\r\n]/.test(text)) {
        return `"${text.replace(/"/g, '""')}"`;
    }
    return text;
}

/**
 * CSV document of the records; '' when there are none.
 */
export function exportToCsv(profiles: ProfileRecord[]): string {
    if (profiles.length === 0) {
        return '';
    }

    const rows = profiles.map(flattenProfile);

    const columns = new Set<string>();
    for (const row of rows) {
        for (const [key, value] of Object.entries(row)) {
            if (!isEmptyCell(value)) {
                columns.add(key);
            }
        }
    }
    const header = [...columns].sort();

    const lines = [header.map(escapeCsvCell).join(',')];
    for (const row of rows) {
        lines.push(header.map(column => escapeCsvCell(row[column])).join(','));
    }
    return lines.join('\n') + '\n';
}
