/**
 * Profile Field Accessors
 *
 * Narrowing readers over the unvalidated parts of a profile payload.
 * Displays and exporters read profile fields only through these helpers.
 */

import type { GeoInfo, PositionSummary, ProfileData, SimilarProfile } from './types';

/**
 * Type guard for plain objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
    return typeof value === 'string' && value.length > 0;
}

/**
 * Read a string field; non-string values yield the fallback
 */
export function getStringField(profile: Record<string, unknown>, field: string, fallback = ''): string {
    const value = profile[field];
    return typeof value === 'string' ? value : fallback;
}

/**
 * Read a boolean field; non-boolean values yield false
 */
export function getBooleanField(profile: Record<string, unknown>, field: string): boolean {
    return profile[field] === true;
}

/**
 * Display name from first and last name, falling back to the username
 */
export function getDisplayName(profile: ProfileData, fallback?: string): string {
    const name = `${getStringField(profile, 'firstName')} ${getStringField(profile, 'lastName')}`.trim();
    if (name) {
        return name;
    }
    return fallback ?? profile.username;
}

/**
 * Geographic block, or undefined when absent or malformed
 */
export function getGeo(profile: Record<string, unknown>): GeoInfo | undefined {
    const geo = profile.geo;
    if (!isRecord(geo)) {
        return undefined;
    }
    return {
        full: typeof geo.full === 'string' ? geo.full : undefined,
        country: typeof geo.country === 'string' ? geo.country : undefined,
        city: typeof geo.city === 'string' ? geo.city : undefined,
    };
}

/**
 * The first (current) position, or undefined
 */
export function getCurrentPosition(profile: Record<string, unknown>): PositionSummary | undefined {
    const positions = profile.position;
    if (!Array.isArray(positions) || positions.length === 0) {
        return undefined;
    }
    const first: unknown = positions[0];
    if (!isRecord(first)) {
        return undefined;
    }
    return {
        title: typeof first.title === 'string' ? first.title : undefined,
        companyName: typeof first.companyName === 'string' ? first.companyName : undefined,
        companyURL: typeof first.companyURL === 'string' ? first.companyURL : undefined,
    };
}

/**
 * `name` values of a list field such as `skills` or `languages`, up to `limit`
 */
export function getNamedList(profile: Record<string, unknown>, field: string, limit: number): string[] {
    const list = profile[field];
    if (!Array.isArray(list)) {
        return [];
    }
    return list
        .slice(0, limit)
        .map((entry: unknown) => (isRecord(entry) && typeof entry.name === 'string' ? entry.name : ''));
}

/**
 * Name of the first school in `educations`
 */
export function getFirstSchool(profile: Record<string, unknown>): string | undefined {
    const educations = profile.educations;
    if (!Array.isArray(educations) || educations.length === 0) {
        return undefined;
    }
    const first: unknown = educations[0];
    return isRecord(first) && typeof first.schoolName === 'string' ? first.schoolName : undefined;
}

/**
 * Validate a full-profile payload: both `urn` and `username` must be non-empty strings.
 */
export function toProfileData(data: unknown): ProfileData | undefined {
    if (!isRecord(data)) {
        return undefined;
    }
    const { urn, username } = data;
    if (!isNonEmptyString(urn) || !isNonEmptyString(username)) {
        return undefined;
    }
    return { ...data, urn, username };
}

/**
 * Validate a similar-profiles entry: needs a non-empty `urn` and an `id`.
 */
export function toSimilarProfile(entry: unknown): SimilarProfile | undefined {
    if (!isRecord(entry)) {
        return undefined;
    }
    const { urn, id } = entry;
    if (!isNonEmptyString(urn)) {
        return undefined;
    }
    if (!(isNonEmptyString(id) || (typeof id === 'number' && id !== 0))) {
        return undefined;
    }
    return {
        ...entry,
        urn,
        id,
        username: isNonEmptyString(entry.username) ? entry.username : undefined,
        publicIdentifier: isNonEmptyString(entry.publicIdentifier) ? entry.publicIdentifier : undefined,
    };
}

/**
 * Handle used to fetch a candidate's full profile: `username`, else `publicIdentifier`
 */
export function getCandidateHandle(candidate: SimilarProfile): string | undefined {
    return candidate.username || candidate.publicIdentifier || undefined;
}
