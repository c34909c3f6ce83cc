/**
 * Profile Types
 *
 * Profiles come from the remote API as loosely structured objects. Only the
 * identifying fields are validated; everything else is carried verbatim and
 * read through the accessors in `profile-fields.ts`.
 */

/**
 * Full profile payload as returned by the remote API.
 * `urn` and `username` are guaranteed non-empty.
 */
export interface ProfileData {
    /** Globally unique identity key; the deduplication key of a run */
    urn: string;
    /** Public handle used to fetch the full profile */
    username: string;
    [field: string]: unknown;
}

/**
 * A discovered profile as recorded by the discovery engine.
 */
export interface ProfileRecord extends ProfileData {
    /** BFS level at which the profile was first discovered (0 = seed) */
    depth_level: number;
    /** URN of the profile whose expansion discovered this one; '' for seeds */
    source_urn: string;
}

/**
 * Entry of a similar-profiles lookup.
 * Kept only when both `urn` and `id` are present.
 */
export interface SimilarProfile {
    urn: string;
    id: string | number;
    username?: string;
    publicIdentifier?: string;
    [field: string]: unknown;
}

/** Geographic information block of a profile */
export interface GeoInfo {
    full?: string;
    country?: string;
    city?: string;
}

/** First-position summary used by displays and exporters */
export interface PositionSummary {
    title?: string;
    companyName?: string;
    companyURL?: string;
}
