export type {
    ProfileData,
    ProfileRecord,
    SimilarProfile,
    GeoInfo,
    PositionSummary,
} from './types';

export {
    isRecord,
    getStringField,
    getBooleanField,
    getDisplayName,
    getGeo,
    getCurrentPosition,
    getNamedList,
    getFirstSchool,
    toProfileData,
    toSimilarProfile,
    getCandidateHandle,
} from './profile-fields';
