export { ProfileGateway } from './profile-gateway';
export {
    TERMINAL_FAILURE_MARKERS,
    RETRYABLE_CODES,
    isRetryableFailure,
    isTerminalMessage,
    isRateLimitMessage,
    classifyResponse,
    classifyTransportError,
} from './response-classifier';
export type {
    ProfileApi,
    FetchResult,
    BatchFetchOutcome,
    ProfileGatewayOptions,
} from './types';
