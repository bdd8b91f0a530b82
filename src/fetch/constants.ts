/** Transport limits shared by the http client and the harvest config. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 20000;
export const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB
