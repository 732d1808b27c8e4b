export const HEC_EVENT_PATH = '/services/collector/event/1.0';

export const AUTHORIZATION_SCHEME = 'Splunk';

export const CHANNEL_HEADER = 'X-Splunk-Request-Channel';

export const CONTENT_TYPE = 'application/json; charset=utf-8';

export const DEFAULT_SOURCETYPE = '_json';

export const DEFAULT_SOURCE = '${logger}';

export const DEFAULT_MAX_CONNECTIONS_PER_SERVER = 10;

// Metadata cache is cleared once it holds more distinct sources than this
export const METADATA_CACHE_LIMIT = 1000;

export const HttpStatus = {
    OK: 200,
    BAD_REQUEST: 400,
    NOT_ACCEPTABLE: 406
} as const;
