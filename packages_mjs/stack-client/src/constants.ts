export const SCHEME_HTTP = "http";
export const SCHEME_HTTPS = "https";

export const VALID_SCHEMES = [SCHEME_HTTP, SCHEME_HTTPS] as const;

export const DEFAULT_SCHEME = SCHEME_HTTPS;

export const ENV_WATSON_ADDRESS = "watson_ADDRESS";
export const ENV_WATSON_SCHEME = "watson_SCHEME";
export const ENV_WATSON_STACK = "watson_STACK";

export const STACK_HEADER = "x-watson-stack";

export const API_PREFIX = "/v1/projects";
