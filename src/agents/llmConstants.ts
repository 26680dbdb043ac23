export const LLM_PROVIDER_ENV_VAR = 'LLM_PROVIDER';
export const OPENAI_PROVIDER = 'openai';
export const LITELLM_PROVIDER = 'litellm';
export const OPENAI_API_KEY_ENV_VAR = 'OPENAI_API_KEY';
export const LITELLM_API_KEY_ENV_VAR = 'LITELLM_API_KEY'; // Key for LiteLLM Proxy/Service
export const BASE_URL_ENV_VAR = 'BASE_URL';
export const DEFAULT_MODEL_NAME = 'gpt-4o';
// A low temperature keeps the directive format stable
export const DEFAULT_TEMPERATURE = 0.2;
export const DEFAULT_MAX_TOKENS = 1500;
