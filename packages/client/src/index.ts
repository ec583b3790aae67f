export * from '@llm-unify/core';
export {
  ChatClient,
  DEFAULT_TIMEOUT_MS,
  type ChatClientOptions,
  type CallOptions,
} from './client.js';
export {
  FetchTransport,
  finalizeHeaders,
  TRANSPORT_HEADERS,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from './transport.js';
export {
  loadConfig,
  parseConfig,
  applyEnvironment,
  getConfigPath,
  getDefaultConfig,
  API_KEY_ENV,
  CONFIG_PATH_ENV,
  type LlmUnifyConfig,
  type ProviderSettings,
} from './config.js';
