import type { ProtocolCodec, ProtocolId, VendorId, VendorProfile } from './types/provider.js';
import { createAliyunCodec } from './codecs/aliyun.js';
import { createAnthropicCodec } from './codecs/anthropic.js';
import { createGeminiCodec } from './codecs/gemini.js';
import { createOpenAICodec } from './codecs/openai.js';

const VENDORS: Record<VendorId, VendorProfile> = {
  openai: {
    id: 'openai',
    displayName: 'OpenAI',
    protocol: 'openai',
    defaultBaseUrl: 'https://api.openai.com/v1',
    images: 'full',
    requiresApiKey: true,
    listsModels: true,
  },
  deepseek: {
    id: 'deepseek',
    displayName: 'DeepSeek',
    protocol: 'openai',
    defaultBaseUrl: 'https://api.deepseek.com/v1',
    images: 'none',
    requiresApiKey: true,
    listsModels: true,
  },
  moonshot: {
    id: 'moonshot',
    displayName: 'Moonshot',
    protocol: 'openai',
    defaultBaseUrl: 'https://api.moonshot.cn/v1',
    images: 'none',
    requiresApiKey: true,
    listsModels: true,
  },
  zhipu: {
    id: 'zhipu',
    displayName: 'Zhipu GLM',
    protocol: 'openai',
    defaultBaseUrl: 'https://open.bigmodel.cn/api/paas/v4',
    images: 'full',
    requiresApiKey: true,
    listsModels: false,
  },
  volcengine: {
    id: 'volcengine',
    displayName: 'Volcengine Ark',
    protocol: 'openai',
    defaultBaseUrl: 'https://ark.cn-beijing.volces.com/api/v3',
    images: 'full',
    requiresApiKey: true,
    listsModels: false,
  },
  ollama: {
    id: 'ollama',
    displayName: 'Ollama',
    protocol: 'openai',
    defaultBaseUrl: 'http://localhost:11434/v1',
    images: 'full',
    requiresApiKey: false,
    listsModels: true,
  },
  anthropic: {
    id: 'anthropic',
    displayName: 'Anthropic',
    protocol: 'anthropic',
    defaultBaseUrl: 'https://api.anthropic.com',
    images: 'full',
    requiresApiKey: true,
    listsModels: true,
  },
  gemini: {
    id: 'gemini',
    displayName: 'Google Gemini',
    protocol: 'gemini',
    defaultBaseUrl: 'https://generativelanguage.googleapis.com/v1beta',
    images: 'inline_only',
    requiresApiKey: true,
    listsModels: true,
  },
  aliyun: {
    id: 'aliyun',
    displayName: 'Alibaba DashScope',
    protocol: 'aliyun',
    defaultBaseUrl: 'https://dashscope.aliyuncs.com/api/v1',
    images: 'none',
    requiresApiKey: true,
    listsModels: false,
  },
};

// Codecs are stateless; stream state lives in the mappers they create
const CODECS: Record<ProtocolId, ProtocolCodec> = {
  openai: createOpenAICodec(),
  anthropic: createAnthropicCodec(),
  gemini: createGeminiCodec(),
  aliyun: createAliyunCodec(),
};

export function isVendorId(value: unknown): value is VendorId {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(VENDORS, value);
}

export function getVendor(id: VendorId): VendorProfile {
  return VENDORS[id];
}

export function listVendors(): VendorProfile[] {
  return Object.values(VENDORS);
}

export function getCodec(vendor: VendorId | VendorProfile): ProtocolCodec {
  const profile = typeof vendor === 'string' ? VENDORS[vendor] : vendor;
  return CODECS[profile.protocol];
}
