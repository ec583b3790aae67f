#!/usr/bin/env node
/**
 * llm-unify CLI
 *
 * Lists the supported vendors and their models, and sends one-shot chat
 * requests through any of them.
 */

import { pathToFileURL } from 'node:url';
import {
  isLlmError,
  isVendorId,
  listVendors,
  systemMessage,
  userMessage,
  type ChatRequest,
  type ChatResponse,
  type Message,
  type ResponseFormat,
  type SamplingParams,
  type ToolCall,
  type VendorId,
  type VendorProfile,
} from '@llm-unify/core';
import { ChatClient } from '../client.js';
import { applyEnvironment, getConfigPath, loadConfig, type LlmUnifyConfig } from '../config.js';
import type { HttpTransport } from '../transport.js';
import { error, formatJson, formatTable, formatUsage, type TableColumn } from './output.js';

export interface CliDeps {
  transport?: HttpTransport;
  env?: NodeJS.ProcessEnv;
  write?: (text: string) => void;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

interface ChatOptions {
  provider?: string;
  model?: string;
  system?: string;
  stream: boolean;
  maxTokens?: number;
  temperature?: number;
  presencePenalty?: number;
  frequencyPenalty?: number;
  seed?: number;
  responseFormat?: ResponseFormat['type'];
  user?: string;
  enableThinking?: boolean;
  config?: string;
  json: boolean;
  prompt: string[];
}

interface ModelsOptions {
  provider?: string;
  config?: string;
  json: boolean;
}

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} needs a value`);
  }
  return value;
}

function takeNumber(args: string[], i: number, flag: string): number {
  const raw = takeValue(args, i, flag);
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new UsageError(`${flag} must be a number, got "${raw}"`);
  }
  return value;
}

function takeInteger(args: string[], i: number, flag: string): number {
  const value = takeNumber(args, i, flag);
  if (!Number.isInteger(value)) {
    throw new UsageError(`${flag} must be an integer, got "${args[i + 1]}"`);
  }
  return value;
}

function takeResponseFormat(args: string[], i: number, flag: string): ResponseFormat['type'] {
  const value = takeValue(args, i, flag);
  if (value !== 'text' && value !== 'json_object') {
    throw new UsageError(`${flag} must be "text" or "json_object", got "${value}"`);
  }
  return value;
}

export function parseChatArgs(args: string[]): ChatOptions {
  const options: ChatOptions = { stream: false, json: false, prompt: [] };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === '--provider' || arg === '-p') {
      options.provider = takeValue(args, i++, arg);
    } else if (arg === '--model' || arg === '-m') {
      options.model = takeValue(args, i++, arg);
    } else if (arg === '--system' || arg === '-s') {
      options.system = takeValue(args, i++, arg);
    } else if (arg === '--max-tokens') {
      options.maxTokens = takeNumber(args, i++, arg);
    } else if (arg === '--temperature') {
      options.temperature = takeNumber(args, i++, arg);
    } else if (arg === '--presence-penalty') {
      options.presencePenalty = takeNumber(args, i++, arg);
    } else if (arg === '--frequency-penalty') {
      options.frequencyPenalty = takeNumber(args, i++, arg);
    } else if (arg === '--seed') {
      options.seed = takeInteger(args, i++, arg);
    } else if (arg === '--response-format') {
      options.responseFormat = takeResponseFormat(args, i++, arg);
    } else if (arg === '--user') {
      options.user = takeValue(args, i++, arg);
    } else if (arg === '--thinking') {
      options.enableThinking = true;
    } else if (arg === '--no-thinking') {
      options.enableThinking = false;
    } else if (arg === '--config' || arg === '-c') {
      options.config = takeValue(args, i++, arg);
    } else if (arg === '--stream') {
      options.stream = true;
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      options.prompt.push(arg);
    }
    i++;
  }

  return options;
}

export function parseModelsArgs(args: string[]): ModelsOptions {
  const options: ModelsOptions = { json: false };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === '--provider' || arg === '-p') {
      options.provider = takeValue(args, i++, arg);
    } else if (arg === '--config' || arg === '-c') {
      options.config = takeValue(args, i++, arg);
    } else if (arg === '--json') {
      options.json = true;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
    i++;
  }

  return options;
}

function showHelp(write: (text: string) => void): void {
  write(`
llm-unify - one chat interface for many LLM vendors

Usage:
  llm-unify providers [--config <path>] [--json]
  llm-unify models [--provider <id>] [--config <path>] [--json]
  llm-unify chat --provider <id> --model <model> [options] <prompt...>

Chat Options:
  --provider, -p <id>   Vendor id (default: defaultVendor from the config)
  --model, -m <model>   Model name as the vendor knows it
  --system, -s <text>   System prompt
  --stream              Print text as it arrives
  --max-tokens <n>      Maximum tokens to generate
  --temperature <t>     Sampling temperature
  --presence-penalty <n>, --frequency-penalty <n>
                        Repetition penalties (-2.0 to 2.0)
  --seed <n>            Seed for repeatable sampling
  --response-format <f> "text" or "json_object"
  --user <id>           End-user identifier passed to the vendor
  --thinking, --no-thinking
                        Switch reasoning on or off (DashScope hybrid models)
  --config, -c <path>   Configuration file (default: ${getConfigPath()})
  --json                Print the response (or each stream chunk) as JSON

Environment:
  LLM_UNIFY_CONFIG      Configuration file path
  OPENAI_API_KEY, ANTHROPIC_API_KEY, GEMINI_API_KEY, DEEPSEEK_API_KEY,
  MOONSHOT_API_KEY, ZHIPU_API_KEY, ARK_API_KEY, DASHSCOPE_API_KEY,
  OLLAMA_API_KEY        API keys used when the config file has none

Examples:
  llm-unify providers
  llm-unify models -p gemini
  llm-unify chat -p anthropic -m claude-3-5-haiku-latest "Say hello"
  llm-unify chat -p deepseek -m deepseek-chat --stream "Write a haiku"
`);
}

interface ProviderRow {
  id: string;
  name: string;
  protocol: string;
  baseUrl: string;
  images: string;
  apiKey: string;
}

const PROVIDER_COLUMNS: TableColumn<ProviderRow>[] = [
  { header: 'ID', key: 'id' },
  { header: 'Name', key: 'name' },
  { header: 'Protocol', key: 'protocol' },
  { header: 'Base URL', key: 'baseUrl' },
  { header: 'Images', key: 'images' },
  { header: 'API Key', key: 'apiKey' },
];

function keyStatus(vendor: VendorProfile, config: LlmUnifyConfig): string {
  if (config.providers[vendor.id]?.apiKey) return 'configured';
  return vendor.requiresApiKey ? 'missing' : 'optional';
}

async function providersCommand(args: string[], deps: CliDeps, write: (text: string) => void): Promise<number> {
  const json = args.includes('--json');
  const configIndex = args.findIndex(arg => arg === '--config' || arg === '-c');
  const configPath = configIndex >= 0 ? takeValue(args, configIndex, args[configIndex]) : undefined;
  const vendors = listVendors();

  if (json) {
    write(formatJson(vendors) + '\n');
    return 0;
  }

  const config = applyEnvironment(await loadConfig(configPath ?? getConfigPath(deps.env)), deps.env);
  const rows = vendors.map((vendor): ProviderRow => ({
    id: vendor.id,
    name: vendor.displayName,
    protocol: vendor.protocol,
    baseUrl: config.providers[vendor.id]?.baseUrl ?? vendor.defaultBaseUrl,
    images: vendor.images,
    apiKey: keyStatus(vendor, config),
  }));
  write(formatTable(PROVIDER_COLUMNS, rows) + '\n');
  return 0;
}

function buildRequest(options: ChatOptions, model: string): ChatRequest {
  const messages: Message[] = [];
  if (options.system) messages.push(systemMessage(options.system));
  messages.push(userMessage(options.prompt.join(' ')));

  const sampling: SamplingParams = {};
  if (options.maxTokens !== undefined) sampling.maxTokens = options.maxTokens;
  if (options.temperature !== undefined) sampling.temperature = options.temperature;
  if (options.presencePenalty !== undefined) sampling.presencePenalty = options.presencePenalty;
  if (options.frequencyPenalty !== undefined) sampling.frequencyPenalty = options.frequencyPenalty;
  if (options.seed !== undefined) sampling.seed = options.seed;

  const request: ChatRequest = { model, messages };
  if (Object.keys(sampling).length > 0) request.sampling = sampling;
  if (options.responseFormat) request.responseFormat = { type: options.responseFormat };
  if (options.user) request.user = options.user;
  if (options.enableThinking !== undefined) request.enableThinking = options.enableThinking;
  return request;
}

function formatToolCall(call: ToolCall): string {
  return `→ ${call.function.name}(${call.function.arguments})`;
}

function printSummary(response: ChatResponse, write: (text: string) => void): void {
  for (const call of response.toolCalls) {
    write(formatToolCall(call) + '\n');
  }
  write(`${formatUsage(response.usage)} finish=${response.finishReason}\n`);
}

function resolveProvider(provider: string): VendorId {
  if (!isVendorId(provider)) {
    throw new UsageError(`Unknown provider: ${provider}. Run "llm-unify providers" for the list.`);
  }
  return provider;
}

async function modelsCommand(args: string[], deps: CliDeps, write: (text: string) => void): Promise<number> {
  const options = parseModelsArgs(args);
  const config = applyEnvironment(await loadConfig(options.config ?? getConfigPath(deps.env)), deps.env);
  const provider = resolveProvider(options.provider ?? config.defaultVendor);

  const client = ChatClient.fromConfig(config, provider, deps.transport ? { transport: deps.transport } : {});
  const models = await client.listModels();

  if (options.json) {
    write(formatJson(models) + '\n');
  } else if (models.length === 0) {
    write('No models\n');
  } else {
    write(models.join('\n') + '\n');
  }
  return 0;
}

async function chatCommand(args: string[], deps: CliDeps, write: (text: string) => void): Promise<number> {
  const options = parseChatArgs(args);
  const config = applyEnvironment(await loadConfig(options.config ?? getConfigPath(deps.env)), deps.env);

  const provider = resolveProvider(options.provider ?? config.defaultVendor);
  if (!options.model) {
    throw new UsageError('--model is required');
  }
  if (options.prompt.length === 0) {
    throw new UsageError('A prompt is required');
  }

  const client = ChatClient.fromConfig(config, provider, deps.transport ? { transport: deps.transport } : {});
  const request = buildRequest(options, options.model);

  if (!options.stream) {
    const response = await client.chat(request);
    if (options.json) {
      write(formatJson(response) + '\n');
    } else {
      write(response.content + '\n');
      printSummary(response, write);
    }
    return 0;
  }

  let wroteText = false;
  let usageLine = 'tokens: unknown';
  const toolCalls = new Map<number, ToolCall>();
  for await (const chunk of client.chatStream(request)) {
    if (options.json) {
      write(JSON.stringify(chunk) + '\n');
      continue;
    }
    switch (chunk.type) {
      case 'text_delta':
        write(chunk.text);
        wroteText = true;
        break;
      case 'tool_call_delta':
        toolCalls.set(chunk.toolCall.index, chunk.toolCall);
        break;
      case 'usage':
        // Vendors may report usage more than once; the last report is printed
        usageLine = formatUsage(chunk.usage);
        break;
      case 'finish':
        if (wroteText) write('\n');
        for (const call of [...toolCalls.values()].sort((a, b) => a.index - b.index)) {
          write(formatToolCall(call) + '\n');
        }
        write(`${usageLine} finish=${chunk.reason}\n`);
        break;
    }
  }
  return 0;
}

/**
 * Run the CLI. Returns the process exit code: 0 on success, 1 when a
 * request fails, 2 for usage errors.
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const write = deps.write ?? ((text: string) => {
    process.stdout.write(text);
  });

  if (argv.length === 0 || argv[0] === '--help' || argv[0] === 'help') {
    showHelp(write);
    return 0;
  }

  const command = argv[0];
  const subArgs = argv.slice(1);

  try {
    switch (command) {
      case 'providers':
        return await providersCommand(subArgs, deps, write);
      case 'models':
        return await modelsCommand(subArgs, deps, write);
      case 'chat':
        return await chatCommand(subArgs, deps, write);
      default:
        error(`Unknown command: ${command}`);
        console.error('Run "llm-unify --help" for usage information.');
        return 2;
    }
  } catch (err) {
    if (err instanceof UsageError) {
      error(err.message);
      return 2;
    }
    if (isLlmError(err)) {
      error(`${err.message} (${err.kind}${err.status !== undefined ? `, HTTP ${err.status}` : ''})`);
      return 1;
    }
    throw err;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    },
  );
}
