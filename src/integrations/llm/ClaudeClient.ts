/**
 * Claude Client - LLM integration for applicant enrichment
 *
 * Thin wrapper over the Anthropic Messages API:
 * - Structured output through a single forced tool call
 * - Usage/latency reporting
 * - Classification of SDK errors into retryable vs fatal
 *
 * The SDK's own retries are disabled; callers own the retry policy.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming, MessageParam, Tool } from '@anthropic-ai/sdk/resources/messages';
import { ConfigurationError } from '../../config/ScreeningPolicy.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface ClaudeClientConfig {
  apiKey: string;
  defaultModel: ClaudeModel;
  timeoutMs: number;
}

export type ClaudeModel =
  | 'claude-sonnet-4-20250514'
  | 'claude-3-7-sonnet-20250219'
  | 'claude-3-5-sonnet-20241022'
  | 'claude-3-5-haiku-20241022'
  | (string & {});

const DEFAULT_CONFIG: Omit<ClaudeClientConfig, 'apiKey'> = {
  defaultModel: 'claude-3-5-haiku-20241022',
  timeoutMs: 60000,
};

// =============================================================================
// REQUEST/RESPONSE TYPES
// =============================================================================

export interface ClaudeToolRequest {
  prompt: string;
  systemPrompt?: string;
  tool: Tool;
  model?: ClaudeModel;
  maxTokens?: number;
  temperature?: number;
}

export interface ClaudeToolResponse {
  /** Arguments the model passed to the tool, or null when it did not call it */
  input: unknown;
  model: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  stopReason: string | null;
  latencyMs: number;
}

/**
 * rate_limited and connection are transient; everything else is fatal.
 */
export type ClaudeErrorClass = 'rate_limited' | 'connection' | 'fatal';

/** The parts of a Messages API reply the client reads */
export interface MessageReply {
  content: readonly ContentBlockLike[];
  model: string;
  usage: { input_tokens: number; output_tokens: number };
  stop_reason: string | null;
}

/** Satisfied by `Anthropic#messages`; tests pass an in-process fake */
export interface MessagesApi {
  create(params: MessageCreateParamsNonStreaming): Promise<MessageReply>;
}

// =============================================================================
// CLAUDE CLIENT
// =============================================================================

export class ClaudeClient {
  private messages: MessagesApi;
  private config: ClaudeClientConfig;

  constructor(config: Partial<ClaudeClientConfig>, messages?: MessagesApi) {
    this.config = {
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY || '',
      defaultModel: config.defaultModel || DEFAULT_CONFIG.defaultModel,
      timeoutMs: config.timeoutMs || DEFAULT_CONFIG.timeoutMs,
    };

    if (!this.config.apiKey) {
      throw new ConfigurationError('ANTHROPIC_API_KEY is required');
    }

    this.messages = messages ?? createAnthropicSdk(this.config).messages;
  }

  /**
   * Ask the model to answer by calling `request.tool`. tool_choice forces the
   * call, so the reply is the tool's JSON input rather than free text.
   */
  async callTool(request: ClaudeToolRequest): Promise<ClaudeToolResponse> {
    const startTime = Date.now();

    const messages: MessageParam[] = [
      {
        role: 'user',
        content: request.prompt,
      },
    ];

    const response = await this.messages.create({
      model: request.model || this.config.defaultModel,
      max_tokens: request.maxTokens || 1024,
      system: request.systemPrompt,
      messages,
      temperature: request.temperature,
      tools: [request.tool],
      tool_choice: { type: 'tool', name: request.tool.name },
    });

    return {
      input: extractToolInput(response.content, request.tool.name),
      model: response.model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      stopReason: response.stop_reason,
      latencyMs: Date.now() - startTime,
    };
  }
}

// =============================================================================
// UTILITIES
// =============================================================================

export type ContentBlockLike = { type: string; name?: string; input?: unknown };

export function createAnthropicSdk(config: ClaudeClientConfig): Anthropic {
  return new Anthropic({
    apiKey: config.apiKey,
    maxRetries: 0,
    timeout: config.timeoutMs,
  });
}

export function extractToolInput(content: readonly ContentBlockLike[], toolName: string): unknown {
  const block = content.find((candidate) => candidate.type === 'tool_use' && candidate.name === toolName);
  return block?.input ?? null;
}

/**
 * Map an error thrown by the SDK onto a retry class.
 * 429 and 529 (overloaded) are rate limiting; timeouts and network failures
 * are connection errors.
 */
export function classifyClaudeError(error: unknown): ClaudeErrorClass {
  if (error instanceof Anthropic.APIConnectionError) {
    return 'connection';
  }
  if (error instanceof Anthropic.RateLimitError) {
    return 'rate_limited';
  }
  if (error instanceof Anthropic.APIError && error.status === 529) {
    return 'rate_limited';
  }
  return 'fatal';
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let clientInstance: ClaudeClient | null = null;

export function getClaudeClient(config?: Partial<ClaudeClientConfig>): ClaudeClient {
  if (!clientInstance) {
    clientInstance = new ClaudeClient(config || {});
  }
  return clientInstance;
}

export function resetClaudeClient(): void {
  clientInstance = null;
}
