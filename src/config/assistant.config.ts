import { registerAs } from '@nestjs/config';

export type RuntimeMode = 'local' | 'hosted';

export interface AssistantConfig {
  /** Opaque credential for the hosted runtime; never parsed here. */
  apiKey?: string;
  /** Opaque endpoint for the hosted runtime; never parsed here. */
  baseUrl: string;
  model: string;
  runtime: RuntimeMode;
  maxToolRounds: number;
  port: number;
}

export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_MODEL = 'google/gemini-2.0-flash-exp:free';

type Env = Record<string, string | undefined>;

function positiveInt(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function runtimeMode(raw: string | undefined, apiKey: string | undefined): RuntimeMode {
  const mode = raw?.trim().toLowerCase();
  if (!mode) {
    return apiKey ? 'hosted' : 'local';
  }
  if (mode !== 'local' && mode !== 'hosted') {
    throw new Error(`ASSISTANT_RUNTIME must be "local" or "hosted", got "${raw}"`);
  }
  return mode;
}

/**
 * Builds the assistant configuration from environment variables.
 * Hosted mode with no key is allowed: the first runtime call fails and the
 * session reports it like any other runtime failure.
 */
export function loadAssistantConfig(env: Env = process.env): AssistantConfig {
  const apiKey = env.OPENAI_API_KEY || undefined;

  return {
    apiKey,
    baseUrl: env.OPENAI_BASE_URL || DEFAULT_BASE_URL,
    model: env.OPENAI_MODEL || DEFAULT_MODEL,
    runtime: runtimeMode(env.ASSISTANT_RUNTIME, apiKey),
    maxToolRounds: positiveInt(env.ASSISTANT_MAX_TOOL_ROUNDS, 5, 'ASSISTANT_MAX_TOOL_ROUNDS'),
    port: positiveInt(env.PORT, 3000, 'PORT'),
  };
}

export const assistantConfig = registerAs('assistant', (): AssistantConfig => loadAssistantConfig());
