/**
 * Model Configuration
 *
 * Defines the completion model, sampling parameters and token budget used
 * to answer questions. The model ID and endpoint can be overridden via
 * environment variables (see ./index.ts).
 *
 * @module config/models
 */

/**
 * Model configuration for the question-answering completion call
 */
export interface ModelConfig {
  /** Model identifier */
  modelId: string;
  /** Temperature setting (0.0 - 2.0) */
  temperature: number;
  /** Nucleus sampling probability mass */
  topP: number;
  /** Maximum output tokens */
  maxOutputTokens: number;
}

/**
 * Groq's OpenAI-compatible endpoint
 */
export const DEFAULT_COMPLETION_BASE_URL = 'https://api.groq.com/openai/v1';

/**
 * Default completion model
 */
export const DEFAULT_COMPLETION_MODEL: ModelConfig = {
  modelId: 'llama-3.3-70b-versatile',
  temperature: 0.7,
  topP: 1,
  maxOutputTokens: 1024,
};

/**
 * Get the completion model configuration, applying a model ID override.
 *
 * Sampling parameters stay fixed regardless of the override.
 */
export function getModelConfig(modelOverride?: string): ModelConfig {
  if (modelOverride) {
    return { ...DEFAULT_COMPLETION_MODEL, modelId: modelOverride };
  }
  return DEFAULT_COMPLETION_MODEL;
}
