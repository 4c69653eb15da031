import { createOpenAI } from '@ai-sdk/openai'
import type { SakinaConfig } from '../config.js'

const DEFAULT_BASE_URLS: Record<SakinaConfig['analyzer']['provider'], string> = {
  openai: 'https://api.openai.com/v1',
  openrouter: 'https://openrouter.ai/api/v1',
  ollama: 'http://localhost:11434/v1',
  cerebras: 'https://api.cerebras.ai/v1'
}

export function createLLMProvider(config: SakinaConfig['analyzer']) {
  // All supported providers speak the OpenAI-compatible format
  const openai = createOpenAI({
    apiKey: config.apiKey || process.env.SAKINA_API_KEY || process.env.OPENAI_API_KEY || 'ollama',
    baseURL: config.baseUrl || DEFAULT_BASE_URLS[config.provider],
    name: config.provider
  })

  // chat() rather than the default Responses API, which only OpenAI serves
  return (modelId: string) => openai.chat(modelId)
}
