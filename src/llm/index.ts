import { PipelineConfig, SetupError } from '../config/settings';
import { OpenAIReasoningClient } from './openaiClient';
import { ReasoningClient } from './reasoningClient';
import { StubReasoningClient } from './stubReasoningClient';

export const createReasoningClient = (config: PipelineConfig): ReasoningClient => {
  if (config.llm.provider === 'openai') {
    if (!config.llm.apiKey) {
      throw new SetupError('LLM_PROVIDER=openai but OPENAI_API_KEY is not set.');
    }
    return new OpenAIReasoningClient({
      apiKey: config.llm.apiKey,
      model: config.llm.model,
      premiumModel: config.llm.premiumModel,
      baseUrl: config.llm.baseUrl
    });
  }
  return new StubReasoningClient();
};

export { OpenAIReasoningClient, StubReasoningClient };
export type { ReasoningClient, ReasoningRequest } from './reasoningClient';
export { extractStructuredPayload, parseReasoningPayload, tryParseReasoningPayload } from './extractPayload';
