import { z } from 'zod';
import { PREMIUM_ROLES, ReasoningClient, ReasoningRequest } from './reasoningClient';

export interface OpenAIClientOptions {
  apiKey: string;
  model: string;
  premiumModel?: string;
  baseUrl?: string;
  maxTokens?: number;
  fetchImpl?: typeof fetch;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() })
      })
    )
    .min(1)
});

export class OpenAIReasoningClient implements ReasoningClient {
  private apiKey: string;
  private model: string;
  private premiumModel: string;
  private baseUrl: string;
  private maxTokens: number;
  private fetchImpl: typeof fetch;

  constructor(options: OpenAIClientOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.premiumModel = options.premiumModel ?? options.model;
    this.baseUrl = (options.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.maxTokens = options.maxTokens ?? 800;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  modelFor(request: ReasoningRequest): string {
    return PREMIUM_ROLES.includes(request.role) ? this.premiumModel : this.model;
  }

  async generate(request: ReasoningRequest): Promise<string> {
    const resp = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`
      },
      body: JSON.stringify({
        model: this.modelFor(request),
        messages: [
          { role: 'system', content: request.instruction },
          { role: 'user', content: JSON.stringify(request.context) }
        ],
        temperature: 0,
        top_p: 1,
        max_tokens: this.maxTokens
      })
    });
    if (!resp.ok) {
      const text = await resp.text();
      throw new Error(`OpenAI error ${resp.status}: ${text}`);
    }
    const parsed = completionSchema.safeParse(await resp.json());
    const content = parsed.success ? parsed.data.choices[0].message.content : undefined;
    if (!content) {
      throw new Error('OpenAI returned empty content');
    }
    return content;
  }
}
