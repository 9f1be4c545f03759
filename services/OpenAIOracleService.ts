import OpenAI from 'openai';
import { GenerationOptions, TextGenerationOracle } from '../types';
import { ConfigurationError, GenerationError, errorMessage } from '../utils/errors';

const SYSTEM_PROMPT = 'You are an expert recruiter. Always respond with valid JSON only.';

export class OpenAIOracleService implements TextGenerationOracle {
  readonly name: string = 'openai';
  protected label: string = 'OpenAI';
  private client: OpenAI;
  private model: string;

  /** `baseURL` points the client at any OpenAI-compatible chat endpoint. */
  constructor(apiKey: string | undefined, model: string = 'gpt-4o-mini', timeoutMs?: number, baseURL?: string) {
    if (!apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is required for the OpenAI oracle');
    }
    this.client = new OpenAI({
      apiKey,
      ...(baseURL ? { baseURL } : {}),
      ...(timeoutMs ? { timeout: timeoutMs } : {})
    });
    this.model = model;
  }

  async generate(prompt: string, options: GenerationOptions): Promise<string> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt }
        ],
        response_format: { type: 'json_object' },
        temperature: options.temperature,
        max_tokens: options.maxOutputTokens
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      console.error(`[${this.label}OracleService] ERROR: LLM call failed:`, error);
      throw new GenerationError(`Error generating content with ${this.label}: ${errorMessage(error)}`, error);
    }

    if (!content) {
      throw new GenerationError(`${this.label} returned an empty completion`);
    }
    return content;
  }
}
