import { GoogleGenerativeAI } from '@google/generative-ai';
import { GenerationOptions, TextGenerationOracle } from '../types';
import { ConfigurationError, GenerationError, errorMessage } from '../utils/errors';

export class GeminiOracleService implements TextGenerationOracle {
  readonly name = 'gemini';
  private genAI: GoogleGenerativeAI;
  private model: string;
  private timeoutMs?: number;

  constructor(apiKey: string | undefined, model: string = 'gemini-1.5-flash', timeoutMs?: number) {
    if (!apiKey) {
      throw new ConfigurationError('GEMINI_API_KEY is required for the Gemini oracle');
    }
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.model = model;
    this.timeoutMs = timeoutMs;
  }

  async generate(prompt: string, options: GenerationOptions): Promise<string> {
    try {
      const model = this.genAI.getGenerativeModel(
        {
          model: this.model,
          generationConfig: {
            temperature: options.temperature,
            maxOutputTokens: options.maxOutputTokens,
            topP: 0.95,
            topK: 40,
            responseMimeType: 'application/json'
          }
        },
        this.timeoutMs ? { timeout: this.timeoutMs } : undefined
      );
      const result = await model.generateContent(prompt);
      return result.response.text();
    } catch (error) {
      console.error(`[GeminiOracleService] ERROR: LLM call failed:`, error);
      throw new GenerationError(`Error generating content with Gemini: ${errorMessage(error)}`, error);
    }
  }
}
