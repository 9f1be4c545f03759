import { OpenAIOracleService } from './OpenAIOracleService';

/** A local Ollama server, reached through its OpenAI-compatible `/v1` endpoint. */
export class OllamaOracleService extends OpenAIOracleService {
  readonly name = 'ollama';
  protected label = 'Ollama';

  constructor(baseUrl: string, model: string = 'llama3.1', timeoutMs?: number) {
    // Ollama ignores the key, but the client will not start without one
    super('ollama', model, timeoutMs, `${baseUrl.replace(/\/+$/, '')}/v1`);
  }
}
