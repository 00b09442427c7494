import axios from 'axios';
import { ModelConfig } from '../../lib/converter-config';
import { CodeGenerator, GenerationRequest } from '../conversion/types';
import { CredentialProvider } from './credentials';
import { buildGenerationPrompt } from './prompts/jsonl-to-csv-prompts';

export type HttpPost = (
  url: string,
  body: unknown,
  options: { headers: Record<string, string>; timeoutMs: number }
) => Promise<unknown>;

export type ModelClientDeps = {
  config: ModelConfig;
  defaultProjectId: string;
  credentials: CredentialProvider;
  post?: HttpPost;
};

type ChatMessage = {
  role: 'user';
  content: Array<{ type: 'text'; text: string }>;
};

export type ChatCompletionRequest = {
  model: string;
  stream: false;
  max_tokens: number;
  temperature: number;
  top_p: number;
  messages: ChatMessage[];
};

const axiosPost: HttpPost = async (url, body, options) => {
  const response = await axios.post<unknown>(url, body, {
    headers: options.headers,
    timeout: options.timeoutMs,
  });
  return response.data;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstRecord(value: unknown): Record<string, unknown> | null {
  if (!Array.isArray(value) || value.length === 0) return null;
  const [first] = value;
  return isRecord(first) ? first : null;
}

function describeHttpError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return status ? `HTTP ${status}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read the generated text from either an OpenAI-style `choices` payload or a
 * Gemini-style `candidates` payload. Anything else yields null.
 */
export function extractGeneratedText(payload: unknown): string | null {
  if (!isRecord(payload)) return null;

  const choice = firstRecord(payload.choices);
  if (choice) {
    const message = choice.message;
    return isRecord(message) && typeof message.content === 'string' ? message.content : null;
  }

  const candidate = firstRecord(payload.candidates);
  if (candidate) {
    const content = candidate.content;
    const part = isRecord(content) ? firstRecord(content.parts) : null;
    return part && typeof part.text === 'string' ? part.text : null;
  }

  return null;
}

/**
 * Client for the OpenAI-compatible chat completions endpoint that Vertex AI
 * exposes for model-garden models.
 */
export class ModelClient implements CodeGenerator {
  private readonly config: ModelConfig;
  private readonly defaultProjectId: string;
  private readonly credentials: CredentialProvider;
  private readonly post: HttpPost;

  constructor(deps: ModelClientDeps) {
    this.config = deps.config;
    this.defaultProjectId = deps.defaultProjectId;
    this.credentials = deps.credentials;
    this.post = deps.post || axiosPost;
  }

  buildEndpointUrl(projectId: string): string {
    return (
      `https://${this.config.endpoint}/v1beta1/projects/${encodeURIComponent(projectId)}` +
      `/locations/${encodeURIComponent(this.config.region)}/endpoints/openapi/chat/completions`
    );
  }

  buildRequest(text: string): ChatCompletionRequest {
    return {
      model: this.config.model,
      stream: false,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      top_p: this.config.topP,
      messages: [{ role: 'user', content: [{ type: 'text', text }] }],
    };
  }

  async generate(request: GenerationRequest): Promise<string | null> {
    const projectId = request.projectId || this.defaultProjectId;

    const accessToken = await this.credentials.getAccessToken();
    if (!accessToken) {
      console.error('[ModelClient] Failed to authenticate with Google Cloud');
      return null;
    }

    if (request.feedback) {
      console.log(`[ModelClient] Adding error feedback to prompt: ${request.feedback.slice(0, 300)}`);
    }
    const body = this.buildRequest(buildGenerationPrompt(request.prompt, request.sampleLine, request.feedback));
    const url = this.buildEndpointUrl(projectId);

    try {
      console.log(`[ModelClient] Sending request to ${url} (model=${this.config.model})`);
      const payload = await this.post(url, body, {
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${accessToken}`,
        },
        timeoutMs: this.config.timeoutMs,
      });

      const text = extractGeneratedText(payload);
      if (text === null) {
        console.error('[ModelClient] Unexpected API response format');
      }
      return text;
    } catch (error: unknown) {
      console.error(`[ModelClient] API request failed: ${describeHttpError(error)}`);
      return null;
    }
  }
}
