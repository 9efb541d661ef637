import { ApiError, GoogleGenAI, HarmBlockThreshold, HarmCategory } from '@google/genai';
import type { GenerateContentParameters, Part, SafetySetting } from '@google/genai';
import type { ModelCompletion, ModelRequest, VisionModel } from '../../types/verification';
import { ModelNotFoundError } from '../errors';

interface CandidateLike {
  finishReason?: string;
  content?: { parts?: Array<{ text?: string; thought?: boolean }> };
}

interface GenerateContentResponseLike {
  candidates?: CandidateLike[];
  promptFeedback?: { blockReason?: string };
}

/** The slice of `GoogleGenAI.models` this adapter needs. */
export interface GenerateContentClient {
  generateContent(params: GenerateContentParameters): Promise<GenerateContentResponseLike>;
}

// Registry extracts and contracts carry names and addresses that trip the default filters.
const SAFETY_SETTINGS: SafetySetting[] = [
  HarmCategory.HARM_CATEGORY_HARASSMENT,
  HarmCategory.HARM_CATEGORY_HATE_SPEECH,
  HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
  HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
  HarmCategory.HARM_CATEGORY_CIVIC_INTEGRITY,
].map((category) => ({ category, threshold: HarmBlockThreshold.BLOCK_NONE }));

function responseText(candidate: CandidateLike): string {
  return (candidate.content?.parts ?? [])
    .filter((p) => !p.thought && typeof p.text === 'string')
    .map((p) => p.text)
    .join('')
    .trim();
}

/** Maps a raw generateContent response onto the completion states the verifier cares about. */
export function toCompletion(response: GenerateContentResponseLike): ModelCompletion {
  const candidate = response.candidates?.[0];
  if (!candidate) {
    return { kind: 'blocked', reason: response.promptFeedback?.blockReason ?? 'NO_CANDIDATES' };
  }

  const finishReason = candidate.finishReason ?? 'FINISH_REASON_UNSPECIFIED';
  if (finishReason === 'STOP' || finishReason === 'MAX_TOKENS') {
    return { kind: 'completed', finishReason, text: responseText(candidate) };
  }
  return { kind: 'blocked', reason: finishReason };
}

export class GeminiVisionModel implements VisionModel {
  constructor(
    private readonly client: GenerateContentClient,
    readonly modelId: string
  ) {}

  async generate(request: ModelRequest): Promise<ModelCompletion> {
    const imageParts: Part[] = request.images.map((img) => ({
      inlineData: { mimeType: img.mimeType, data: img.data.toString('base64') },
    }));

    let response: GenerateContentResponseLike;
    try {
      response = await this.client.generateContent({
        model: this.modelId,
        contents: [{ role: 'user', parts: [{ text: request.prompt }, ...imageParts] }],
        config: {
          responseMimeType: 'application/json',
          maxOutputTokens: request.maxOutputTokens,
          safetySettings: SAFETY_SETTINGS,
          abortSignal: request.signal,
        },
      });
    } catch (err) {
      if (err instanceof ApiError && err.status === 404) {
        throw new ModelNotFoundError(this.modelId, { cause: err });
      }
      throw err;
    }

    return toCompletion(response);
  }
}

export function createGeminiModel(apiKey: string, modelId: string): GeminiVisionModel {
  const ai = new GoogleGenAI({ apiKey });
  return new GeminiVisionModel(ai.models, modelId);
}
