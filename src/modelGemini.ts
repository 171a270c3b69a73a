import { GoogleGenerativeAI, type GenerativeModel, type Part } from "@google/generative-ai";
import { ConfigError } from "./renamer/errors.js";
import { CoverMetadataResponseSchema } from "./schemas/coverMetadata.js";

export interface GeminiSettings {
  apiKey: string;
  modelId: string;
  requestTimeoutMs: number;
}

/**
 * The one call the renamer makes: prompt parts in, response text out.
 * Tests substitute their own implementation.
 */
export interface CoverModel {
  readonly name: string;
  generate(parts: Array<string | Part>): Promise<string>;
}

export function createGeminiClient(apiKey: string): GoogleGenerativeAI {
  if (!apiKey) {
    throw new ConfigError("GEMINI_API_KEY is not set.", ["GEMINI_API_KEY"]);
  }
  return new GoogleGenerativeAI(apiKey);
}

export class GeminiCoverModel implements CoverModel {
  readonly name: string;
  private readonly model: GenerativeModel;
  private readonly timeoutMs: number;

  constructor(settings: GeminiSettings, client: GoogleGenerativeAI = createGeminiClient(settings.apiKey)) {
    this.name = settings.modelId;
    this.timeoutMs = settings.requestTimeoutMs;
    this.model = client.getGenerativeModel({
      model: settings.modelId,
      generationConfig: {
        responseMimeType: "application/json",
        responseSchema: CoverMetadataResponseSchema,
        temperature: 0.1,
      },
    });
  }

  async generate(parts: Array<string | Part>): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const result = await this.model.generateContent(parts, { signal: controller.signal });
      return result.response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`Gemini request timed out after ${this.timeoutMs}ms`, { cause: error });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
