import type { GenerateContentParameters } from "@google/genai";

import type { PlateRecognizer } from "../types";
import { ExternalServiceError } from "./errors";
import { decodeImage } from "./image";
import { RECOGNITION_PROMPT } from "./prompt";

/**
 * The slice of the Gemini `models` API the adapter calls. `GoogleGenAI#models`
 * satisfies it; tests pass a stub.
 */
export interface ContentGenerator {
  generateContent(
    params: GenerateContentParameters
  ): Promise<{ text?: string | undefined }>;
}

export interface GeminiRecognizerOptions {
  model: string;
  prompt?: string;
}

export class GeminiPlateRecognizer implements PlateRecognizer {
  private readonly model: string;
  private readonly prompt: string;

  constructor(
    private readonly generator: ContentGenerator,
    options: GeminiRecognizerOptions
  ) {
    this.model = options.model;
    this.prompt = options.prompt ?? RECOGNITION_PROMPT;
  }

  /**
   * Sends the image to the model and returns its reply with surrounding
   * whitespace removed.
   *
   * @throws ImageDecodeError when the bytes are not a readable image
   * @throws ExternalServiceError when the model call fails or returns no text
   */
  async analyze(imageBytes: Buffer): Promise<string> {
    const image = await decodeImage(imageBytes);
    const context =
      `model=${this.model}, bytes=${image.data.length}, ` +
      `type=${image.mimeType}, size=${image.width}x${image.height}`;

    let text: string | undefined;
    try {
      const response = await this.generator.generateContent({
        model: this.model,
        contents: [
          {
            role: "user",
            parts: [
              { text: this.prompt },
              {
                inlineData: {
                  mimeType: image.mimeType,
                  data: image.data.toString("base64"),
                },
              },
            ],
          },
        ],
      });
      text = response.text;
    } catch (error) {
      console.error(`Gemini request failed (${context}):`, error);
      const message = error instanceof Error ? error.message : String(error);
      throw new ExternalServiceError(`Model request failed: ${message}`, {
        cause: error,
      });
    }

    const reply = text?.trim();
    if (!reply) {
      console.error(`Gemini returned no text (${context})`);
      throw new ExternalServiceError("Model returned an empty reply.");
    }
    return reply;
  }
}
