import { GoogleGenAI } from "@google/genai";

import type { AppConfig } from "../config";
import { GeminiPlateRecognizer } from "./adapter";

export function createRecognizer(config: AppConfig): GeminiPlateRecognizer {
  const ai = new GoogleGenAI({ apiKey: config.googleApiKey });
  return new GeminiPlateRecognizer(ai.models, { model: config.geminiModel });
}
