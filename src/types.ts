export type AnalysisCode = "SUCCESS" | "NO_VEHICLE" | "PLATE_UNREADABLE";

export interface ResponsePayload {
  code: AnalysisCode;
  message: string;
  vehicle_number?: string;
}

export interface ErrorPayload {
  detail: string;
}

export interface HealthPayload {
  status: string;
}

/**
 * Anything that can turn raw image bytes into the model's trimmed reply.
 */
export interface PlateRecognizer {
  analyze(imageBytes: Buffer): Promise<string>;
}
