export type RecognitionErrorKind = "decode" | "external";

export abstract class RecognitionError extends Error {
  abstract readonly kind: RecognitionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The uploaded bytes are not an image sharp can read. */
export class ImageDecodeError extends RecognitionError {
  readonly kind = "decode";
}

/** The model call failed or came back without usable text. */
export class ExternalServiceError extends RecognitionError {
  readonly kind = "external";
}
