import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { z } from "zod";

import { classifyRecognition } from "./classify";
import { RecognitionError } from "./recognition/errors";
import type {
  ErrorPayload,
  HealthPayload,
  PlateRecognizer,
  ResponsePayload,
} from "./types";

export const HEALTH_STATUS = "Vehicle Analysis API is running.";
export const ANALYSIS_FAILED_DETAIL = "Failed to analyze the uploaded image.";

const analyzeFormSchema = z.object({
  image: z.instanceof(Blob, {
    message: 'Field "image" must be an uploaded file.',
  }),
});

export interface AppDependencies {
  recognizer: PlateRecognizer;
}

export function createApp({ recognizer }: AppDependencies): Hono {
  const app = new Hono();

  // --- Middleware ---
  app.use("*", logger());
  app.use("*", cors());

  app.notFound((c) =>
    c.json({ detail: "Not Found" } satisfies ErrorPayload, 404)
  );

  app.onError((error, c) => {
    console.error(`Unhandled error on ${c.req.method} ${c.req.path}:`, error);
    return c.json(
      { detail: "Internal Server Error" } satisfies ErrorPayload,
      500
    );
  });

  // ------------------------------------
  // --- Routes ---
  // ------------------------------------

  app.get("/", (c) =>
    c.json({ status: HEALTH_STATUS } satisfies HealthPayload)
  );

  app.post("/analyze", async (c) => {
    let form: Record<string, unknown>;
    try {
      form = await c.req.parseBody();
    } catch (error) {
      console.warn("Rejected unparsable upload:", error);
      c.status(400);
      return c.json({
        detail: "Failed to parse multipart form data.",
      } satisfies ErrorPayload);
    }

    const validationResult = analyzeFormSchema.safeParse(form);
    if (!validationResult.success) {
      c.status(422);
      const detail =
        validationResult.error.issues[0]?.message ?? "Invalid form data.";
      return c.json({ detail } satisfies ErrorPayload);
    }

    const { image } = validationResult.data;
    console.log(
      `Received image: type: ${image.type || "unknown"}, size: ${image.size} bytes`
    );

    const imageBytes = Buffer.from(await image.arrayBuffer());

    let reply: string;
    try {
      reply = await recognizer.analyze(imageBytes);
    } catch (error) {
      if (!(error instanceof RecognitionError)) {
        throw error;
      }
      console.error(`Image analysis failed (${error.kind}): ${error.message}`);
      c.status(500);
      return c.json({ detail: ANALYSIS_FAILED_DETAIL } satisfies ErrorPayload);
    }

    const payload: ResponsePayload = classifyRecognition(reply);
    return c.json(payload);
  });

  return app;
}
