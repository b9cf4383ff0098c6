import { NO_VEHICLE_FOUND, PLATE_UNREADABLE } from "./recognition/prompt";
import type { ResponsePayload } from "./types";

export const MESSAGES = {
  SUCCESS: "Successfully extracted vehicle number.",
  NO_VEHICLE: "The uploaded image does not appear to contain a vehicle.",
  PLATE_UNREADABLE: "A vehicle was found, but the license plate could not be read.",
} as const;

// Exact, case-sensitive match on the sentinels; anything else is the plate.
export function classifyRecognition(reply: string): ResponsePayload {
  switch (reply) {
    case NO_VEHICLE_FOUND:
      return { code: "NO_VEHICLE", message: MESSAGES.NO_VEHICLE };
    case PLATE_UNREADABLE:
      return { code: "PLATE_UNREADABLE", message: MESSAGES.PLATE_UNREADABLE };
    default:
      return {
        code: "SUCCESS",
        message: MESSAGES.SUCCESS,
        vehicle_number: reply,
      };
  }
}
