import { describe, expect, it } from "vitest";

import { MESSAGES, classifyRecognition } from "./classify";

describe("classifyRecognition", () => {
  it("maps NO_VEHICLE_FOUND to NO_VEHICLE without a plate", () => {
    const payload = classifyRecognition("NO_VEHICLE_FOUND");

    expect(payload).toEqual({ code: "NO_VEHICLE", message: MESSAGES.NO_VEHICLE });
    expect(payload).not.toHaveProperty("vehicle_number");
  });

  it("maps PLATE_UNREADABLE to PLATE_UNREADABLE without a plate", () => {
    const payload = classifyRecognition("PLATE_UNREADABLE");

    expect(payload).toEqual({
      code: "PLATE_UNREADABLE",
      message: "A vehicle was found, but the license plate could not be read.",
    });
    expect(payload).not.toHaveProperty("vehicle_number");
  });

  it("returns any other reply verbatim as the vehicle number", () => {
    expect(classifyRecognition("MH12AB3456")).toEqual({
      code: "SUCCESS",
      message: "Successfully extracted vehicle number.",
      vehicle_number: "MH12AB3456",
    });
    expect(classifyRecognition("KA 01 AB 1234").vehicle_number).toBe("KA 01 AB 1234");
  });

  it("matches sentinels case-sensitively", () => {
    expect(classifyRecognition("no_vehicle_found")).toEqual({
      code: "SUCCESS",
      message: MESSAGES.SUCCESS,
      vehicle_number: "no_vehicle_found",
    });
    expect(classifyRecognition("Plate_Unreadable").code).toBe("SUCCESS");
  });

  it("gives identical payloads for the same reply", () => {
    expect(classifyRecognition("DL3CAF0001")).toEqual(classifyRecognition("DL3CAF0001"));
  });
});
