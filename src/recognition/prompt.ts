export const NO_VEHICLE_FOUND = "NO_VEHICLE_FOUND";
export const PLATE_UNREADABLE = "PLATE_UNREADABLE";

export const RECOGNITION_PROMPT = [
  "Analyze the provided image. Your primary task is to identify and extract a vehicle's registration number from its license plate.",
  "",
  "Follow these rules strictly:",
  "1. If you find a clear license plate, provide ONLY the extracted registration number in a machine-readable format (e.g., MH12AB3456). Do not add any extra words.",
  `2. If the image does not contain a vehicle, respond with the exact text: ${NO_VEHICLE_FOUND}`,
  `3. If the image contains a vehicle but the license plate is not visible or is unreadable, respond with the exact text: ${PLATE_UNREADABLE}`,
].join("\n");
