import { ELISION_PLACEHOLDER, ELISION_THRESHOLD } from "../config/constants";
import { charLength } from "./utils";

/**
 * Replaces a code block payload longer than `threshold` characters with the
 * listing placeholder. Shorter payloads pass through unchanged.
 */
export function elideCodeBlock(
  payload: string,
  threshold = ELISION_THRESHOLD
): string {
  return charLength(payload) > threshold ? ELISION_PLACEHOLDER : payload;
}
