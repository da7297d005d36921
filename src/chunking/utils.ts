import type { JoinPolicy } from "./types";

/**
 * Length in Unicode code points. A character outside the Basic
 * Multilingual Plane counts once, not as two UTF-16 code units.
 */
export function charLength(text: string): number {
  return Array.from(text).length;
}

export function separatorFor(policy: JoinPolicy): string {
  return policy === "space" ? " " : "";
}
