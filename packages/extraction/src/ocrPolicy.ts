import { DEFAULT_OCR_THRESHOLD } from "@docqa/core";

/**
 * A page goes to OCR only when its text layer is too thin. This is a cost
 * policy: OCR never runs on pages that already have enough native text.
 */
export function needsOcr(nativeCharCount: number, threshold: number = DEFAULT_OCR_THRESHOLD): boolean {
  return nativeCharCount < threshold;
}
