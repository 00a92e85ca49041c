import { DOCUMENT_SPEC_DEFAULTS } from "../config/constants";
import type { DocumentSpec, MarginCorrection } from "../types/crop";
import { noopTrace, type TraceHook } from "../utils/trace";

export interface MarginCorrectionResult {
  cropTop: number;
  corrections: MarginCorrection[];
}

/**
 * Keep visible clearance above the head, then below the chin.
 *
 * The chin fix runs after the head fix and is not followed by a re-check, so a
 * face too tall for both margins ends up with the chin margin satisfied and the
 * head margin violated again. Which margin should win is an open product decision.
 */
export const correctMargins = (
  cropTop: number,
  scaledHeadTopY: number,
  scaledChinBottomY: number,
  spec: Pick<DocumentSpec, "photoHeightPx" | "minVisualHeadMarginPx" | "minVisualChinMarginPx">,
  trace: TraceHook = noopTrace
): MarginCorrectionResult => {
  const minHeadMargin = spec.minVisualHeadMarginPx ?? DOCUMENT_SPEC_DEFAULTS.MIN_VISUAL_HEAD_MARGIN_PX;
  const minChinMargin = spec.minVisualChinMarginPx ?? DOCUMENT_SPEC_DEFAULTS.MIN_VISUAL_CHIN_MARGIN_PX;
  const corrections: MarginCorrection[] = [];
  let top = cropTop;

  const headMargin = scaledHeadTopY - top;
  if (headMargin < minHeadMargin) {
    top -= minHeadMargin - headMargin;
    corrections.push("HeadMarginFix");
    trace({
      stage: "margins",
      level: "info",
      message: "Moved crop up for head margin",
      data: { headMargin, minHeadMargin, cropTop: top },
    });
  }

  const chinMargin = top + spec.photoHeightPx - scaledChinBottomY;
  if (chinMargin < minChinMargin) {
    top += minChinMargin - chinMargin;
    corrections.push("ChinMarginFix");
    trace({
      stage: "margins",
      level: "info",
      message: "Moved crop down for chin margin",
      data: { chinMargin, minChinMargin, cropTop: top },
    });
  }

  return { cropTop: top, corrections };
};
