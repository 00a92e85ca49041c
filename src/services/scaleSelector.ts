import { SCALE_LIMITS } from "../config/constants";
import type { DocumentSpec } from "../types/crop";
import { clamp } from "../utils/geometryUtils";
import { noopTrace, type TraceHook } from "../utils/trace";

/**
 * Pick the scale that brings the head to the middle of the spec's head-height range.
 * The result always lies within SCALE_LIMITS.
 */
export const selectScaleFactor = (
  headHeightPx: number,
  spec: Pick<DocumentSpec, "headMinPx" | "headMaxPx">,
  trace: TraceHook = noopTrace
): number => {
  const idealHeadPx = (spec.headMinPx + spec.headMaxPx) / 2;
  let scale = idealHeadPx / headHeightPx;

  if (headHeightPx * scale < spec.headMinPx) {
    scale = spec.headMinPx / headHeightPx;
  } else if (headHeightPx * scale > spec.headMaxPx) {
    scale = spec.headMaxPx / headHeightPx;
  }

  const clamped = clamp(scale, SCALE_LIMITS.MIN, SCALE_LIMITS.MAX);
  if (clamped !== scale) {
    trace({
      stage: "scale",
      level: "warn",
      message: "Scale outside sanity limits, clamping",
      data: { requested: scale, clamped },
    });
  }

  trace({
    stage: "scale",
    level: "info",
    message: "Scale factor selected",
    data: { idealHeadPx, headHeightPx, scale: clamped, scaledHeadPx: headHeightPx * clamped },
  });
  return clamped;
};
