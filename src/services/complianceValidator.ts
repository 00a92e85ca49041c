import type { DocumentSpec, NumericRange } from "../types/crop";
import { clamp, isWithin, rangeOf, roundPx } from "../utils/geometryUtils";
import { noopTrace, type TraceHook } from "../utils/trace";
import type { ScaledFace } from "./positionSelector";

export interface ComplianceReport {
  achievedHeadHeightPx: number;
  achievedEyeLevelFromTopPx: number;
  achievedEyeLevelFromBottomPx: number;
  achievedHeadTopFromCropTopPx: number;
  positioningSuccess: boolean;
  warnings: string[];
}

const formatRange = (range: NumericRange): string => `${range.min}-${range.max}px`;

/**
 * Measure the face inside the final crop and check it against the spec.
 * Head height decides success; eye line and head-top distance only add warnings.
 */
export const validateCompliance = (
  face: Pick<ScaledFace, "headTopY" | "chinBottomY" | "eyeLevelY">,
  cropTop: number,
  spec: DocumentSpec,
  trace: TraceHook = noopTrace
): ComplianceReport => {
  const photoHeight = spec.photoHeightPx;
  const headTopFromCropTop = face.headTopY - cropTop;
  const chinBottomFromCropTop = face.chinBottomY - cropTop;
  const eyeLevelFromCropTop = face.eyeLevelY - cropTop;
  const eyeFromBottom = photoHeight - eyeLevelFromCropTop;

  // Head clipped by the frame edges only counts where it is visible
  const visibleHeadHeight =
    clamp(chinBottomFromCropTop, 0, photoHeight) - clamp(headTopFromCropTop, 0, photoHeight);

  const report: ComplianceReport = {
    achievedHeadHeightPx: roundPx(visibleHeadHeight),
    achievedEyeLevelFromTopPx: roundPx(eyeLevelFromCropTop),
    achievedEyeLevelFromBottomPx: roundPx(eyeFromBottom),
    achievedHeadTopFromCropTopPx: roundPx(headTopFromCropTop),
    positioningSuccess: true,
    warnings: [],
  };

  const headRange: NumericRange = { min: spec.headMinPx, max: spec.headMaxPx };
  if (!isWithin(report.achievedHeadHeightPx, headRange)) {
    report.positioningSuccess = false;
    report.warnings.push(
      `Head height ${report.achievedHeadHeightPx}px (visible) outside spec (${formatRange(headRange)}).`
    );
  }

  const eyeFromBottomRange = rangeOf(spec.eyeMinFromBottomPx, spec.eyeMaxFromBottomPx);
  const eyeFromTopRange = rangeOf(spec.eyeMinFromTopPx, spec.eyeMaxFromTopPx);
  if (eyeFromBottomRange) {
    if (!isWithin(report.achievedEyeLevelFromBottomPx, eyeFromBottomRange)) {
      report.warnings.push(
        `Eyes from bottom ${report.achievedEyeLevelFromBottomPx}px outside spec (${formatRange(eyeFromBottomRange)}).`
      );
    }
  } else if (eyeFromTopRange) {
    if (!isWithin(report.achievedEyeLevelFromTopPx, eyeFromTopRange)) {
      report.warnings.push(
        `Eyes from top ${report.achievedEyeLevelFromTopPx}px outside spec (${formatRange(eyeFromTopRange)}).`
      );
    }
  }

  const headTopRange =
    rangeOf(spec.headTopMinDistPx, spec.headTopMaxDistPx) ?? rangeOf(spec.headTopGapMinPx, spec.headTopGapMaxPx);
  if (headTopRange && !isWithin(report.achievedHeadTopFromCropTopPx, headTopRange)) {
    report.warnings.push(
      `Head-top distance ${report.achievedHeadTopFromCropTopPx}px outside spec (${formatRange(headTopRange)}).`
    );
  }

  trace({
    stage: "validate",
    level: report.positioningSuccess ? "info" : "warn",
    message: report.positioningSuccess ? "Crop meets head height spec" : "Crop fails head height spec",
    data: {
      headHeightPx: report.achievedHeadHeightPx,
      eyeFromBottomPx: report.achievedEyeLevelFromBottomPx,
      headTopFromCropTopPx: report.achievedHeadTopFromCropTopPx,
      warnings: report.warnings.length,
    },
  });
  return report;
};
