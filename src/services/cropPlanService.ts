import type {
  CropPlanInput,
  CropResult,
  DocumentSpec,
  MarginCorrection,
  PositioningMethod,
} from "../types/crop";
import { getErrorMessage, isAnalysisError } from "../utils/errors";
import { noopTrace, type TraceHook } from "../utils/trace";
import { clampCropToImage } from "./boundaryClamper";
import { validateCompliance } from "./complianceValidator";
import { analyzeFaceDimensions } from "./faceDimensionAnalyzer";
import { refineHeadTop } from "./headTopRefiner";
import { normalizeLandmarks } from "./landmarkNormalizer";
import { correctMargins } from "./marginCorrector";
import { selectCropOrigin, type ScaledFace } from "./positionSelector";
import { selectScaleFactor } from "./scaleSelector";

/**
 * Full-frame result returned when the input geometry cannot be used.
 * Keeps the exact target size so callers never special-case it.
 */
export const createFallbackResult = (spec: DocumentSpec, warning: string): CropResult => ({
  scaleFactor: 1.0,
  cropTop: 0,
  cropBottom: spec.photoHeightPx,
  cropLeft: 0,
  cropRight: spec.photoWidthPx,
  achievedHeadHeightPx: 0,
  achievedEyeLevelFromTopPx: 0,
  achievedEyeLevelFromBottomPx: 0,
  achievedHeadTopFromCropTopPx: 0,
  positioningMethod: { rule: "FullFrameFallback", parameterPx: 0 },
  marginCorrections: [],
  positioningSuccess: false,
  warnings: [warning],
});

/**
 * Problems with a spec's own numbers, or null when the spec is usable
 */
export const findSpecProblem = (spec: DocumentSpec): string | null => {
  if (!(spec.photoWidthPx > 0 && spec.photoHeightPx > 0)) {
    return `Photo size ${spec.photoWidthPx}x${spec.photoHeightPx}px is not positive.`;
  }
  if (!(spec.headMinPx > 0 && spec.headMaxPx > 0)) {
    return "Head pixel specs missing.";
  }
  if (spec.headMinPx > spec.headMaxPx) {
    return `Head range ${spec.headMinPx}-${spec.headMaxPx}px is inverted.`;
  }
  return null;
};

/**
 * Legacy one-line form of the positioning method, e.g. "EyeFromBottom (310.0px) +HeadMarginFix"
 */
export const describePositioningMethod = (
  method: PositioningMethod,
  corrections: readonly MarginCorrection[] = []
): string => {
  const base =
    method.rule === "FullFrameFallback"
      ? method.rule
      : `${method.rule} (${method.parameterPx.toFixed(1)}px)`;
  return [base, ...corrections.map((correction) => `+${correction}`)].join(" ");
};

/**
 * Compute scale factor and crop rectangle that fit a face to a document spec.
 *
 * Pure and synchronous. Unusable geometry (unresolved forehead or chin, head
 * height not above 1px) yields the full-frame fallback instead of throwing.
 */
export const calculateCropPlan = (input: CropPlanInput, trace: TraceHook = noopTrace): CropResult => {
  const { documentSpec: spec, imageWidth, imageHeight } = input;
  const label = [spec.countryCode, spec.documentName].filter(Boolean).join(" ") || "inline spec";
  trace({
    stage: "pipeline",
    level: "info",
    message: `Starting crop calculation for ${label}`,
    data: { imageWidth, imageHeight, maskProvided: !!input.segmentationMask },
  });

  const specProblem = findSpecProblem(spec);
  if (specProblem) {
    trace({ stage: "pipeline", level: "error", message: specProblem });
    return createFallbackResult(spec, specProblem);
  }

  const image = { width: imageWidth, height: imageHeight };

  try {
    const landmarks = normalizeLandmarks(input.landmarks, imageHeight, imageWidth, trace);
    const refinement = refineHeadTop(landmarks, image, input.segmentationMask, trace);
    const dims = analyzeFaceDimensions(landmarks, refinement.headTopY, image, trace);

    const scale = selectScaleFactor(dims.headHeightPx, spec, trace);
    const face: ScaledFace = {
      headTopY: dims.headTopY * scale,
      chinBottomY: dims.chinBottomY * scale,
      eyeLevelY: dims.eyeLevelY * scale,
      faceCenterX: dims.faceCenterX * scale,
    };

    const origin = selectCropOrigin(face, spec, trace);
    const margins = correctMargins(origin.cropTop, face.headTopY, face.chinBottomY, spec, trace);
    const rect = clampCropToImage(
      margins.cropTop,
      origin.cropLeft,
      { width: imageWidth * scale, height: imageHeight * scale },
      { width: spec.photoWidthPx, height: spec.photoHeightPx },
      trace
    );
    const report = validateCompliance(face, rect.cropTop, spec, trace);

    const result: CropResult = {
      scaleFactor: scale,
      cropTop: rect.cropTop,
      cropBottom: rect.cropBottom,
      cropLeft: rect.cropLeft,
      cropRight: rect.cropRight,
      achievedHeadHeightPx: report.achievedHeadHeightPx,
      achievedEyeLevelFromTopPx: report.achievedEyeLevelFromTopPx,
      achievedEyeLevelFromBottomPx: report.achievedEyeLevelFromBottomPx,
      achievedHeadTopFromCropTopPx: report.achievedHeadTopFromCropTopPx,
      positioningMethod: origin.method,
      marginCorrections: margins.corrections,
      positioningSuccess: report.positioningSuccess,
      warnings: [...refinement.notes, ...rect.warnings, ...report.warnings],
    };

    trace({
      stage: "pipeline",
      level: result.positioningSuccess ? "info" : "warn",
      message: `Finished by ${describePositioningMethod(result.positioningMethod, result.marginCorrections)}`,
      data: {
        scale,
        cropTop: result.cropTop,
        cropLeft: result.cropLeft,
        success: result.positioningSuccess,
      },
    });
    return result;
  } catch (err: unknown) {
    if (!isAnalysisError(err)) throw err;
    const message = getErrorMessage(err);
    trace({ stage: "pipeline", level: "error", message: `Face analysis failed: ${message}` });
    return createFallbackResult(spec, `Face analysis error: ${message}`);
  }
};
