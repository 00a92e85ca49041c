import { DOCUMENT_SPEC_DEFAULTS } from "../config/constants";
import type { DocumentSpec, PositioningMethod } from "../types/crop";
import { midpoint, rangeOf } from "../utils/geometryUtils";
import { noopTrace, type TraceHook } from "../utils/trace";

/**
 * Face measurements after scaling, in scaled-image pixels
 */
export interface ScaledFace {
  headTopY: number;
  chinBottomY: number;
  eyeLevelY: number;
  faceCenterX: number;
}

export interface CropOrigin {
  cropTop: number;
  cropLeft: number;
  method: PositioningMethod;
}

/**
 * Vertical origin for the first rule whose spec fields are all set:
 * head-top distance, then eye from bottom, then eye from top, then the default margin.
 */
const selectVerticalOrigin = (
  face: ScaledFace,
  spec: DocumentSpec
): { cropTop: number; method: PositioningMethod } => {
  const headTopDistance = rangeOf(spec.headTopMinDistPx, spec.headTopMaxDistPx);
  if (headTopDistance) {
    const target = midpoint(headTopDistance);
    return {
      cropTop: face.headTopY - target,
      method: { rule: "HeadTopDistance", parameterPx: target },
    };
  }

  const eyeFromBottom = rangeOf(spec.eyeMinFromBottomPx, spec.eyeMaxFromBottomPx);
  if (eyeFromBottom) {
    const targetFromBottom = midpoint(eyeFromBottom);
    const targetFromTop = spec.photoHeightPx - targetFromBottom;
    return {
      cropTop: face.eyeLevelY - targetFromTop,
      method: { rule: "EyeFromBottom", parameterPx: targetFromBottom },
    };
  }

  const eyeFromTop = rangeOf(spec.eyeMinFromTopPx, spec.eyeMaxFromTopPx);
  if (eyeFromTop) {
    const targetFromTop = midpoint(eyeFromTop);
    return {
      cropTop: face.eyeLevelY - targetFromTop,
      method: { rule: "EyeFromTop", parameterPx: targetFromTop },
    };
  }

  const marginPercent =
    spec.defaultHeadTopMarginPercent ?? DOCUMENT_SPEC_DEFAULTS.DEFAULT_HEAD_TOP_MARGIN_PERCENT;
  const marginPx = spec.photoHeightPx * marginPercent;
  return {
    cropTop: face.headTopY - marginPx,
    method: { rule: "DefaultMargin", parameterPx: marginPx },
  };
};

/**
 * Choose the crop origin in scaled-image space. Horizontally the face is always centered.
 */
export const selectCropOrigin = (
  face: ScaledFace,
  spec: DocumentSpec,
  trace: TraceHook = noopTrace
): CropOrigin => {
  const { cropTop, method } = selectVerticalOrigin(face, spec);
  const cropLeft = face.faceCenterX - spec.photoWidthPx / 2;

  trace({
    stage: "position",
    level: "info",
    message: `Positioning by ${method.rule}`,
    data: { parameterPx: method.parameterPx, cropTop, cropLeft },
  });
  return { cropTop, cropLeft, method };
};
