import { FACE_FALLBACKS, MIN_HEAD_HEIGHT_PX } from "../config/constants";
import type { FaceDimensions, ImageSize, PixelPoint, ResolvedLandmarkSet } from "../types/crop";
import { AnalysisError } from "../utils/errors";
import { horizontalExtent, mean } from "../utils/geometryUtils";
import { noopTrace, type TraceHook } from "../utils/trace";

const meanY = (points: readonly PixelPoint[] | undefined): number | null =>
  points && points.length > 0 ? mean(points.map((point) => point.y)) : null;

/**
 * Derive head height, eye line and face center from the normalized regions
 * and the refined head top.
 *
 * @throws AnalysisError when the head height is not above 1px
 */
export const analyzeFaceDimensions = (
  landmarks: ResolvedLandmarkSet,
  headTopY: number,
  image: ImageSize,
  trace: TraceHook = noopTrace
): FaceDimensions => {
  const chinBottomY = Math.max(...landmarks.chin_bottom.map((point) => point.y));
  const headHeightPx = chinBottomY - headTopY;

  if (headHeightPx <= MIN_HEAD_HEIGHT_PX) {
    throw new AnalysisError(
      `Invalid head height: ${headHeightPx.toFixed(2)} (Top: ${headTopY.toFixed(2)}, Chin: ${chinBottomY.toFixed(2)}).`
    );
  }

  const leftEyeY = meanY(landmarks.left_eye_center);
  const rightEyeY = meanY(landmarks.right_eye_center);

  // Averaged only when both eyes resolved
  let eyeLevelY: number;
  if (leftEyeY !== null && rightEyeY !== null) {
    eyeLevelY = (leftEyeY + rightEyeY) / 2;
  } else {
    eyeLevelY = headTopY + headHeightPx * FACE_FALLBACKS.EYE_LEVEL_RATIO;
    trace({
      stage: "analyze",
      level: "warn",
      message: "Eye centers not both resolved, estimating eye line from head height",
      data: { eyeLevelY, leftEyeResolved: leftEyeY !== null, rightEyeResolved: rightEyeY !== null },
    });
  }

  let faceCenterX: number;
  let faceWidthPx: number;
  const contour = landmarks.face_contour;
  if (contour && contour.length > 0) {
    const extent = horizontalExtent(contour);
    faceCenterX = (extent.min + extent.max) / 2;
    faceWidthPx = extent.max - extent.min;
  } else {
    faceCenterX = image.width / 2;
    faceWidthPx = image.width * FACE_FALLBACKS.FACE_WIDTH_RATIO;
    trace({
      stage: "analyze",
      level: "warn",
      message: "Face contour unavailable, using image center and estimated width",
      data: { faceCenterX, faceWidthPx },
    });
  }

  trace({
    stage: "analyze",
    level: "info",
    message: "Face dimensions",
    data: { headTopY, chinBottomY, eyeLevelY, faceCenterX, headHeightPx, faceWidthPx },
  });

  return { headTopY, chinBottomY, eyeLevelY, faceCenterX, headHeightPx, faceWidthPx };
};
