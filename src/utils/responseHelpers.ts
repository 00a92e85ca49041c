import { Response } from "express";
import type { DocumentSpecEntry } from "../schemas/documentSpecSchemas";
import { toDocumentSpec } from "../services/documentSpecService";
import { describePositioningMethod } from "../services/cropPlanService";
import type { CropResult } from "../types/crop";
import { getErrorMessage, isDocumentSpecNotFoundError } from "./errors";

/**
 * Send error response for crop planning operations
 */
export const sendErrorResponse = (res: Response, err: unknown): void => {
  if (isDocumentSpecNotFoundError(err)) {
    res.status(404).json({ error: "document_spec_not_found", message: getErrorMessage(err) });
    return;
  }

  // Log error for debugging
  console.error(err);

  // Send generic error response
  const errorMessage = getErrorMessage(err);
  res.status(500).json({
    error: "internal error",
    message: process.env.NODE_ENV === "development" ? errorMessage : undefined
  });
};

/**
 * Crop result in the API's snake_case shape
 */
export const formatCropResult = (result: CropResult) => ({
  scale_factor: result.scaleFactor,
  crop_top: result.cropTop,
  crop_bottom: result.cropBottom,
  crop_left: result.cropLeft,
  crop_right: result.cropRight,
  achieved_head_height_px: result.achievedHeadHeightPx,
  achieved_eye_level_from_top_px: result.achievedEyeLevelFromTopPx,
  achieved_eye_level_from_bottom_px: result.achievedEyeLevelFromBottomPx,
  achieved_head_top_from_crop_top_px: result.achievedHeadTopFromCropTopPx,
  positioning_method: {
    rule: result.positioningMethod.rule,
    parameter_px: result.positioningMethod.parameterPx,
  },
  margin_corrections: result.marginCorrections,
  positioning_summary: describePositioningMethod(result.positioningMethod, result.marginCorrections),
  positioning_success: result.positioningSuccess,
  warnings: result.warnings,
});

/**
 * Catalogue entry with its pixel values alongside the physical ones
 */
export const formatDocumentSpecEntry = (entry: DocumentSpecEntry) => {
  const spec = toDocumentSpec(entry);
  return {
    ...entry,
    photo_width_px: spec.photoWidthPx,
    photo_height_px: spec.photoHeightPx,
    head_min_px: spec.headMinPx,
    head_max_px: spec.headMaxPx,
    eye_min_from_bottom_px: spec.eyeMinFromBottomPx ?? null,
    eye_max_from_bottom_px: spec.eyeMaxFromBottomPx ?? null,
    eye_min_from_top_px: spec.eyeMinFromTopPx ?? null,
    eye_max_from_top_px: spec.eyeMaxFromTopPx ?? null,
    head_top_min_dist_px: spec.headTopMinDistPx ?? null,
    head_top_max_dist_px: spec.headTopMaxDistPx ?? null,
    head_top_gap_min_px: spec.headTopGapMinPx ?? null,
    head_top_gap_max_px: spec.headTopGapMaxPx ?? null,
  };
};
