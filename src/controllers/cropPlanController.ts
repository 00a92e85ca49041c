import { Request, Response } from "express";
import { isPipelineTraceEnabled } from "../config/constants";
import type { CropPlanRequest, DocumentSpecPayload } from "../schemas/requestSchemas";
import { calculateCropPlan } from "../services/cropPlanService";
import { getDocumentSpec } from "../services/documentSpecService";
import type { DocumentSpec } from "../types/crop";
import { formatCropResult, sendErrorResponse } from "../utils/responseHelpers";
import { createConsoleTrace, noopTrace } from "../utils/trace";

const fromPayload = (payload: DocumentSpecPayload): DocumentSpec => ({
  countryCode: payload.country_code,
  documentName: payload.document_name,
  photoWidthPx: payload.photo_width_px,
  photoHeightPx: payload.photo_height_px,
  headMinPx: payload.head_min_px,
  headMaxPx: payload.head_max_px,
  eyeMinFromBottomPx: payload.eye_min_from_bottom_px,
  eyeMaxFromBottomPx: payload.eye_max_from_bottom_px,
  eyeMinFromTopPx: payload.eye_min_from_top_px,
  eyeMaxFromTopPx: payload.eye_max_from_top_px,
  headTopMinDistPx: payload.head_top_min_dist_px,
  headTopMaxDistPx: payload.head_top_max_dist_px,
  headTopGapMinPx: payload.head_top_gap_min_px,
  headTopGapMaxPx: payload.head_top_gap_max_px,
  minVisualHeadMarginPx: payload.min_visual_head_margin_px,
  minVisualChinMarginPx: payload.min_visual_chin_margin_px,
  defaultHeadTopMarginPercent: payload.default_head_top_margin_percent,
});

const resolveDocumentSpec = async (body: CropPlanRequest): Promise<DocumentSpec> => {
  if (body.document_spec) {
    return fromPayload(body.document_spec);
  }
  return getDocumentSpec(body.country_code ?? "", body.document_name ?? "");
};

/**
 * POST /api/crop-plan
 *
 * Request body (validated by cropPlanSchema):
 * - image_width, image_height: original image size in pixels
 * - landmarks: face-mesh points normalized to [0, 1]
 * - segmentation_mask (optional): rows of foreground values (> 0 is foreground)
 * - document_spec, or country_code + document_name from the catalogue
 *
 * Response: scale factor and crop rectangle in scaled-image pixels plus the
 * achieved measurements and compliance warnings. Unusable faces still get 200
 * with the full-frame fallback and positioning_success = false.
 */
export const createCropPlan = async (req: Request, res: Response) => {
  try {
    const body: CropPlanRequest = req.body;
    const documentSpec = await resolveDocumentSpec(body);

    const result = calculateCropPlan(
      {
        landmarks: body.landmarks,
        imageWidth: body.image_width,
        imageHeight: body.image_height,
        segmentationMask: body.segmentation_mask,
        documentSpec,
      },
      isPipelineTraceEnabled() ? createConsoleTrace() : noopTrace
    );

    res.json(formatCropResult(result));
  } catch (err: unknown) {
    sendErrorResponse(res, err);
  }
};
