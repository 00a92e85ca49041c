import { z } from "zod";

const pixels = z.number().int("Pixel values must be integers").positive();
const optionalPixels = z.number().nonnegative().nullish();

/**
 * One face-mesh point, normalized to the image size
 */
const landmarkSchema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number().optional(),
});

/**
 * Pixel document spec sent inline with a crop request
 */
export const documentSpecSchema = z
  .object({
    country_code: z.string().optional(),
    document_name: z.string().optional(),
    photo_width_px: pixels,
    photo_height_px: pixels,
    head_min_px: z.number().positive(),
    head_max_px: z.number().positive(),
    eye_min_from_bottom_px: optionalPixels,
    eye_max_from_bottom_px: optionalPixels,
    eye_min_from_top_px: optionalPixels,
    eye_max_from_top_px: optionalPixels,
    head_top_min_dist_px: optionalPixels,
    head_top_max_dist_px: optionalPixels,
    head_top_gap_min_px: optionalPixels,
    head_top_gap_max_px: optionalPixels,
    min_visual_head_margin_px: z.number().nonnegative().optional(),
    min_visual_chin_margin_px: z.number().nonnegative().optional(),
    default_head_top_margin_percent: z.number().min(0).max(1).optional(),
  })
  .refine((spec) => spec.head_min_px <= spec.head_max_px, {
    message: "head_min_px must not exceed head_max_px",
    path: ["head_min_px"],
  });

/**
 * Schema for /api/crop-plan endpoint
 */
export const cropPlanSchema = z
  .object({
    image_width: pixels,
    image_height: pixels,
    landmarks: z.array(landmarkSchema).min(1, "Landmarks cannot be empty"),
    segmentation_mask: z.array(z.array(z.number())).optional(),
    document_spec: documentSpecSchema.optional(),
    country_code: z.string().min(1).optional(),
    document_name: z.string().min(1).optional(),
  })
  .refine(
    (body) =>
      (body.document_spec !== undefined) !==
      (body.country_code !== undefined && body.document_name !== undefined),
    {
      message: "Provide either document_spec or country_code with document_name",
      path: ["document_spec"],
    }
  );

export type CropPlanRequest = z.infer<typeof cropPlanSchema>;
export type DocumentSpecPayload = z.infer<typeof documentSpecSchema>;

/**
 * Schema for /api/document-specs query string
 */
export const listDocumentSpecsQuerySchema = z.object({
  country_code: z.string().min(1).optional(),
});
