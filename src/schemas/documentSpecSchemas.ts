import { z } from "zod";

const millimetres = z.number().positive();
const optionalMillimetres = millimetres.nullish();
const fraction = z.number().gt(0).max(1);

/**
 * One physical document photo specification as stored in the catalogue file.
 * Head height comes either in millimetres or as a fraction of photo height.
 */
export const documentSpecEntrySchema = z
  .object({
    country_code: z.string().min(1),
    document_name: z.string().min(1),
    photo_width_mm: millimetres,
    photo_height_mm: millimetres,
    dpi: z.number().int().positive().optional(),
    head_min_mm: optionalMillimetres,
    head_max_mm: optionalMillimetres,
    head_min_percentage: fraction.nullish(),
    head_max_percentage: fraction.nullish(),
    eye_min_from_bottom_mm: optionalMillimetres,
    eye_max_from_bottom_mm: optionalMillimetres,
    eye_min_from_top_mm: optionalMillimetres,
    eye_max_from_top_mm: optionalMillimetres,
    head_top_min_dist_mm: z.number().nonnegative().nullish(),
    head_top_max_dist_mm: z.number().nonnegative().nullish(),
    head_top_gap_min_mm: z.number().nonnegative().nullish(),
    head_top_gap_max_mm: z.number().nonnegative().nullish(),
    min_visual_head_margin_px: z.number().int().nonnegative().optional(),
    min_visual_chin_margin_px: z.number().int().nonnegative().optional(),
    default_head_top_margin_percent: fraction.optional(),
    background_color: z.enum(["white", "off-white", "light_grey", "blue"]).optional(),
    glasses_allowed: z.enum(["yes", "no", "if_no_glare"]).optional(),
    neutral_expression_required: z.boolean().optional(),
    other_requirements: z.string().optional(),
    file_size_min_kb: z.number().int().positive().optional(),
    file_size_max_kb: z.number().int().positive().optional(),
    source_urls: z.array(z.string()).optional(),
  })
  .refine((entry) => entry.head_min_mm != null || entry.head_min_percentage != null, {
    message: "head_min_mm or head_min_percentage is required",
    path: ["head_min_mm"],
  })
  .refine((entry) => entry.head_max_mm != null || entry.head_max_percentage != null, {
    message: "head_max_mm or head_max_percentage is required",
    path: ["head_max_mm"],
  });

export const documentSpecCatalogueSchema = z.array(documentSpecEntrySchema);

export type DocumentSpecEntry = z.infer<typeof documentSpecEntrySchema>;
