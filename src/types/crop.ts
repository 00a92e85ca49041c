/**
 * Shared type definitions for the document photo crop pipeline
 */

import type { MeshRegion } from "../config/landmarkRegions";

export type { MeshRegion };

/**
 * One point of the detector's face mesh, normalized to [0, 1] of the image size
 */
export interface NormalizedLandmark {
  x: number;
  y: number;
  z?: number;
}

/**
 * Point in original-image pixel space
 */
export interface PixelPoint {
  x: number;
  y: number;
}

export interface ImageSize {
  width: number;
  height: number;
}

/**
 * Foreground/background mask in original-image pixel space, one row per image row.
 * Values > 0 are foreground.
 */
export type SegmentationMask = ReadonlyArray<ArrayLike<number>>;

/**
 * Regions computed from other regions after the mesh has been read
 */
export type DerivedRegion = "face_contour_top" | "face_contour_bottom";

export type FaceRegion = MeshRegion | DerivedRegion;

/**
 * Pixel-space points per region. A region is present only when at least one point resolved.
 */
export type LandmarkSet = Partial<Record<FaceRegion, readonly PixelPoint[]>>;

/**
 * Landmark set whose essential regions are guaranteed after fallbacks
 */
export type ResolvedLandmarkSet = LandmarkSet & {
  forehead_top: readonly PixelPoint[];
  chin_bottom: readonly PixelPoint[];
};

export interface FaceDimensions {
  readonly headTopY: number;
  readonly chinBottomY: number;
  readonly eyeLevelY: number;
  readonly faceCenterX: number;
  readonly headHeightPx: number;
  readonly faceWidthPx: number;
}

/**
 * Pixel-space photo requirements for one document type.
 * Unit conversion from millimetres happens before a spec reaches the engine.
 */
export interface DocumentSpec {
  countryCode?: string;
  documentName?: string;
  photoWidthPx: number;
  photoHeightPx: number;
  headMinPx: number;
  headMaxPx: number;
  eyeMinFromBottomPx?: number | null;
  eyeMaxFromBottomPx?: number | null;
  eyeMinFromTopPx?: number | null;
  eyeMaxFromTopPx?: number | null;
  headTopMinDistPx?: number | null;
  headTopMaxDistPx?: number | null;
  /** Head-top to photo-top range that is only checked, never positioned by */
  headTopGapMinPx?: number | null;
  headTopGapMaxPx?: number | null;
  minVisualHeadMarginPx?: number;
  minVisualChinMarginPx?: number;
  defaultHeadTopMarginPercent?: number;
}

export interface NumericRange {
  min: number;
  max: number;
}

export type PositioningRule =
  | "HeadTopDistance"
  | "EyeFromBottom"
  | "EyeFromTop"
  | "DefaultMargin"
  | "FullFrameFallback";

export interface PositioningMethod {
  rule: PositioningRule;
  /**
   * Target distance used by the rule: head-top distance, eye distance from the
   * bottom or top edge, or the default margin in pixels
   */
  parameterPx: number;
}

export type MarginCorrection = "HeadMarginFix" | "ChinMarginFix";

export interface CropResult {
  scaleFactor: number;
  cropTop: number;
  cropBottom: number;
  cropLeft: number;
  cropRight: number;
  achievedHeadHeightPx: number;
  achievedEyeLevelFromTopPx: number;
  achievedEyeLevelFromBottomPx: number;
  achievedHeadTopFromCropTopPx: number;
  positioningMethod: PositioningMethod;
  marginCorrections: MarginCorrection[];
  positioningSuccess: boolean;
  warnings: string[];
}

export interface CropPlanInput {
  landmarks: ReadonlyArray<NormalizedLandmark>;
  imageWidth: number;
  imageHeight: number;
  segmentationMask?: SegmentationMask | null;
  documentSpec: DocumentSpec;
}
