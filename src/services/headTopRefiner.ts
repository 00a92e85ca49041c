import { HEAD_TOP_SEARCH } from "../config/constants";
import type { ImageSize, PixelPoint, ResolvedLandmarkSet, SegmentationMask } from "../types/crop";
import { horizontalExtent } from "../utils/geometryUtils";
import { noopTrace, type TraceHook } from "../utils/trace";

export interface HeadTopRefinement {
  /** Refined head top; never below the landmark forehead */
  headTopY: number;
  landmarkHeadTopY: number;
  /** Topmost foreground row inside the search window, when one was found */
  maskHeadTopY: number | null;
  /** Advisory notes for the caller's warning list */
  notes: string[];
}

interface SearchWindow {
  xStart: number;
  xEnd: number;
  yStart: number;
  yEnd: number;
}

/**
 * Points bounding the face horizontally: both temples when available, else the contour
 */
const horizontalReferencePoints = (landmarks: ResolvedLandmarkSet): readonly PixelPoint[] => {
  const temples = [...(landmarks.temple_left ?? []), ...(landmarks.temple_right ?? [])];
  if (temples.length > 0) return temples;
  return landmarks.face_contour ?? [];
};

const findTopmostForegroundRow = (
  mask: SegmentationMask,
  window: SearchWindow
): number | null => {
  const yEnd = Math.min(window.yEnd, mask.length);
  for (let y = window.yStart; y < yEnd; y++) {
    const row = mask[y];
    const xEnd = Math.min(window.xEnd, row.length);
    for (let x = window.xStart; x < xEnd; x++) {
      if (row[x] > 0) return y;
    }
  }
  return null;
};

/**
 * Tighten the landmark forehead estimate with the segmentation mask so hair above
 * the forehead counts as head. The result can only move up, never down.
 */
export const refineHeadTop = (
  landmarks: ResolvedLandmarkSet,
  image: ImageSize,
  mask: SegmentationMask | null | undefined,
  trace: TraceHook = noopTrace
): HeadTopRefinement => {
  const landmarkHeadTopY = Math.min(...landmarks.forehead_top.map((point) => point.y));
  const notes: string[] = [];

  if (!mask || mask.length === 0) {
    trace({
      stage: "refine",
      level: "info",
      message: "No segmentation mask, using landmark head top",
      data: { headTopY: landmarkHeadTopY },
    });
    return { headTopY: landmarkHeadTopY, landmarkHeadTopY, maskHeadTopY: null, notes };
  }

  const maskWidth = mask[0].length;
  if (mask.length !== image.height || maskWidth !== image.width) {
    notes.push(
      `Segmentation mask ${maskWidth}x${mask.length} differs from image ${image.width}x${image.height}; refinement is best-effort.`
    );
    trace({
      stage: "refine",
      level: "warn",
      message: "Mask dimensions differ from image",
      data: { maskWidth, maskHeight: mask.length, imageWidth: image.width, imageHeight: image.height },
    });
  }

  let xStart = 0;
  let xEnd = image.width;
  const referencePoints = horizontalReferencePoints(landmarks);
  if (referencePoints.length > 0) {
    const extent = horizontalExtent(referencePoints);
    const padding = (extent.max - extent.min) * HEAD_TOP_SEARCH.HORIZONTAL_PADDING_RATIO;
    xStart = Math.max(0, Math.trunc(extent.min - padding));
    xEnd = Math.min(image.width, Math.trunc(extent.max + padding));
  }
  if (xStart >= xEnd) {
    notes.push("Degenerate head-top search window; widened to the full image width.");
    trace({ stage: "refine", level: "warn", message: "Degenerate search window, using full width", data: { xStart, xEnd } });
    xStart = 0;
    xEnd = image.width;
  }

  const yEnd = Math.min(
    image.height,
    Math.trunc(landmarkHeadTopY + image.height * HEAD_TOP_SEARCH.VERTICAL_EXTENSION_RATIO)
  );

  const maskHeadTopY = findTopmostForegroundRow(mask, { xStart, xEnd, yStart: 0, yEnd });
  if (maskHeadTopY === null) {
    notes.push("Segmentation mask has no foreground above the forehead; using landmark head top.");
    trace({
      stage: "refine",
      level: "warn",
      message: "No foreground pixels in search window",
      data: { xStart, xEnd, yEnd },
    });
    return { headTopY: landmarkHeadTopY, landmarkHeadTopY, maskHeadTopY: null, notes };
  }

  const headTopY = Math.min(landmarkHeadTopY, maskHeadTopY);
  trace({
    stage: "refine",
    level: "info",
    message: "Head top refined with segmentation mask",
    data: { landmarkHeadTopY, maskHeadTopY, headTopY },
  });
  return { headTopY, landmarkHeadTopY, maskHeadTopY, notes };
};
