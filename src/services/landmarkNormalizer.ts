import {
  ESSENTIAL_REGION_FALLBACKS,
  EYE_SIDES,
  FACE_MESH_REGIONS,
  MESH_REGION_NAMES,
  type MeshRegionTable,
} from "../config/landmarkRegions";
import type {
  LandmarkSet,
  NormalizedLandmark,
  PixelPoint,
  ResolvedLandmarkSet,
} from "../types/crop";
import { AnalysisError } from "../utils/errors";
import { bottommostPoint, normalizedToPixel, topmostPoint } from "../utils/geometryUtils";
import { noopTrace, type TraceHook } from "../utils/trace";

/**
 * Map the detector's mesh onto named pixel-space regions.
 *
 * Indices beyond the mesh are skipped. Missing `forehead_top` / `chin_bottom`
 * fall back to the contour extrema and a missing eye center falls back to the
 * midpoint of its inner and outer corners.
 *
 * `regions` defaults to the face-mesh table; another detector topology passes its own.
 *
 * @throws AnalysisError when the mesh or image size is unusable, or when
 *   `forehead_top` / `chin_bottom` cannot be resolved
 */
export const normalizeLandmarks = (
  landmarks: ReadonlyArray<NormalizedLandmark>,
  imageHeight: number,
  imageWidth: number,
  trace: TraceHook = noopTrace,
  regions: MeshRegionTable = FACE_MESH_REGIONS
): ResolvedLandmarkSet => {
  if (landmarks.length === 0) {
    throw new AnalysisError("Landmarks are invalid or empty.");
  }
  if (imageHeight <= 0 || imageWidth <= 0) {
    throw new AnalysisError("Image height and width must be positive.");
  }

  const maxIndex = landmarks.length - 1;
  const normalized: LandmarkSet = {};

  for (const region of MESH_REGION_NAMES) {
    const points: PixelPoint[] = [];
    for (const index of regions[region]) {
      const landmark = landmarks[index];
      if (index > maxIndex || landmark === undefined) {
        trace({
          stage: "normalize",
          level: "warn",
          message: `Index ${index} for region ${region} out of bounds`,
          data: { maxIndex },
        });
        continue;
      }
      points.push(normalizedToPixel(landmark, imageWidth, imageHeight));
    }
    if (points.length > 0) {
      normalized[region] = points;
    }
  }

  const contour = normalized.face_contour;
  if (contour) {
    normalized.face_contour_top = [topmostPoint(contour)];
    normalized.face_contour_bottom = [bottommostPoint(contour)];
  } else {
    trace({
      stage: "normalize",
      level: "warn",
      message: "Face contour missing, contour fallbacks unavailable",
    });
  }

  for (const { region, fallback } of ESSENTIAL_REGION_FALLBACKS) {
    const substitute = normalized[fallback];
    if (!normalized[region] && substitute) {
      normalized[region] = substitute;
      trace({
        stage: "normalize",
        level: "warn",
        message: `Fallback: used ${fallback} for ${region}`,
      });
    }
  }

  for (const side of EYE_SIDES) {
    if (normalized[side.center]) continue;
    const inner = normalized[side.inner]?.[0];
    const outer = normalized[side.outer]?.[0];
    if (inner && outer) {
      normalized[side.center] = [{ x: (inner.x + outer.x) / 2, y: (inner.y + outer.y) / 2 }];
      trace({
        stage: "normalize",
        level: "warn",
        message: `Fallback: used inner/outer corners for ${side.center}`,
      });
    }
  }

  const { forehead_top, chin_bottom } = normalized;
  if (!forehead_top) {
    throw new AnalysisError("Essential 'forehead_top' cannot be determined.");
  }
  if (!chin_bottom) {
    throw new AnalysisError("Essential 'chin_bottom' cannot be determined.");
  }

  trace({
    stage: "normalize",
    level: "debug",
    message: "Normalized landmark regions",
    data: { regions: Object.keys(normalized).length },
  });

  return { ...normalized, forehead_top, chin_bottom };
};
