/**
 * Regions read straight from the mesh topology
 */
export const MESH_REGION_NAMES = [
  "forehead_top",
  "temple_left",
  "temple_right",
  "left_eye_center",
  "left_eye_inner",
  "left_eye_outer",
  "right_eye_center",
  "right_eye_inner",
  "right_eye_outer",
  "chin_bottom",
  "face_contour",
] as const;

export type MeshRegion = (typeof MESH_REGION_NAMES)[number];

/**
 * Face-mesh indices per region (468-point mesh, 478 with iris refinement).
 * These numbers are a contract with the landmark detector's topology:
 * a different detector model needs a different table.
 */
export type MeshRegionTable = Readonly<Record<MeshRegion, readonly number[]>>;

export const FACE_MESH_REGIONS: MeshRegionTable = {
  forehead_top: [10],
  temple_left: [234, 127, 162],
  temple_right: [454, 356, 389],

  left_eye_center: [468, 470],   // Iris, only present with refined landmarks
  left_eye_inner: [133],
  left_eye_outer: [33],
  right_eye_center: [473, 475],
  right_eye_inner: [362],
  right_eye_outer: [263],

  chin_bottom: [152],

  face_contour: [
    10, 338, 297, 332, 284, 251, 389, 356, 454, 323, 361, 288,
    397, 365, 379, 378, 400, 377, 152, 148, 176, 149, 150, 136,
    172, 58, 132, 93, 234, 127, 162, 21, 54, 103, 67, 109,
  ],
};

/**
 * Essential regions and the derived region substituted when they are missing
 */
export const ESSENTIAL_REGION_FALLBACKS = [
  { region: "forehead_top", fallback: "face_contour_top" },
  { region: "chin_bottom", fallback: "face_contour_bottom" },
] as const;

export const EYE_SIDES = [
  { center: "left_eye_center", inner: "left_eye_inner", outer: "left_eye_outer" },
  { center: "right_eye_center", inner: "right_eye_inner", outer: "right_eye_outer" },
] as const;
