import { vi } from 'vitest';
import { buildFaceMesh, type FaceLayout } from '../../__tests__/fixtures/faceMesh';
import { FACE_MESH_REGIONS } from '../../config/landmarkRegions';
import { AnalysisError } from '../../utils/errors';
import { normalizeLandmarks } from '../landmarkNormalizer';

const LAYOUT: FaceLayout = {
  imageWidth: 256,
  imageHeight: 256,
  headTopY: 64,
  chinBottomY: 192,
  eyeLevelY: 96,
  faceCenterX: 128,
  faceHalfWidth: 64,
};

describe('normalizeLandmarks', () => {
  it('should convert region points to pixel coordinates', () => {
    const regions = normalizeLandmarks(buildFaceMesh(LAYOUT), 256, 256);

    expect(regions.forehead_top).toEqual([{ x: 128, y: 64 }]);
    expect(regions.chin_bottom).toEqual([{ x: 128, y: 192 }]);
    expect(regions.left_eye_center).toEqual([
      { x: 96, y: 96 },
      { x: 96, y: 96 },
    ]);
    expect(regions.temple_right).toEqual([
      { x: 192, y: 128 },
      { x: 192, y: 128 },
      { x: 192, y: 128 },
    ]);
    expect(regions.face_contour).toHaveLength(36);
  });

  it('should derive contour top and bottom points', () => {
    const regions = normalizeLandmarks(buildFaceMesh(LAYOUT), 256, 256);

    expect(regions.face_contour_top).toEqual([{ x: 128, y: 64 }]);
    expect(regions.face_contour_bottom).toEqual([{ x: 128, y: 192 }]);
  });

  it('should fall back to eye corners when the mesh has no iris points', () => {
    const trace = vi.fn();
    const regions = normalizeLandmarks(buildFaceMesh({ ...LAYOUT, meshSize: 468 }), 256, 256, trace);

    expect(regions.left_eye_center).toEqual([{ x: 96, y: 96 }]);
    expect(regions.right_eye_center).toEqual([{ x: 160, y: 96 }]);
    expect(trace).toHaveBeenCalledWith({
      stage: 'normalize',
      level: 'warn',
      message: 'Index 468 for region left_eye_center out of bounds',
      data: { maxIndex: 467 },
    });
    expect(trace).toHaveBeenCalledWith({
      stage: 'normalize',
      level: 'warn',
      message: 'Fallback: used inner/outer corners for right_eye_center',
    });
  });

  it('should fall back to the contour extrema for forehead and chin', () => {
    const regions = normalizeLandmarks(buildFaceMesh(LAYOUT), 256, 256, undefined, {
      ...FACE_MESH_REGIONS,
      forehead_top: [600],
      chin_bottom: [601],
    });

    expect(regions.forehead_top).toEqual([{ x: 128, y: 64 }]);
    expect(regions.chin_bottom).toEqual([{ x: 128, y: 192 }]);
  });

  it('should reject an empty mesh', () => {
    expect(() => normalizeLandmarks([], 256, 256)).toThrow(AnalysisError);
    expect(() => normalizeLandmarks([], 256, 256)).toThrow('Landmarks are invalid or empty.');
  });

  it('should reject a non-positive image size', () => {
    expect(() => normalizeLandmarks(buildFaceMesh(LAYOUT), 0, 256)).toThrow(
      'Image height and width must be positive.'
    );
  });

  it('should fail when the chin cannot be resolved', () => {
    const regions = { ...FACE_MESH_REGIONS, chin_bottom: [900], face_contour: [] };

    expect(() => normalizeLandmarks(buildFaceMesh(LAYOUT), 256, 256, undefined, regions)).toThrow(
      "Essential 'chin_bottom' cannot be determined."
    );
  });
});
