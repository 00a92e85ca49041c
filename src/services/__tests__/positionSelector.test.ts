import type { DocumentSpec } from '../../types/crop';
import { selectCropOrigin, type ScaledFace } from '../positionSelector';

const FACE: ScaledFace = {
  headTopY: 540,
  chinBottomY: 900,
  eyeLevelY: 648,
  faceCenterX: 900,
};

const BASE_SPEC: DocumentSpec = {
  photoWidthPx: 600,
  photoHeightPx: 600,
  headMinPx: 300,
  headMaxPx: 420,
};

describe('selectCropOrigin', () => {
  it('should prefer the head-top distance when it is set', () => {
    const origin = selectCropOrigin(FACE, {
      ...BASE_SPEC,
      headTopMinDistPx: 40,
      headTopMaxDistPx: 80,
      eyeMinFromBottomPx: 280,
      eyeMaxFromBottomPx: 340,
    });

    expect(origin.cropTop).toBe(480);
    expect(origin.method).toEqual({ rule: 'HeadTopDistance', parameterPx: 60 });
  });

  it('should place the eyes from the bottom when no head-top distance is set', () => {
    const origin = selectCropOrigin(FACE, { ...BASE_SPEC, eyeMinFromBottomPx: 280, eyeMaxFromBottomPx: 340 });

    expect(origin.cropTop).toBe(358);
    expect(origin.method).toEqual({ rule: 'EyeFromBottom', parameterPx: 310 });
  });

  it('should not position by the head-top gap range', () => {
    const origin = selectCropOrigin(FACE, {
      ...BASE_SPEC,
      headTopGapMinPx: 40,
      headTopGapMaxPx: 80,
      eyeMinFromBottomPx: 280,
      eyeMaxFromBottomPx: 340,
    });

    expect(origin.cropTop).toBe(358);
    expect(origin.method).toEqual({ rule: 'EyeFromBottom', parameterPx: 310 });
  });

  it('should place the eyes from the top when only that range is set', () => {
    const origin = selectCropOrigin(FACE, { ...BASE_SPEC, eyeMinFromTopPx: 200, eyeMaxFromTopPx: 260 });

    expect(origin.cropTop).toBe(418);
    expect(origin.method).toEqual({ rule: 'EyeFromTop', parameterPx: 230 });
  });

  it('should skip a range with only one bound', () => {
    const origin = selectCropOrigin(FACE, { ...BASE_SPEC, headTopMinDistPx: 40, headTopMaxDistPx: null });

    expect(origin.method.rule).toBe('DefaultMargin');
  });

  it('should fall back to the default head-top margin', () => {
    const origin = selectCropOrigin(FACE, BASE_SPEC);

    expect(origin.cropTop).toBeCloseTo(468, 10);
    expect(origin.method.rule).toBe('DefaultMargin');
    expect(origin.method.parameterPx).toBeCloseTo(72, 10);
  });

  it('should use the spec margin percentage when given', () => {
    const origin = selectCropOrigin(FACE, { ...BASE_SPEC, defaultHeadTopMarginPercent: 0.25 });

    expect(origin.cropTop).toBe(390);
    expect(origin.method).toEqual({ rule: 'DefaultMargin', parameterPx: 150 });
  });

  it('should center the face horizontally', () => {
    expect(selectCropOrigin(FACE, BASE_SPEC).cropLeft).toBe(600);
    expect(selectCropOrigin({ ...FACE, faceCenterX: 100 }, BASE_SPEC).cropLeft).toBe(-200);
  });
});
