import type { ImageSize } from "../types/crop";
import { roundPx } from "../utils/geometryUtils";
import { noopTrace, type TraceHook } from "../utils/trace";

export interface CropRectangle {
  cropTop: number;
  cropBottom: number;
  cropLeft: number;
  cropRight: number;
}

export interface ClampResult extends CropRectangle {
  /** Set when the scaled image is smaller than the target on some axis */
  warnings: string[];
}

/**
 * Round the crop origin to whole pixels and pull it inside the scaled image.
 * The rectangle keeps the exact target size even when the scaled image is
 * smaller than the target; the origin then sits at 0 on that axis and the crop
 * reaches past the available pixels.
 */
export const clampCropToImage = (
  cropTop: number,
  cropLeft: number,
  scaledImage: ImageSize,
  target: ImageSize,
  trace: TraceHook = noopTrace
): ClampResult => {
  const scaledWidth = roundPx(scaledImage.width);
  const scaledHeight = roundPx(scaledImage.height);
  const maxTop = scaledHeight - target.height;
  const maxLeft = scaledWidth - target.width;

  // Math.round sends exact halves up, not to even
  const roundedTop = roundPx(cropTop);
  const roundedLeft = roundPx(cropLeft);
  const top = Math.max(0, Math.min(roundedTop, maxTop));
  const left = Math.max(0, Math.min(roundedLeft, maxLeft));

  if (top !== roundedTop || left !== roundedLeft) {
    trace({
      stage: "clamp",
      level: "info",
      message: "Crop origin clamped to scaled image",
      data: { fromTop: roundedTop, toTop: top, fromLeft: roundedLeft, toLeft: left },
    });
  }

  const warnings: string[] = [];
  if (maxTop < 0 || maxLeft < 0) {
    warnings.push(
      `Scaled image ${scaledWidth}x${scaledHeight}px is smaller than the ${target.width}x${target.height}px target; the crop extends beyond the available pixels.`
    );
    trace({
      stage: "clamp",
      level: "warn",
      message: "Scaled image smaller than target",
      data: { scaledWidth, scaledHeight, targetWidth: target.width, targetHeight: target.height },
    });
  }

  return {
    cropTop: top,
    cropBottom: top + target.height,
    cropLeft: left,
    cropRight: left + target.width,
    warnings,
  };
};
