import { promises as fs } from "fs";
import { getDocumentSpecsPath, UNITS } from "../config/constants";
import {
  documentSpecCatalogueSchema,
  type DocumentSpecEntry,
} from "../schemas/documentSpecSchemas";
import type { DocumentSpec } from "../types/crop";
import { DocumentSpecNotFoundError } from "../utils/errors";

const catalogueCache = new Map<string, Promise<DocumentSpecEntry[]>>();

const mmToPx = (mm: number, dpi: number): number => Math.trunc((mm / UNITS.MM_PER_INCH) * dpi);

const optionalMmToPx = (mm: number | null | undefined, dpi: number): number | null =>
  mm === null || mm === undefined ? null : mmToPx(mm, dpi);

const headBoundPx = (
  mm: number | null | undefined,
  fraction: number | null | undefined,
  photoHeightPx: number,
  dpi: number
): number => {
  if (mm !== null && mm !== undefined) return mmToPx(mm, dpi);
  if (fraction !== null && fraction !== undefined) return Math.trunc(photoHeightPx * fraction);
  return 0;
};

/**
 * Convert a millimetre catalogue entry into the pixel spec the crop pipeline consumes
 */
export const toDocumentSpec = (entry: DocumentSpecEntry): DocumentSpec => {
  const dpi = entry.dpi ?? UNITS.DEFAULT_DPI;
  const photoHeightPx = mmToPx(entry.photo_height_mm, dpi);

  return {
    countryCode: entry.country_code,
    documentName: entry.document_name,
    photoWidthPx: mmToPx(entry.photo_width_mm, dpi),
    photoHeightPx,
    headMinPx: headBoundPx(entry.head_min_mm, entry.head_min_percentage, photoHeightPx, dpi),
    headMaxPx: headBoundPx(entry.head_max_mm, entry.head_max_percentage, photoHeightPx, dpi),
    eyeMinFromBottomPx: optionalMmToPx(entry.eye_min_from_bottom_mm, dpi),
    eyeMaxFromBottomPx: optionalMmToPx(entry.eye_max_from_bottom_mm, dpi),
    eyeMinFromTopPx: optionalMmToPx(entry.eye_min_from_top_mm, dpi),
    eyeMaxFromTopPx: optionalMmToPx(entry.eye_max_from_top_mm, dpi),
    headTopMinDistPx: optionalMmToPx(entry.head_top_min_dist_mm, dpi),
    headTopMaxDistPx: optionalMmToPx(entry.head_top_max_dist_mm, dpi),
    headTopGapMinPx: optionalMmToPx(entry.head_top_gap_min_mm, dpi),
    headTopGapMaxPx: optionalMmToPx(entry.head_top_gap_max_mm, dpi),
    minVisualHeadMarginPx: entry.min_visual_head_margin_px,
    minVisualChinMarginPx: entry.min_visual_chin_margin_px,
    defaultHeadTopMarginPercent: entry.default_head_top_margin_percent,
  };
};

const readCatalogue = async (filePath: string): Promise<DocumentSpecEntry[]> => {
  const text = await fs.readFile(filePath, "utf-8");
  const raw: unknown = JSON.parse(text);
  return documentSpecCatalogueSchema.parse(raw);
};

/**
 * Load and validate the catalogue file; each path is read once per process
 */
export const loadDocumentSpecCatalogue = (
  filePath: string = getDocumentSpecsPath()
): Promise<DocumentSpecEntry[]> => {
  let pending = catalogueCache.get(filePath);
  if (!pending) {
    pending = readCatalogue(filePath);
    catalogueCache.set(filePath, pending);
    // A failed read is not cached, so the next call retries
    void pending.catch(() => catalogueCache.delete(filePath));
  }
  return pending;
};

export const clearDocumentSpecCache = (): void => {
  catalogueCache.clear();
};

export const listDocumentSpecs = async (filePath?: string): Promise<DocumentSpecEntry[]> => {
  return loadDocumentSpecCatalogue(filePath);
};

/**
 * Case-insensitive lookup by country code and document name
 */
export const findDocumentSpec = async (
  countryCode: string,
  documentName: string,
  filePath?: string
): Promise<DocumentSpecEntry | null> => {
  const entries = await loadDocumentSpecCatalogue(filePath);
  return (
    entries.find(
      (entry) =>
        entry.country_code.toLowerCase() === countryCode.toLowerCase() &&
        entry.document_name.toLowerCase() === documentName.toLowerCase()
    ) ?? null
  );
};

/**
 * Pixel spec for a catalogue entry
 * @throws DocumentSpecNotFoundError when no entry matches
 */
export const getDocumentSpec = async (
  countryCode: string,
  documentName: string,
  filePath?: string
): Promise<DocumentSpec> => {
  const entry = await findDocumentSpec(countryCode, documentName, filePath);
  if (!entry) {
    throw new DocumentSpecNotFoundError(countryCode, documentName);
  }
  return toDocumentSpec(entry);
};
