import path from "path";

/**
 * Configuration constants for the document photo crop pipeline
 */

// Scale Factor Limits
export const SCALE_LIMITS = {
  MIN: 0.25,
  MAX: 3.0,
} as const;

// Head-top refinement search window, relative to face width / image height
export const HEAD_TOP_SEARCH = {
  HORIZONTAL_PADDING_RATIO: 0.15,
  VERTICAL_EXTENSION_RATIO: 0.05,
} as const;

// Heuristics used when landmarks cannot answer directly
export const FACE_FALLBACKS = {
  EYE_LEVEL_RATIO: 0.4,   // Eye line below head top, as share of head height
  FACE_WIDTH_RATIO: 0.6,  // Face width as share of image width
} as const;

export const MIN_HEAD_HEIGHT_PX = 1;

// Values applied when a document spec leaves them out
export const DOCUMENT_SPEC_DEFAULTS = {
  MIN_VISUAL_HEAD_MARGIN_PX: 5,
  MIN_VISUAL_CHIN_MARGIN_PX: 5,
  DEFAULT_HEAD_TOP_MARGIN_PERCENT: 0.12,
} as const;

export const UNITS = {
  MM_PER_INCH: 25.4,
  DEFAULT_DPI: 300,
} as const;

export const SERVER = {
  DEFAULT_PORT: 3000,
  JSON_BODY_LIMIT: "50mb", // Segmentation masks travel as nested arrays
} as const;

export const PATHS = {
  DOCUMENT_SPECS: path.resolve(__dirname, "../../data/documentSpecs.json"),
} as const;

/**
 * Get HTTP port from environment or use default
 */
export const getPort = (): number => {
  return parseInt(process.env.PORT || String(SERVER.DEFAULT_PORT), 10);
};

/**
 * Whether pipeline stages should report to the console
 */
export const isPipelineTraceEnabled = (): boolean => {
  const value = (process.env.CROP_TRACE || "").toLowerCase();
  return value === "true" || value === "1";
};

/**
 * Get document spec catalogue location from environment or use the bundled file
 */
export const getDocumentSpecsPath = (): string => {
  return process.env.DOCUMENT_SPECS_PATH || PATHS.DOCUMENT_SPECS;
};
