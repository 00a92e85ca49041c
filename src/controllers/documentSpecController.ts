import { Request, Response } from "express";
import { findDocumentSpec, listDocumentSpecs } from "../services/documentSpecService";
import { formatDocumentSpecEntry, sendErrorResponse } from "../utils/responseHelpers";

/**
 * GET /api/document-specs
 * Optional ?country_code= filter (case-insensitive)
 */
export const listSpecs = async (req: Request, res: Response) => {
  try {
    const countryCode = typeof req.query.country_code === "string" ? req.query.country_code : undefined;
    const entries = await listDocumentSpecs();
    const filtered = countryCode
      ? entries.filter((entry) => entry.country_code.toLowerCase() === countryCode.toLowerCase())
      : entries;

    res.json({
      document_specs: filtered.map(formatDocumentSpecEntry),
      total: filtered.length,
    });
  } catch (err: unknown) {
    sendErrorResponse(res, err);
  }
};

/**
 * GET /api/document-specs/:country_code/:document_name
 */
export const getSpec = async (req: Request, res: Response) => {
  try {
    const { country_code, document_name } = req.params;
    const entry = await findDocumentSpec(country_code, document_name);
    if (!entry) {
      return res.status(404).json({ error: "document_spec_not_found" });
    }
    res.json(formatDocumentSpecEntry(entry));
  } catch (err: unknown) {
    sendErrorResponse(res, err);
  }
};
