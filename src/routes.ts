import express from "express";
import { createCropPlan } from "./controllers/cropPlanController";
import { getSpec, listSpecs } from "./controllers/documentSpecController";
import { validateBody, validateQuery } from "./middleware/validation";
import { cropPlanSchema, listDocumentSpecsQuerySchema } from "./schemas/requestSchemas";

const router = express.Router();

// Crop planning
router.post("/crop-plan", validateBody(cropPlanSchema), createCropPlan);

// Document spec catalogue
router.get("/document-specs", validateQuery(listDocumentSpecsQuerySchema), listSpecs);
router.get("/document-specs/:country_code/:document_name", getSpec);

export default router;
