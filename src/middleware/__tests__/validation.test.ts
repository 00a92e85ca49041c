import { vi, type Mock } from 'vitest';
import { Request, Response, NextFunction } from 'express';
import { cropPlanSchema, listDocumentSpecsQuerySchema } from '../../schemas/requestSchemas';
import { validateBody, validateQuery } from '../validation';

describe('Validation Middleware', () => {
  let mockReq: Partial<Request>;
  let mockRes: Partial<Response>;
  let mockNext: NextFunction;
  let statusMock: Mock<(code: number) => Response>;
  let jsonMock: ReturnType<typeof vi.fn>;

  const validBody = {
    image_width: 1000,
    image_height: 1200,
    landmarks: [{ x: 0.5, y: 0.25 }],
    country_code: 'US',
    document_name: 'Passport',
  };

  beforeEach(() => {
    mockReq = {};
    jsonMock = vi.fn();
    mockRes = {
      json: jsonMock,
    } as Partial<Response>;
    statusMock = vi.fn((code: number) => mockRes as Response);
    mockRes.status = statusMock;
    mockNext = vi.fn();
  });

  describe('validateBody', () => {
    const middleware = validateBody(cropPlanSchema);

    it('should pass validation for a catalogue request', () => {
      mockReq.body = validBody;

      middleware(mockReq as Request, mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
      expect(statusMock).not.toHaveBeenCalled();
      expect(jsonMock).not.toHaveBeenCalled();
    });

    it('should reject non-integer image sizes with 400', () => {
      mockReq.body = { ...validBody, image_width: 10.5 };

      middleware(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(400);
      expect(jsonMock).toHaveBeenCalledWith({
        error: 'validation_error',
        details: [{ field: 'image_width', message: 'Pixel values must be integers' }],
      });
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('should reject empty landmarks', () => {
      mockReq.body = { ...validBody, landmarks: [] };

      middleware(mockReq as Request, mockRes as Response, mockNext);

      expect(jsonMock).toHaveBeenCalledWith({
        error: 'validation_error',
        details: [{ field: 'landmarks', message: 'Landmarks cannot be empty' }],
      });
    });

    it('should require exactly one way of naming the document spec', () => {
      mockReq.body = { ...validBody, document_name: undefined };

      middleware(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(400);
      expect(jsonMock).toHaveBeenCalledWith({
        error: 'validation_error',
        details: [
          {
            field: 'document_spec',
            message: 'Provide either document_spec or country_code with document_name',
          },
        ],
      });
    });

    it('should reject an inline spec with an inverted head range', () => {
      mockReq.body = {
        image_width: 1000,
        image_height: 1200,
        landmarks: [{ x: 0.5, y: 0.25 }],
        document_spec: { photo_width_px: 600, photo_height_px: 600, head_min_px: 420, head_max_px: 300 },
      };

      middleware(mockReq as Request, mockRes as Response, mockNext);

      expect(jsonMock).toHaveBeenCalledWith({
        error: 'validation_error',
        details: [{ field: 'document_spec.head_min_px', message: 'head_min_px must not exceed head_max_px' }],
      });
    });

    it('should replace req.body with validated data', () => {
      mockReq.body = { ...validBody, extra: 'field' };

      middleware(mockReq as Request, mockRes as Response, mockNext);

      expect(mockReq.body).toEqual(validBody);
      expect(mockReq.body).not.toHaveProperty('extra');
    });

    it('should answer 500 when the schema itself throws', () => {
      const broken = cropPlanSchema.transform(() => {
        throw new TypeError('boom');
      });
      mockReq.body = validBody;

      validateBody(broken)(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(500);
      expect(jsonMock).toHaveBeenCalledWith({
        error: 'internal_error',
        message: 'Validation failed unexpectedly',
      });
    });
  });

  describe('validateQuery', () => {
    const middleware = validateQuery(listDocumentSpecsQuerySchema);

    it('should pass validation for valid query params', () => {
      mockReq.query = { country_code: 'US' };

      middleware(mockReq as Request, mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
      expect(mockReq.query).toEqual({ country_code: 'US' });
    });

    it('should pass without a filter', () => {
      mockReq.query = {};

      middleware(mockReq as Request, mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
    });

    it('should reject an empty filter', () => {
      mockReq.query = { country_code: '' };

      middleware(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(400);
      expect(jsonMock).toHaveBeenCalledWith({
        error: 'validation_error',
        details: expect.any(Array),
      });
    });
  });
});
