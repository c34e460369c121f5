import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Request, Response, NextFunction } from 'express';
import { createTokenValidator } from '../../src/auth/middleware.js';

describe('auth/middleware', () => {
  describe('createTokenValidator', () => {
    let mockReq: Partial<Request>;
    let mockRes: Partial<Response>;
    let mockNext: NextFunction;
    let jsonMock: ReturnType<typeof vi.fn>;
    let statusMock: ReturnType<typeof vi.fn>;

    beforeEach(() => {
      jsonMock = vi.fn();
      statusMock = vi.fn().mockReturnValue({ json: jsonMock });

      mockReq = {
        headers: {},
        query: {},
      };
      mockRes = {
        status: statusMock,
        json: jsonMock,
      };
      mockNext = vi.fn();
    });

    it('should let every request through when no token is configured', () => {
      createTokenValidator('')(mockReq as Request, mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
      expect(statusMock).not.toHaveBeenCalled();
    });

    it('should call next() with a valid bearer token', () => {
      mockReq.headers = { authorization: 'Bearer valid-secret-token' };

      createTokenValidator('valid-secret-token')(mockReq as Request, mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
      expect(statusMock).not.toHaveBeenCalled();
    });

    it('should call next() with a valid query token', () => {
      mockReq.query = { token: 'valid-secret-token' };

      createTokenValidator('valid-secret-token')(mockReq as Request, mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
    });

    it('should prefer the Authorization header over the query parameter', () => {
      mockReq.headers = { authorization: 'Bearer valid-secret-token' };
      mockReq.query = { token: 'wrong-token' };

      createTokenValidator('valid-secret-token')(mockReq as Request, mockRes as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
    });

    it('should return 401 when the token is missing', () => {
      createTokenValidator('valid-secret-token')(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(401);
      expect(jsonMock).toHaveBeenCalledWith({ error: 'Authentication token required' });
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('should ignore non-bearer Authorization headers', () => {
      mockReq.headers = { authorization: 'Basic dXNlcjpwYXNz' };

      createTokenValidator('valid-secret-token')(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(401);
    });

    it('should return 403 for a wrong token', () => {
      mockReq.headers = { authorization: 'Bearer wrong-secret-token' };

      createTokenValidator('valid-secret-token')(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(403);
      expect(jsonMock).toHaveBeenCalledWith({ error: 'Invalid authentication token' });
      expect(mockNext).not.toHaveBeenCalled();
    });

    it('should return 403 for a token of a different length', () => {
      mockReq.query = { token: 'short' };

      createTokenValidator('valid-secret-token')(mockReq as Request, mockRes as Response, mockNext);

      expect(statusMock).toHaveBeenCalledWith(403);
    });
  });
});
