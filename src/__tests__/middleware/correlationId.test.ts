import { Request, Response, NextFunction } from 'express';
import { correlationIdMiddleware } from '../../middleware/correlationId';

describe('Correlation ID Middleware', () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let mockNext: NextFunction;
  let setHeaderSpy: jest.Mock;

  beforeEach(() => {
    setHeaderSpy = jest.fn();

    mockRequest = {
      headers: {},
      method: 'GET',
      originalUrl: '/api/test'
    };

    mockResponse = {
      setHeader: setHeaderSpy
    };

    mockNext = jest.fn();
  });

  it('should generate a correlation ID when none is sent', () => {
    correlationIdMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockRequest.correlationId).toMatch(/^req_\d+_[a-z0-9]+$/);
    expect(setHeaderSpy).toHaveBeenCalledWith('x-request-id', mockRequest.correlationId);
    expect(setHeaderSpy).toHaveBeenCalledWith('x-correlation-id', mockRequest.correlationId);
    expect(mockNext).toHaveBeenCalled();
  });

  it('should reuse an x-request-id header', () => {
    mockRequest.headers = { 'x-request-id': 'existing-request-id' };

    correlationIdMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockRequest.correlationId).toBe('existing-request-id');
    expect(setHeaderSpy).toHaveBeenCalledWith('x-correlation-id', 'existing-request-id');
  });

  it('should fall back to an x-correlation-id header', () => {
    mockRequest.headers = { 'x-correlation-id': 'existing-correlation-id' };

    correlationIdMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockRequest.correlationId).toBe('existing-correlation-id');
    expect(setHeaderSpy).toHaveBeenCalledWith('x-request-id', 'existing-correlation-id');
  });

  it('should prefer x-request-id when both are sent', () => {
    mockRequest.headers = { 'x-request-id': 'request-id', 'x-correlation-id': 'correlation-id' };

    correlationIdMiddleware(mockRequest as Request, mockResponse as Response, mockNext);

    expect(mockRequest.correlationId).toBe('request-id');
  });
});
