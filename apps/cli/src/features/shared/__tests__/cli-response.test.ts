import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createErrorResponse, createSuccessResponse } from '../cli-response.js';

describe('cli-response', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('createSuccessResponse', () => {
    it('should create a success response with data', () => {
      expect(createSuccessResponse('check', { status: 'passed' })).toEqual({
        success: true,
        command: 'check',
        timestamp: '2024-01-01T00:00:00.000Z',
        data: { status: 'passed' },
      });
    });
  });

  describe('createErrorResponse', () => {
    it('should create an error response without details', () => {
      expect(createErrorResponse('check', new Error('Pattern must not be empty'), 'CONFIG_ERROR')).toEqual({
        success: false,
        command: 'check',
        timestamp: '2024-01-01T00:00:00.000Z',
        error: { code: 'CONFIG_ERROR', message: 'Pattern must not be empty' },
      });
    });

    it('should include details when provided', () => {
      const response = createErrorResponse('check', new Error('failed'), 'VALIDATION_ERROR', { total: 2 });

      expect(response.error?.details).toEqual({ total: 2 });
    });
  });
});
