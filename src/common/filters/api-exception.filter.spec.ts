import { NotFoundException, UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ThrottlerException } from '@nestjs/throttler';
import { weekdayQuerySchema } from '../../modules/daily-content/daily-content.controller';
import { ApiExceptionFilter } from './api-exception.filter';

interface FakeResponse {
  statusCode: number;
  body: unknown;
  status(code: number): FakeResponse;
  json(body: unknown): FakeResponse;
}

function fakeResponse(): FakeResponse {
  return {
    statusCode: 0,
    body: undefined,
    status(code: number) {
      this.statusCode = code;
      return this;
    },
    json(body: unknown) {
      this.body = body;
      return this;
    },
  };
}

function render(exception: unknown) {
  const res = fakeResponse();
  const host = new ExecutionContextHost([{ headers: { 'x-request-id': 'rid-1' } }, res, () => undefined]);
  new ApiExceptionFilter(() => new Date('2025-10-30T04:00:00Z')).catch(exception, host);
  return res;
}

describe('ApiExceptionFilter', () => {
  it('renders guard rejections as an unauthorized envelope with HTTP 200', () => {
    const res = render(new UnauthorizedException('Unauthorized'));

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({
      success: false,
      version: expect.any(String),
      date_ist: '2025-10-30',
      weekday: 'THURSDAY',
      error_code: 'unauthorized',
      error_message: 'Unauthorized',
    });
  });

  it('maps throttling and unknown routes', () => {
    expect(render(new ThrottlerException()).body).toMatchObject({ error_code: 'rate_limited' });
    expect(render(new NotFoundException('Cannot GET /nope')).body).toMatchObject({
      error_code: 'not_found',
      error_message: 'Cannot GET /nope',
    });
  });

  it('maps validation errors to invalid_request', () => {
    const parsed = weekdayQuerySchema.safeParse({ day: 'funday' });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;

    const res = render(parsed.error);

    expect(res.statusCode).toBe(200);
    expect(res.body).toMatchObject({ error_code: 'invalid_request', error_message: expect.stringMatching(/^day: /) });
  });

  it('hides unexpected error details', () => {
    expect(render(new Error('ENOSPC: disk full')).body).toMatchObject({
      error_code: 'internal_error',
      error_message: 'Internal server error',
    });
  });
});

describe('weekdayQuerySchema', () => {
  it('normalizes case and whitespace, treating blank as absent', () => {
    expect(weekdayQuerySchema.parse({ day: ' friday ' })).toEqual({ day: 'FRIDAY' });
    expect(weekdayQuerySchema.parse({ day: '' })).toEqual({ day: undefined });
    expect(weekdayQuerySchema.parse({})).toEqual({ day: undefined });
  });
});
