import {
  BadRequestException,
  HttpStatus,
  NotFoundException,
  PayloadTooLargeException,
} from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import {
  GenerationError,
  InternalError,
  ValidationError,
} from '../errors/domain-errors';
import { DomainExceptionFilter } from './domain-exception.filter';

describe('DomainExceptionFilter', () => {
  let filter: DomainExceptionFilter;

  beforeEach(() => {
    filter = new DomainExceptionFilter();
  });

  it('maps ValidationError to a 400 with details', () => {
    const body = filter.toBody(
      new ValidationError('Request validation failed', [
        'items: items must contain at least 1 elements',
      ]),
    );

    expect(body).toEqual({
      success: false,
      statusCode: HttpStatus.BAD_REQUEST,
      error: {
        kind: 'validation_error',
        message: 'Request validation failed',
        details: ['items: items must contain at least 1 elements'],
      },
    });
  });

  it('keeps the status of framework HTTP errors', () => {
    expect(filter.toBody(new NotFoundException('Cannot GET /nope'))).toEqual({
      success: false,
      statusCode: 404,
      error: { kind: 'http_error', message: 'Cannot GET /nope' },
    });
    expect(
      filter.toBody(new BadRequestException(['first', 'second'])).error.message,
    ).toBe('first; second');
  });

  it('reports framework 400s such as unparsable JSON as validation errors', () => {
    expect(
      filter.toBody(new BadRequestException('Unexpected end of JSON input')),
    ).toEqual({
      success: false,
      statusCode: 400,
      error: {
        kind: 'validation_error',
        message: 'Unexpected end of JSON input',
      },
    });
    expect(
      filter.toBody(new PayloadTooLargeException('request entity too large')),
    ).toEqual({
      success: false,
      statusCode: 413,
      error: { kind: 'http_error', message: 'request entity too large' },
    });
  });

  it('hides internal details behind a 500', () => {
    expect(filter.toBody(new InternalError('NaN total'))).toEqual({
      success: false,
      statusCode: 500,
      error: {
        kind: 'internal_error',
        message: 'Quotation could not be computed',
      },
    });
    expect(filter.toBody(new Error('db exploded')).error).toEqual({
      kind: 'internal_error',
      message: 'Internal server error',
    });
    expect(filter.toBody(new GenerationError('leaked')).statusCode).toBe(500);
  });

  it('writes the body to the HTTP response', () => {
    const json = jest.fn();
    const res = { status: jest.fn(() => ({ json })) };
    const host = new ExecutionContextHost([{}, res]);

    filter.catch(new ValidationError('bad', []), host);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({
      success: false,
      statusCode: 400,
      error: { kind: 'validation_error', message: 'bad', details: [] },
    });
  });
});
