import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { z } from 'zod';
import {
  EmbeddingError,
  GenerationError,
  IndexConsistencyError,
  ParseError,
  RetrievalError,
  TEMPORARILY_UNAVAILABLE_MESSAGE,
} from './errors';
import { RagExceptionFilter, statusFor } from './rag-exception.filter';

function httpHost() {
  const res = {
    headersSent: false,
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockReturnValue(res);
  return { res, host: new ExecutionContextHost([{}, res]) };
}

describe('statusFor', () => {
  it.each([
    [new ParseError('bad pdf', 'doc'), 422],
    [new EmbeddingError('input too long', false), 422],
    [new EmbeddingError('throttled', true), 503],
    [new RetrievalError('index down'), 503],
    [new GenerationError('model down', true), 503],
    [new IndexConsistencyError('mixed versions', 'doc'), 409],
  ])('maps %p to %i', (error, status) => {
    expect(statusFor(error)).toBe(status);
  });
});

describe('RagExceptionFilter', () => {
  it('hides backend details behind the temporarily-unavailable message', () => {
    const { res, host } = httpHost();

    new RagExceptionFilter().catch(new RetrievalError('connection refused'), host);

    expect(res.status).toHaveBeenCalledWith(503);
    expect(res.json).toHaveBeenCalledWith({
      statusCode: 503,
      code: 'RETRIEVAL_UNAVAILABLE',
      retryable: true,
      message: TEMPORARILY_UNAVAILABLE_MESSAGE,
    });
  });

  it('passes client errors through with their message', () => {
    const { res, host } = httpHost();

    new RagExceptionFilter().catch(new ParseError('Unsupported content type: image/png'), host);

    expect(res.json).toHaveBeenCalledWith({
      statusCode: 422,
      code: 'PARSE_FAILED',
      retryable: false,
      message: 'Unsupported content type: image/png',
    });
  });

  it('turns validation failures into a 400 listing each issue', () => {
    const { res, host } = httpHost();
    const parsed = z.object({ message: z.string().min(1) }).safeParse({ message: '' });
    if (parsed.success) throw new Error('expected a validation failure');

    new RagExceptionFilter().catch(parsed.error, host);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      statusCode: 400,
      error: 'Bad Request',
      message: ['message: String must contain at least 1 character(s)'],
    });
  });

  it('leaves responses that are already on their way alone', () => {
    const { res, host } = httpHost();
    res.headersSent = true;

    new RagExceptionFilter().catch(new GenerationError('aborted', false, true), host);

    expect(res.status).not.toHaveBeenCalled();
  });
});
