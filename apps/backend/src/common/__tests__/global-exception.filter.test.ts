import { BadRequestException } from '@nestjs/common';
import type { ArgumentsHost } from '@nestjs/common';
import { describe, expect, it, vi } from 'vitest';

import { GlobalExceptionFilter } from '../global-exception.filter';
import { LedgerError, LedgerErrorCode } from '../ledger-error';

function makeHost() {
  const json = vi.fn();
  const status = vi.fn().mockReturnValue({ json });
  const host = {
    switchToHttp: () => ({
      getResponse: () => ({ status }),
    }),
  } as unknown as ArgumentsHost;

  return { host, status, json };
}

describe('GlobalExceptionFilter', () => {
  it('renders ledger errors with their code', () => {
    const { host, status, json } = makeHost();

    new GlobalExceptionFilter().catch(new LedgerError(LedgerErrorCode.FormIdTooLong), host);

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({
      statusCode: 400,
      message: 'Form ID is too long',
      error: 'FormIdTooLong',
      timestamp: expect.any(String),
    });
  });

  it('maps each precondition to its HTTP status', () => {
    expect(new LedgerError(LedgerErrorCode.UnauthorizedAdmin).getStatus()).toBe(403);
    expect(new LedgerError(LedgerErrorCode.RecordNotFound).getStatus()).toBe(404);
    expect(new LedgerError(LedgerErrorCode.FormAlreadyApproved).getStatus()).toBe(409);
    expect(new LedgerError(LedgerErrorCode.MaxAdminsReached).message).toBe('Maximum number of admins reached');
  });

  it('keeps validation messages from the pipe', () => {
    const filter = new GlobalExceptionFilter();

    expect(filter.render(new BadRequestException(['documentHash must match pattern']))).toMatchObject({
      statusCode: 400,
      message: ['documentHash must match pattern'],
      error: 'Bad Request',
    });
  });

  it('hides unexpected errors behind a 500', () => {
    const { host, status, json } = makeHost();

    new GlobalExceptionFilter().catch(new Error('disk on fire'), host);

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith({
      statusCode: 500,
      message: 'Internal server error',
      timestamp: expect.any(String),
    });
  });
});
