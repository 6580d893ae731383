import { HttpException, HttpStatus } from '@nestjs/common';

export enum LedgerErrorCode {
  AlreadyInitialized = 'AlreadyInitialized',
  AdminRegistryNotInitialized = 'AdminRegistryNotInitialized',
  UnauthorizedAdmin = 'UnauthorizedAdmin',
  AdminAlreadyExists = 'AdminAlreadyExists',
  AdminNotFound = 'AdminNotFound',
  MaxAdminsReached = 'MaxAdminsReached',
  CannotRemoveLastAdmin = 'CannotRemoveLastAdmin',
  FormIdTooLong = 'FormIdTooLong',
  InvalidFormId = 'InvalidFormId',
  MetadataTooLong = 'MetadataTooLong',
  InvalidFormHash = 'InvalidFormHash',
  FormAlreadyApproved = 'FormAlreadyApproved',
  RecordNotFound = 'RecordNotFound',
}

const ERROR_DETAILS: Record<LedgerErrorCode, { status: HttpStatus; message: string }> = {
  [LedgerErrorCode.AlreadyInitialized]: {
    status: HttpStatus.CONFLICT,
    message: 'Admin registry already initialized',
  },
  [LedgerErrorCode.AdminRegistryNotInitialized]: {
    status: HttpStatus.NOT_FOUND,
    message: 'Admin registry is not initialized',
  },
  [LedgerErrorCode.UnauthorizedAdmin]: { status: HttpStatus.FORBIDDEN, message: 'Unauthorized admin' },
  [LedgerErrorCode.AdminAlreadyExists]: { status: HttpStatus.CONFLICT, message: 'Admin already exists' },
  [LedgerErrorCode.AdminNotFound]: { status: HttpStatus.NOT_FOUND, message: 'Admin not found' },
  [LedgerErrorCode.MaxAdminsReached]: {
    status: HttpStatus.CONFLICT,
    message: 'Maximum number of admins reached',
  },
  [LedgerErrorCode.CannotRemoveLastAdmin]: {
    status: HttpStatus.CONFLICT,
    message: 'Cannot remove the last admin',
  },
  [LedgerErrorCode.FormIdTooLong]: { status: HttpStatus.BAD_REQUEST, message: 'Form ID is too long' },
  [LedgerErrorCode.InvalidFormId]: { status: HttpStatus.BAD_REQUEST, message: 'Form ID must not be empty' },
  [LedgerErrorCode.MetadataTooLong]: { status: HttpStatus.BAD_REQUEST, message: 'Metadata is too long' },
  [LedgerErrorCode.InvalidFormHash]: { status: HttpStatus.BAD_REQUEST, message: 'Invalid form hash' },
  [LedgerErrorCode.FormAlreadyApproved]: { status: HttpStatus.CONFLICT, message: 'Form already approved' },
  [LedgerErrorCode.RecordNotFound]: {
    status: HttpStatus.NOT_FOUND,
    message: 'Form approval record not found',
  },
};

export class LedgerError extends HttpException {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode) {
    const { status, message } = ERROR_DETAILS[code];
    super({ statusCode: status, error: code, message }, status);
    this.code = code;
  }
}
