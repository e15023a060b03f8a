export const ErrorCode = {
  EINVAL: 'EINVAL',
  EHOSTSET: 'EHOSTSET',
  EREADONLY: 'EREADONLY',
  ENOINPUT: 'ENOINPUT',
  EDISPOSED: 'EDISPOSED',
  ENOTSTARTED: 'ENOTSTARTED',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export class ConsoleError extends Error {
  code: ErrorCodeType;

  constructor(code: ErrorCodeType, message: string) {
    super(`${code}: ${message}`);
    this.code = code;
    this.name = 'ConsoleError';
  }
}
