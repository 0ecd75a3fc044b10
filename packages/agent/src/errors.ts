import { AppErrorSchema, type AppError } from '../../shared/src';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

const FS_ERROR_MAPPERS: Record<string, (error: NodeJS.ErrnoException) => AppError> = {
  ENOENT: (error) => ({
    code: 'fs.notFound',
    message: 'The file or directory does not exist.',
    details: { path: error.path, syscall: error.syscall }
  }),
  EACCES: (error) => ({
    code: 'fs.permissionDenied',
    message: 'Permission denied.',
    details: { path: error.path, syscall: error.syscall }
  }),
  EPERM: (error) => ({
    code: 'fs.permissionDenied',
    message: 'Operation not permitted.',
    details: { path: error.path, syscall: error.syscall }
  }),
  EEXIST: (error) => ({
    code: 'fs.exists',
    message: 'The target file already exists.',
    details: { path: error.path, syscall: error.syscall }
  })
};

export function hasErrnoCode(error: unknown, code: string): boolean {
  return isErrnoException(error) && error.code === code;
}

export function toAppError(error: unknown): AppError {
  if (!(error instanceof Error)) {
    const parsed = AppErrorSchema.safeParse(error);
    if (parsed.success) return parsed.data;
  }

  if (isErrnoException(error)) {
    const mapper = FS_ERROR_MAPPERS[error.code ?? ''];
    if (mapper) return mapper(error);
  }

  if (error instanceof Error) {
    return {
      code: 'unknown',
      message: error.message,
      details: error.stack ? { stack: error.stack } : undefined
    };
  }

  return {
    code: 'unknown',
    message: 'An unknown error occurred.',
    details: { raw: error }
  };
}

export function createAppError(code: string, message: string, details?: unknown): AppError {
  return { code, message, details };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : toAppError(error).message;
}
