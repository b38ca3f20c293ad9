export type ErrorKind =
  | "NotFound"
  | "AccessDenied"
  | "InvalidState"
  | "Conflict"
  | "ValidationError"
  | "Unauthorized";

export type ErrorCode =
  | "ProjectNotFound"
  | "TaskNotFound"
  | "TagNotFound"
  | "UserNotFound"
  | "CommentNotFound"
  | "NotAMember"
  | "TagNotAttached"
  | "AccessDenied"
  | "GlobalTagImmutable"
  | "NotCommentAuthor"
  | "InvalidAssignee"
  | "TagScopeMismatch"
  | "CannotRemoveOwner"
  | "CannotChangeOwnerRole"
  | "AlreadyMember"
  | "CannotAddOwner"
  | "DuplicateTagName"
  | "UsernameTaken"
  | "EmailTaken"
  | "WriteConflict"
  | "ValidationError"
  | "Unauthorized";

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  NotFound: 404,
  AccessDenied: 403,
  InvalidState: 400,
  Conflict: 409,
  ValidationError: 400,
  Unauthorized: 401,
};

export class AppError extends Error {
  readonly kind: ErrorKind;
  readonly code: ErrorCode;

  constructor(kind: ErrorKind, code: ErrorCode, message: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.code = code;
  }

  get status(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

export class NotFoundError extends AppError {
  constructor(code: ErrorCode, message: string) {
    super("NotFound", code, message);
  }
}

export class AccessDeniedError extends AppError {
  constructor(message = "Access denied", code: ErrorCode = "AccessDenied") {
    super("AccessDenied", code, message);
  }
}

export class InvalidStateError extends AppError {
  constructor(code: ErrorCode, message: string) {
    super("InvalidState", code, message);
  }
}

export class ConflictError extends AppError {
  constructor(code: ErrorCode, message: string) {
    super("Conflict", code, message);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super("ValidationError", "ValidationError", message);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Authentication required") {
    super("Unauthorized", "Unauthorized", message);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
