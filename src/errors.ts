// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * Application error taxonomy. Each error carries a stable code and the HTTP status
 * the web layer responds with.
 */

export type AppErrorCode =
  | "not_found"
  | "unauthorized"
  | "forbidden"
  | "conflict"
  | "duplicate_email"
  | "validation"
  | "internal";

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: AppErrorCode,
    public readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AppError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(message, "not_found", 404);
    this.name = "NotFoundError";
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Not authenticated") {
    super(message, "unauthorized", 401);
    this.name = "UnauthorizedError";
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Access denied") {
    super(message, "forbidden", 403);
    this.name = "ForbiddenError";
  }
}

export class ConflictError extends AppError {
  constructor(message: string, code: "conflict" | "duplicate_email" = "conflict") {
    super(message, code, 409);
    this.name = "ConflictError";
  }
}

export class DuplicateEmailError extends ConflictError {
  constructor(email: string) {
    super(`Email already registered: ${email}`, "duplicate_email");
    this.name = "DuplicateEmailError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, "validation", 400);
    this.name = "ValidationError";
  }
}

export class InternalError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "internal", 500, { cause });
    this.name = "InternalError";
  }
}
