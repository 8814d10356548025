/* Copyright(C) 2017-2025, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * ultraloq-errors.ts: Error classes for the Ultraloq cloud API.
 */

// Additional context we capture about a failed request.
export interface UltraloqErrorDetails {

  code?: number;
  statusCode?: number;
}

// Base class for everything that can go wrong talking to the Ultraloq cloud.
export class UltraloqApiError extends Error {

  public readonly code?: number;
  public readonly statusCode?: number;

  constructor(message: string, details: UltraloqErrorDetails = {}, options?: ErrorOptions) {

    super(message, options);

    this.name = "UltraloqApiError";
    this.code = details.code;
    this.statusCode = details.statusCode;
  }
}

// Bad credentials, or a request issued before we have a session.
export class UltraloqAuthError extends UltraloqApiError {

  constructor(message: string, details: UltraloqErrorDetails = {}, options?: ErrorOptions) {

    super(message, details, options);

    this.name = "UltraloqAuthError";
  }
}

// A device or address the account doesn't know about.
export class UltraloqNotFoundError extends UltraloqApiError {

  constructor(message: string, details: UltraloqErrorDetails = {}, options?: ErrorOptions) {

    super(message, details, options);

    this.name = "UltraloqNotFoundError";
  }
}
