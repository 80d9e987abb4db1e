/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from 'openai';
import { findErrorInChain, getErrorMessage } from '../../utils/errors.js';
import { NetworkError } from '../errors.js';

const TIMEOUT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const TEMPORARY_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
]);

function hasErrorCode(value: unknown): value is { code: string } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string'
  );
}

/**
 * First socket-level error code found along the `cause` chain, if any.
 */
export function findSocketErrorCode(error: unknown): string | undefined {
  return findErrorInChain(
    error,
    (candidate): candidate is { code: string } =>
      hasErrorCode(candidate) &&
      (TIMEOUT_ERROR_CODES.has(candidate.code) ||
        TEMPORARY_ERROR_CODES.has(candidate.code)),
  )?.code;
}

/**
 * Translates SDK and socket failures into {@link NetworkError}. Anything
 * that is not a network-layer condition is returned unchanged, as is a
 * caller-initiated abort.
 */
export function toNetworkError(error: unknown): unknown {
  if (error instanceof APIUserAbortError || error instanceof NetworkError) {
    return error;
  }

  const message = getErrorMessage(error);

  if (error instanceof APIConnectionTimeoutError) {
    return new NetworkError(message, { timeout: true, cause: error });
  }

  const code = findSocketErrorCode(error);
  if (code !== undefined) {
    return new NetworkError(`${message} (${code})`, {
      timeout: TIMEOUT_ERROR_CODES.has(code),
      temporary: TEMPORARY_ERROR_CODES.has(code),
      cause: error,
    });
  }

  if (error instanceof APIConnectionError) {
    return new NetworkError(message, { temporary: true, cause: error });
  }

  if (
    error instanceof APIError &&
    error.status !== undefined &&
    (error.status === 429 || error.status >= 500)
  ) {
    return new NetworkError(message, { temporary: true, cause: error });
  }

  return error;
}
