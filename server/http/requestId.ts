/**
 * Request correlation id.
 *
 * A caller- or proxy-supplied `x-request-id` is reused when it looks like
 * an id (printable token characters, at most 128 of them); anything else
 * gets a fresh UUID so log lines can't be forged through the header.
 */

import { randomUUID } from 'node:crypto'

export const REQUEST_ID_HEADER = 'x-request-id'

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/

export function resolveRequestId(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header
  if (value !== undefined && REQUEST_ID_PATTERN.test(value)) return value
  return randomUUID()
}
