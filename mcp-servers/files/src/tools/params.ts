/**
 * Zod builders for the argument shapes every tool shares.
 */

import { z } from 'zod';

/** Required string argument with the messages callers see on bad input */
export function requiredString(name: string, description: string) {
  return z
    .string({
      required_error: `missing required parameter '${name}'`,
      invalid_type_error: `parameter '${name}' must be a string`,
    })
    .describe(description);
}
