import { z } from 'zod';

/**
 * Narrows a value to a plain object record.
 */
export function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

/**
 * Verifies that an input is a ZodObject.
 * @param input
 * @returns
 */
export function isZodObject(input: unknown): input is z.AnyZodObject {
  return input instanceof z.ZodObject;
}

