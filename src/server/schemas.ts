/**
 * HTTP Request and Response Schemas
 *
 * @module server/schemas
 */

import { z } from 'zod';

/**
 * Body of `POST /qa`
 */
export const QaRequestSchema = z.object({
  /** Video ID or URL */
  video: z.string().trim().min(1, 'video is required'),
  question: z.string().trim().min(1, 'question is required'),
});

export type QaRequest = z.infer<typeof QaRequestSchema>;

export const QaResponseSchema = z.object({
  answer: z.string(),
});

export type QaResponse = z.infer<typeof QaResponseSchema>;

/**
 * Flatten validation issues for the `detail` field of a 422 response
 */
export function formatZodError(error: z.ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}
