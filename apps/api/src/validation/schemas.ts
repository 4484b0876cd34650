import { z } from 'zod';
import { DecodeError, FILE_STATS_TASK, decode, isValidJobId } from '@pkg/jobs';

export const jobIdSchema = z
  .string()
  .trim()
  .refine(isValidJobId, 'id must be a URL-safe job id');

/** Standard and URL-safe alphabets are both accepted; both decode strictly. */
function decodeBase64(content: string): Buffer {
  return decode(content.replace(/\+/g, '-').replace(/\//g, '_'));
}

export const submitJobBodySchema = z
  .object({
    content: z.string({ required_error: 'content is required' }),
    encoding: z.enum(['utf8', 'base64']).default('utf8'),
    task: z
      .string()
      .trim()
      .min(1, 'task must be a non-empty string')
      .default(FILE_STATS_TASK),
  })
  .transform((body, ctx) => {
    if (body.encoding === 'utf8') {
      return { task: body.task, bytes: Buffer.from(body.content, 'utf8') };
    }
    try {
      return { task: body.task, bytes: decodeBase64(body.content) };
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        throw error;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['content'],
        message: 'content must be base64 when encoding is base64',
      });
      return z.NEVER;
    }
  });

export type SubmitJobBody = z.output<typeof submitJobBodySchema>;
