import { z } from 'zod';

export const TokenSchema = z.object({
  text: z
    .string()
    .min(1, 'Token text must not be empty')
    .refine((text) => text === text.trim(), 'Token text must be trimmed'),
  y: z.number().int(),
  x: z.number().int(),
  confidence: z.number().min(0).max(1),
});
export type TokenInput = z.infer<typeof TokenSchema>;

export const TokenListSchema = z.array(TokenSchema);

/**
 * Validate an unknown value (e.g. a parsed tokens file) as a token list.
 * Throws with the first few issues listed.
 */
export function parseTokenList(value: unknown): TokenInput[] {
  const result = TokenListSchema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues
    .slice(0, 5)
    .map((issue) => `  /${issue.path.join('/')}: ${issue.message}`)
    .join('\n');
  throw new Error(`Invalid token list:\n${issues}`);
}
