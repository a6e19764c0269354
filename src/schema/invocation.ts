import { z } from 'zod';

// ── ParsedInvocation ────────────────────────────────────────

export const parsedInvocationSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('help') }),
  z.object({ mode: z.literal('version') }),
  z.object({ mode: z.literal('invalid-option'), token: z.string().min(1) }),
  z.object({
    mode: z.literal('unknown-command'),
    commandName: z.string().min(1),
    args: z.array(z.string()),
  }),
  z.object({
    mode: z.literal('run'),
    commandName: z.string().min(1),
    args: z.array(z.string()),
  }),
]);

export type ParsedInvocation = z.infer<typeof parsedInvocationSchema>;

export type InvocationMode = ParsedInvocation['mode'];
