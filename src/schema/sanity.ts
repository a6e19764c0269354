import { z } from 'zod';

// ── SanityResult ─────────────────────────────────────────────

export const sanityVerdictSchema = z.enum([
  'ok',
  'warn-wrong-order',
  'warn-missing-embedded',
  'skipped-no-install',
]);

export type SanityVerdict = z.infer<typeof sanityVerdictSchema>;

export const sanityResultSchema = z.object({
  verdict: sanityVerdictSchema,
  message: z.string().min(1).optional(),
});

export type SanityResult = z.infer<typeof sanityResultSchema>;

// ── Verdict policy ───────────────────────────────────────────
// Environment problems are advisory: no verdict blocks a subcommand.

export interface VerdictPolicy {
  blocking: boolean;
  exitCode: number;
}

export const SANITY_POLICY: Readonly<Record<SanityVerdict, VerdictPolicy>> = {
  'ok': { blocking: false, exitCode: 0 },
  'warn-wrong-order': { blocking: false, exitCode: 0 },
  'warn-missing-embedded': { blocking: false, exitCode: 0 },
  'skipped-no-install': { blocking: false, exitCode: 0 },
};
