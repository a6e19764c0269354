import { z } from 'zod';

// ── Shells ──────────────────────────────────────────────────

export const shellNameSchema = z.enum(['sh', 'bash', 'zsh', 'fish', 'powershell']);

export type ShellName = z.infer<typeof shellNameSchema>;

// ── User config file ────────────────────────────────────────

export const kitConfigSchema = z
  .object({
    shell: shellNameSchema.optional(),
  })
  .strict();

export type KitConfig = z.infer<typeof kitConfigSchema>;
