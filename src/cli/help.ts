import type { CommandSpec } from '../commands/index.js';

// ── Help ─────────────────────────────────────────────────────

export function renderHelp(programName: string, commands: readonly CommandSpec[]): string {
  const lines = [
    'Usage:',
    `    ${programName} -h/--help`,
    `    ${programName} -v/--version`,
    `    ${programName} command [arguments...] [options...]`,
    '',
    '',
    'Available Commands:',
  ];

  const width = Math.max(0, ...commands.map((c) => c.name.length)) + 2;
  for (const command of commands) {
    lines.push(`    ${command.name.padEnd(width)}${command.description}`);
  }

  return lines.join('\n') + '\n';
}

// ── Version ──────────────────────────────────────────────────

export function renderVersion(productName: string, version: string): string {
  return `${productName} Version: ${version}\n`;
}
