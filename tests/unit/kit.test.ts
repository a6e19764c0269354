import { describe, expect, it, vi } from 'vitest';

import { createKit } from '../../src/cli/index.js';
import {
  createFakeRuntime,
  createSink,
  UNIX_APP_DIR,
  UNIX_BIN,
  UNIX_EMBEDDED_BIN,
} from '../support/helpers.js';

const KIT_HELP = `Usage:
    kit -h/--help
    kit -v/--version
    kit command [arguments...] [options...]


Available Commands:
    env         Describe the kit installation and its environment
    shell-init  Print shell statements that put the kit on your PATH
`;

describe('createKit', () => {
  it('lists the built-in commands', () => {
    const stdout = createSink();
    const kit = createKit({ runtime: createFakeRuntime(), stdout, stderr: createSink() });

    expect(kit.run(['--help'])).toBe(0);
    expect(stdout.text()).toBe(KIT_HELP);
  });

  it('prints the product version', () => {
    const stdout = createSink();
    const kit = createKit({ runtime: createFakeRuntime(), stdout, stderr: createSink() });

    kit.run(['-v']);
    expect(stdout.text()).toBe('Omnikit Development Kit Version: 0.1.0\n');
  });

  it('warns about PATH order before running shell-init', () => {
    const stdout = createSink();
    const exit = vi.fn<(code: number) => void>();
    const runtime = createFakeRuntime({
      env: { PATH: `${UNIX_EMBEDDED_BIN}:${UNIX_BIN}` },
      existing: [UNIX_APP_DIR],
    });

    createKit({ runtime, stdout, stderr: createSink(), exit }).start(['shell-init', 'bash']);

    expect(exit).toHaveBeenCalledWith(0);
    expect(stdout.text()).toBe(
      'WARN: /opt/omnikit/embedded/bin is before /opt/omnikit/bin in your PATH, please reverse that order.\n' +
        "Consider using `kit shell-init <SHELL>` in your user's <SHELL> rc file.\n" +
        'export PATH="/opt/omnikit/bin:/opt/omnikit/embedded/bin:$PATH"\n',
    );
  });

  it('passes the user config to subcommands', () => {
    const stdout = createSink();
    const runtime = createFakeRuntime({ env: { PATH: UNIX_BIN }, existing: [UNIX_APP_DIR] });

    createKit({ runtime, stdout, stderr: createSink(), config: { shell: 'fish' } }).run(['shell-init']);

    expect(stdout.text()).toBe('set -gx PATH "/opt/omnikit/bin" "/opt/omnikit/embedded/bin" $PATH;\n');
  });
});
