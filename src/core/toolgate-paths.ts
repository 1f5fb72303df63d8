import { homedir } from 'os';
import { join } from 'path';

export function resolveToolgateHome(): string {
  const override = process.env.TOOLGATE_HOME;
  if (typeof override === 'string' && override.trim().length > 0) {
    return override.trim();
  }
  return join(homedir(), '.toolgate');
}

export function getToolgatePaths(homeOverride?: string) {
  const home = homeOverride && homeOverride.trim().length > 0 ? homeOverride.trim() : resolveToolgateHome();
  return {
    home,
    config: {
      dir: join(home, 'config'),
      file: {
        main: join(home, 'config', 'config.yaml'),
      },
    },
    plugins: {
      dir: join(home, 'plugins'),
    },
  } as const;
}
