import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';

export type TerminationMode = 'graceful' | 'hard';

/**
 * Everything about starting and stopping a trial process that differs between
 * operating systems. One implementation is chosen at startup.
 */
export interface ProcessPlatform {
  readonly name: string;
  spawnOptions(cwd: string, env: NodeJS.ProcessEnv): SpawnOptions;
  terminate(child: ChildProcess, mode: TerminationMode): void;
}

const isMissingProcess = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ESRCH';

// Trials run in their own process group so a kill also reaches the helpers they fork.
export const posixPlatform: ProcessPlatform = {
  name: 'posix',
  spawnOptions: (cwd, env) => ({
    cwd,
    env,
    stdio: ['ignore', 'pipe', 'pipe'],
    detached: true,
  }),
  terminate: (child, mode) => {
    if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) return;
    const signal = mode === 'hard' ? 'SIGKILL' : 'SIGTERM';
    try {
      process.kill(-child.pid, signal);
    } catch (error) {
      if (!isMissingProcess(error)) throw error;
      child.kill(signal);
    }
  },
};

export const windowsPlatform: ProcessPlatform = {
  name: 'windows',
  spawnOptions: (cwd, env) => ({
    cwd,
    env,
    stdio: ['ignore', 'pipe', 'pipe'],
    windowsHide: true,
  }),
  terminate: (child, mode) => {
    if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) return;
    const args = ['/pid', String(child.pid), '/T'];
    if (mode === 'hard') args.push('/F');
    const killer = spawn('taskkill', args, { stdio: 'ignore', windowsHide: true });
    killer.on('error', () => {
      child.kill();
    });
  },
};

export const selectPlatform = (platform: NodeJS.Platform = process.platform): ProcessPlatform =>
  platform === 'win32' ? windowsPlatform : posixPlatform;
