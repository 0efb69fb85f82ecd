import { spawn, type ChildProcess } from 'node:child_process';
import os from 'node:os';
import readline from 'node:readline';
import type { Readable } from 'node:stream';
import { LaunchError, SupervisionError } from './errors.js';
import { selectPlatform, type ProcessPlatform, type TerminationMode } from './platform.js';
import { LineQueue } from '../utils/line-queue.js';

export interface TrialCommand {
  command: string;
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export interface TrialHandle {
  readonly pid: number;
  /** stdout and stderr lines, interleaved in the order they arrived. */
  lines(): AsyncIterable<string>;
  wait(): Promise<number>;
  terminate(mode: TerminationMode): void;
}

export interface TrialLauncher {
  launch(command: TrialCommand): Promise<TrialHandle>;
}

/** Splits an args string, keeping double-quoted segments together. */
export const splitArgs = (args: string) =>
  args.trim().length > 0
    ? args
        .trim()
        .match(/(?:"[^"]*"|[^\s"]+)/g)
        ?.map((value) => value.replace(/^"(.*)"$/, '$1')) ?? []
    : [];

const signalNumbers = new Map<string, number>(Object.entries(os.constants.signals));

const exitCodeOf = (code: number | null, signal: NodeJS.Signals | null) => {
  if (code !== null) return code;
  if (signal) return 128 + (signalNumbers.get(signal) ?? 0);
  return 1;
};

class ChildTrialHandle implements TrialHandle {
  private readonly output = new LineQueue();
  private readonly exit: Promise<number>;
  private consumed = false;

  constructor(
    private readonly child: ChildProcess,
    readonly pid: number,
    private readonly platform: ProcessPlatform,
  ) {
    const streams = [child.stdout, child.stderr].filter((stream): stream is Readable => stream !== null);
    let open = streams.length;
    for (const stream of streams) {
      const reader = readline.createInterface({ input: stream, crlfDelay: Infinity });
      reader.on('line', (line) => {
        const trimmed = line.trimEnd();
        if (trimmed) this.output.push(trimmed);
      });
      reader.on('close', () => {
        open -= 1;
        if (open === 0) this.output.close();
      });
    }
    if (open === 0) this.output.close();

    this.exit = new Promise((resolve, reject) => {
      child.once('close', (code, signal) => {
        this.output.close();
        resolve(exitCodeOf(code, signal));
      });
      child.on('error', (error) => {
        if (child.exitCode === null && child.signalCode === null) {
          reject(new SupervisionError(error));
        }
      });
    });
  }

  lines(): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error(`output of trial process ${this.pid} is already being read`);
    }
    this.consumed = true;
    return this.output;
  }

  wait() {
    return this.exit;
  }

  terminate(mode: TerminationMode) {
    this.platform.terminate(this.child, mode);
  }
}

export class ProcessTrialLauncher implements TrialLauncher {
  constructor(private readonly platform: ProcessPlatform = selectPlatform()) {}

  launch(trial: TrialCommand): Promise<TrialHandle> {
    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(trial.command, trial.args, this.platform.spawnOptions(trial.cwd, trial.env));
      } catch (error) {
        reject(new LaunchError(trial.command, error));
        return;
      }

      const onError = (error: Error) => {
        child.off('spawn', onSpawn);
        reject(new LaunchError(trial.command, error));
      };

      const onSpawn = () => {
        child.off('error', onError);
        if (child.pid === undefined) {
          reject(new LaunchError(trial.command, 'no pid assigned'));
          return;
        }
        resolve(new ChildTrialHandle(child, child.pid, this.platform));
      };

      child.once('error', onError);
      child.once('spawn', onSpawn);
    });
  }
}
