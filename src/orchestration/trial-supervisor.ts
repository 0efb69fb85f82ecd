import path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { AppConfig } from '../config.js';
import { withDeadline } from '../trial/deadline.js';
import { ProcessFailureError, SupervisionError, TrialError, describeError } from '../trial/errors.js';
import { ProcessTrialLauncher, splitArgs, type TrialCommand, type TrialHandle, type TrialLauncher } from '../trial/launcher.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { ensureDir, resolveFrom } from '../utils/path.js';
import { readLatestBacktestMetrics } from './backtest-results.js';
import { planBranches, runBranches, summarizeBranches } from './branch-scheduler.js';
import { loadClassifierRules, type CompiledClassifierRules } from './classifier-rules.js';
import { EventBroadcaster, type TaskSubscriber } from './event-broadcaster.js';
import { OutputClassifier } from './output-classifier.js';
import { parseTrialRequest, TrialRequestError, type BacktestParams, type MiningParams, type TrialRequest } from './requests.js';
import { TaskRegistry } from './task-registry.js';
import type { Branch, BranchOutcome, TaskKind, TaskProgress, TaskRecord, TaskStatus } from './types.js';

export type TrialSupervisorConfig = Pick<
  AppConfig,
  | 'LOG_LEVEL'
  | 'PROJECT_ROOT'
  | 'DATA_RESULTS_DIR'
  | 'MINING_COMMAND'
  | 'MINING_ARGS'
  | 'BACKTEST_COMMAND'
  | 'BACKTEST_ARGS'
  | 'BACKTEST_CONFIG_PATH'
  | 'BACKTEST_RESULTS_DIR'
  | 'TRIAL_TIMEOUT_SECONDS'
  | 'BRANCH_PARALLEL'
  | 'BRANCH_LOG_ROOT'
  | 'BRANCH_LOG_PREFIX'
  | 'TASK_LOG_LIMIT'
  | 'SUBSCRIBER_REPLAY_LOGS'
  | 'CLASSIFIER_RULES_FILE'
>;

export interface TrialSupervisorOptions {
  launcher?: TrialLauncher;
  rules?: CompiledClassifierRules;
  logger?: Logger;
}

export interface CancelResult {
  cancelled: boolean;
  status: TaskStatus;
}

type FailureChannel = 'result' | 'error';

const DEFAULT_TOTAL_ROUNDS = 3;

const experimentId = () => {
  const stamp = new Date().toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
  return `exp_${stamp}_${randomUUID().slice(0, 4)}`;
};

const initialProgress = (request: TrialRequest): Omit<TaskProgress, 'timestamp'> =>
  request.kind === 'mining'
    ? {
        phase: 'planning',
        currentRound: 0,
        totalRounds: request.params.maxRounds ?? DEFAULT_TOTAL_ROUNDS,
        percent: 0,
        message: 'Initializing experiment...',
      }
    : {
        phase: 'backtesting',
        currentRound: 0,
        totalRounds: 1,
        percent: 0,
        message: 'Starting backtest...',
      };

const runOverrides = (params: MiningParams): Array<[string, number]> => {
  const overrides: Array<[string, number | undefined]> = [
    ['NUM_DIRECTIONS', params.numDirections],
    ['MAX_ROUNDS', params.maxRounds],
    ['MAX_LOOPS', params.maxLoops],
    ['FACTORS_PER_HYPOTHESIS', params.factorsPerHypothesis],
  ];
  return overrides.filter((entry): entry is [string, number] => entry[1] !== undefined);
};

const branchTag = (branch: Branch) => `branch ${String(branch.index).padStart(2, '0')}`;

/**
 * Lifecycle API over supervised trials. Each started task gets its own
 * background routine; callers never wait on trial completion.
 */
export class TrialSupervisor {
  readonly registry: TaskRegistry;
  readonly events: EventBroadcaster;
  private readonly launcher: TrialLauncher;
  private readonly rules: CompiledClassifierRules;
  private readonly logger: Logger;
  private readonly running = new Map<string, Promise<void>>();
  private readonly liveTrials = new Map<string, Set<TrialHandle>>();
  private stopping = false;

  constructor(private readonly config: TrialSupervisorConfig, options: TrialSupervisorOptions = {}) {
    this.logger = options.logger ?? createLogger('orchestration.supervisor', config.LOG_LEVEL);
    this.launcher = options.launcher ?? new ProcessTrialLauncher();
    this.rules = options.rules ?? loadClassifierRules(config.CLASSIFIER_RULES_FILE || undefined);
    this.registry = new TaskRegistry({ logLimit: config.TASK_LOG_LIMIT });
    this.events = new EventBroadcaster(this.registry, {
      replayLogs: config.SUBSCRIBER_REPLAY_LOGS,
      logger: this.logger.child('events'),
    });
  }

  /** Registers the task and returns its id at once; supervision continues in the background. */
  startTrial(kind: TaskKind, params: unknown): string {
    if (this.stopping) {
      throw new TrialRequestError('supervisor is shutting down');
    }

    const request = parseTrialRequest(kind, params);
    const task = this.registry.create({
      kind,
      config: { ...request.params },
      progress: initialProgress(request),
    });
    this.logger.info(`task ${task.id} started kind=${kind}`);

    const routine = this.supervise(task.id, request).finally(() => {
      this.running.delete(task.id);
    });
    this.running.set(task.id, routine);
    return task.id;
  }

  getTask(taskId: string): TaskRecord {
    return this.registry.get(taskId);
  }

  listTasks(): TaskRecord[] {
    return this.registry.list();
  }

  /**
   * Signals every live process of the task and marks it cancelled. Cancelling
   * a task that already reached a terminal status changes nothing.
   */
  cancelTask(taskId: string): CancelResult {
    const status = this.registry.statusOf(taskId);
    if (status !== 'running') {
      return { cancelled: false, status };
    }

    for (const handle of this.liveTrials.get(taskId) ?? []) {
      handle.terminate('graceful');
    }

    this.registry.finish(taskId, 'cancelled');
    this.registry.updateProgress(taskId, { message: 'Task cancelled.' });
    this.registry.publish({ type: 'result', taskId, data: { status: 'cancelled' } });
    this.logger.info(`task ${taskId} cancelled`);
    return { cancelled: true, status: 'cancelled' };
  }

  subscribe(taskId: string, subscriber: TaskSubscriber) {
    return this.events.attach(taskId, subscriber);
  }

  heartbeat(taskId: string, subscriber: TaskSubscriber) {
    return this.events.heartbeat(taskId, subscriber);
  }

  statusCounts() {
    const counts: Record<TaskStatus, number> = { running: 0, completed: 0, failed: 0, cancelled: 0 };
    for (const task of this.registry.list()) {
      counts[task.status] += 1;
    }
    return { total: this.registry.size(), ...counts };
  }

  activeRoutines() {
    return this.running.size;
  }

  /** Kills every live trial and waits for all supervision routines to settle. */
  async stop() {
    this.stopping = true;
    for (const handles of this.liveTrials.values()) {
      for (const handle of handles) {
        handle.terminate('hard');
      }
    }
    await Promise.allSettled(Array.from(this.running.values()));
    this.events.close();
  }

  private async supervise(taskId: string, request: TrialRequest) {
    try {
      if (request.kind === 'mining') {
        await this.superviseMining(taskId, request.params);
      } else {
        await this.superviseBacktest(taskId, request.params);
      }
    } catch (error) {
      const failure = error instanceof TrialError ? error : new SupervisionError(error);
      this.failTask(taskId, failure.message, failure instanceof ProcessFailureError ? 'result' : 'error');
    }
  }

  private async superviseMining(taskId: string, params: MiningParams) {
    const env = await this.miningEnvironment(params);
    const classifier = new OutputClassifier(this.rules, { initialPhase: 'planning' });
    this.registry.updateProgress(taskId, {
      phase: 'planning',
      percent: this.rules.phasePercent.planning ?? 0,
      message: 'Starting experiment...',
    });

    const directions = params.directions?.length ? params.directions : [params.direction];
    const branches = planBranches(directions, {
      logRoot: resolveFrom(this.config.PROJECT_ROOT, this.config.BRANCH_LOG_ROOT),
      prefix: this.config.BRANCH_LOG_PREFIX,
    });
    const failures = new Map<number, unknown>();
    const timeoutSeconds = params.timeoutSeconds ?? this.config.TRIAL_TIMEOUT_SECONDS;

    const outcomes = await runBranches(branches, {
      parallel: params.parallel ?? this.config.BRANCH_PARALLEL,
      shouldContinue: () => !this.registry.isTerminal(taskId),
      runBranch: async (branch) => {
        if (branch.direction) {
          this.registry.appendLog(taskId, 'info', `Branch ${branch.index}/${branches.length} direction: ${branch.direction}`);
        }
        try {
          return await this.runTrial(
            taskId,
            this.miningCommand(params, branch, env),
            classifier,
            timeoutSeconds,
            branches.length > 1 ? branchTag(branch) : undefined,
          );
        } catch (error) {
          failures.set(branch.index, error);
          throw error;
        }
      },
    });
    this.registry.setBranches(taskId, outcomes);

    const summary = summarizeBranches(outcomes);
    if (summary.total > 0 && summary.failed === 0) {
      this.warnOnSilentPhases(taskId, classifier);
      this.completeTask(taskId, 'Experiment completed.', outcomes);
      return;
    }

    if (this.registry.isTerminal(taskId)) return;

    const thrown = outcomes.some((outcome) => failures.has(outcome.index));
    this.failTask(taskId, this.describeBranchFailure(outcomes, failures), thrown ? 'error' : 'result');
  }

  private async superviseBacktest(taskId: string, params: BacktestParams) {
    const classifier = new OutputClassifier(this.rules, { initialPhase: 'backtesting', trackProgressMarkers: true });
    const exitCode = await this.runTrial(
      taskId,
      this.backtestCommand(params),
      classifier,
      params.timeoutSeconds ?? this.config.TRIAL_TIMEOUT_SECONDS,
    );

    if (exitCode !== 0) {
      throw new ProcessFailureError(exitCode, 'Backtest');
    }

    await this.collectBacktestMetrics(taskId, params);
    this.completeTask(taskId, 'Backtest completed.');
  }

  private async runTrial(
    taskId: string,
    command: TrialCommand,
    classifier: OutputClassifier,
    timeoutSeconds: number,
    tag?: string,
  ): Promise<number> {
    const handle = await this.launcher.launch(command);
    this.track(taskId, handle);
    this.logger.debug(`task ${taskId} launched pid=${handle.pid}${tag ? ` (${tag})` : ''}`);

    try {
      return await withDeadline(handle, timeoutSeconds, async () => {
        try {
          for await (const line of handle.lines()) {
            this.consumeLine(taskId, classifier, line, tag);
          }
        } catch (error) {
          handle.terminate('hard');
          await handle.wait().catch(() => undefined);
          throw error instanceof TrialError ? error : new SupervisionError(error);
        }
        return handle.wait();
      });
    } finally {
      this.untrack(taskId, handle);
    }
  }

  private consumeLine(taskId: string, classifier: OutputClassifier, line: string, tag?: string) {
    const result = classifier.classify(line);
    if (!result) return;

    // Lines still draining after cancellation are logged but no longer move progress.
    if (result.progressMessage !== undefined && !this.registry.isTerminal(taskId)) {
      const patch: Partial<Omit<TaskProgress, 'timestamp'>> = { message: result.progressMessage };
      if (result.phase) {
        patch.phase = result.phase;
        if (result.percent !== undefined) {
          patch.percent = Math.max(this.registry.progressOf(taskId).percent, result.percent);
        }
      }
      this.registry.updateProgress(taskId, patch);
    }

    this.registry.appendLog(taskId, result.level, tag ? `[${tag}] ${result.message}` : result.message, {
      broadcast: result.forward,
    });

    if (result.metrics) {
      this.registry.mergeMetrics(taskId, result.metrics);
    }
  }

  private track(taskId: string, handle: TrialHandle) {
    let handles = this.liveTrials.get(taskId);
    if (!handles) {
      handles = new Set();
      this.liveTrials.set(taskId, handles);
    }
    handles.add(handle);
    this.registry.attachProcess(taskId, handle.pid);

    // Cancelled or shutting down while the process was starting.
    if (this.stopping) {
      handle.terminate('hard');
    } else if (this.registry.isTerminal(taskId)) {
      handle.terminate('graceful');
    }
  }

  private untrack(taskId: string, handle: TrialHandle) {
    const handles = this.liveTrials.get(taskId);
    handles?.delete(handle);
    if (handles && handles.size === 0) {
      this.liveTrials.delete(taskId);
    }
    this.registry.detachProcess(taskId, handle.pid);
  }

  private completeTask(taskId: string, message: string, branches?: BranchOutcome[]) {
    if (!this.registry.finish(taskId, 'completed')) return;
    this.registry.updateProgress(taskId, { phase: 'completed', percent: 100, message });
    const task = this.registry.get(taskId);
    this.registry.publish({
      type: 'result',
      taskId,
      data: { status: 'completed', metrics: task.metrics, message, branches },
    });
    this.logger.info(`task ${taskId} completed`);
  }

  private failTask(taskId: string, message: string, channel: FailureChannel) {
    if (!this.registry.finish(taskId, 'failed', { error: message })) {
      this.logger.debug(`task ${taskId} already finished; ignoring failure: ${message}`);
      return;
    }

    this.registry.updateProgress(taskId, { message });
    if (channel === 'result') {
      const task = this.registry.get(taskId);
      this.registry.publish({
        type: 'result',
        taskId,
        data: { status: 'failed', metrics: task.metrics, message, branches: task.branches },
      });
    } else {
      this.registry.publish({ type: 'error', taskId, data: { error: message } });
    }
    this.logger.warn(`task ${taskId} failed: ${message}`);
  }

  private describeBranchFailure(outcomes: BranchOutcome[], failures: Map<number, unknown>) {
    if (outcomes.length === 0) {
      return 'No branch was run.';
    }

    if (outcomes.length === 1) {
      const only = outcomes[0];
      const error = failures.get(only.index);
      if (error !== undefined) return describeError(error);
      return new ProcessFailureError(only.exitCode ?? 1).message;
    }

    const summary = summarizeBranches(outcomes);
    const details = outcomes
      .filter((outcome) => outcome.status === 'failed')
      .map((outcome) => `branch ${outcome.index}: ${outcome.error ?? 'failed'}`)
      .join('; ');
    return `${summary.failed} of ${summary.total} branches failed (${details}).`;
  }

  private warnOnSilentPhases(taskId: string, classifier: OutputClassifier) {
    if (classifier.phase === 'planning' && classifier.linesCounted > 0) {
      this.logger.warn(
        `task ${taskId} finished without any phase marker matching its ${classifier.linesCounted} output line(s); check the classifier rules`,
      );
    }
  }

  private async collectBacktestMetrics(taskId: string, params: BacktestParams) {
    const configured = params.resultsDir ?? this.config.BACKTEST_RESULTS_DIR;
    if (!configured) return;

    const resultsDir = resolveFrom(this.config.PROJECT_ROOT, configured);
    try {
      const latest = await readLatestBacktestMetrics(resultsDir);
      if (!latest) {
        this.registry.appendLog(taskId, 'warning', `No backtest metrics found in ${resultsDir}`);
        return;
      }
      this.registry.mergeMetrics(taskId, latest.metrics);
      this.registry.appendLog(taskId, 'success', `Loaded backtest metrics from ${path.basename(latest.file)}`);
    } catch (error) {
      this.logger.warn(`task ${taskId} backtest metrics unavailable: ${describeError(error)}`);
      this.registry.appendLog(taskId, 'warning', `Backtest metrics unavailable: ${describeError(error)}`);
    }
  }

  private baseEnvironment(): NodeJS.ProcessEnv {
    return { ...process.env, PYTHONUNBUFFERED: '1' };
  }

  private async miningEnvironment(params: MiningParams): Promise<NodeJS.ProcessEnv> {
    const id = experimentId();
    const resultsDir = resolveFrom(this.config.PROJECT_ROOT, this.config.DATA_RESULTS_DIR);
    const workspace = path.join(resultsDir, `workspace_${id}`);
    const pickleCache = path.join(resultsDir, `pickle_cache_${id}`);
    await ensureDir(workspace);
    await ensureDir(pickleCache);

    const env: NodeJS.ProcessEnv = {
      ...this.baseEnvironment(),
      EXPERIMENT_ID: id,
      WORKSPACE_PATH: workspace,
      PICKLE_CACHE_FOLDER_PATH_STR: pickleCache,
    };
    if (params.librarySuffix) {
      env.FACTOR_LIBRARY_SUFFIX = params.librarySuffix;
    }
    // Run overrides reach the trial as environment; the trial applies them to its own config.
    for (const [name, value] of runOverrides(params)) {
      env[name] = String(value);
    }
    return env;
  }

  private miningCommand(params: MiningParams, branch: Branch, env: NodeJS.ProcessEnv): TrialCommand {
    const args = splitArgs(this.config.MINING_ARGS);
    if (branch.direction) {
      args.push('--direction', branch.direction);
    }
    if (params.configPath) {
      args.push('--config_path', resolveFrom(this.config.PROJECT_ROOT, params.configPath));
    }

    return {
      command: this.config.MINING_COMMAND,
      args,
      cwd: resolveFrom(process.cwd(), this.config.PROJECT_ROOT),
      env: branch.logPath ? { ...env, LOG_TRACE_PATH: branch.logPath } : env,
    };
  }

  private backtestCommand(params: BacktestParams): TrialCommand {
    const configPath = resolveFrom(this.config.PROJECT_ROOT, params.configPath ?? this.config.BACKTEST_CONFIG_PATH);
    return {
      command: this.config.BACKTEST_COMMAND,
      args: [
        ...splitArgs(this.config.BACKTEST_ARGS),
        '-c',
        configPath,
        '--factor-source',
        params.factorSource,
        '--factor-json',
        params.factorJson,
      ],
      cwd: resolveFrom(process.cwd(), this.config.PROJECT_ROOT),
      env: this.baseEnvironment(),
    };
  }
}
