import type { CompiledClassifierRules, LineMatcher } from './classifier-rules.js';
import type { LogLevel, TaskMetrics, TrialPhase } from './types.js';

export const LOG_MESSAGE_LIMIT = 500;
export const PROGRESS_MESSAGE_LIMIT = 200;

const METRIC_PATTERN = /(?<![A-Za-z0-9_])([A-Za-z][A-Za-z0-9_]*)=([^\s,;)\]}]+)/g;

export interface LineClassification {
  level: LogLevel;
  /** Line truncated for the log buffer. */
  message: string;
  /** Whether the line goes out as a live `log` event. */
  forward: boolean;
  /** Present only when this line moved the phase. */
  phase?: TrialPhase;
  percent?: number;
  /** Present when the line should become the progress message. */
  progressMessage?: string;
  metrics?: TaskMetrics;
}

export interface OutputClassifierOptions {
  initialPhase?: TrialPhase;
  /** Refresh the progress message on marker lines even without a phase change. */
  trackProgressMarkers?: boolean;
}

const anyMatch = (matchers: LineMatcher[], line: string) => matchers.some((matches) => matches(line));

/** Extracts known `NAME=<number>` pairs; values that are not finite numbers are skipped. */
export const extractMetrics = (line: string, metricKeys: Map<string, string>): TaskMetrics => {
  const found: TaskMetrics = {};
  for (const match of line.matchAll(METRIC_PATTERN)) {
    const key = metricKeys.get(match[1]);
    if (!key) continue;
    const value = Number(match[2]);
    if (!Number.isFinite(value)) continue;
    found[key] = value;
  }
  return found;
};

/**
 * Per-trial state machine over the output of one task. Feed it every line in
 * emission order; it decides what each line means for the task.
 */
export class OutputClassifier {
  private currentPhase: TrialPhase;
  private counted = 0;
  private readonly trackProgressMarkers: boolean;

  constructor(private readonly rules: CompiledClassifierRules, options: OutputClassifierOptions = {}) {
    this.currentPhase = options.initialPhase ?? 'planning';
    this.trackProgressMarkers = options.trackProgressMarkers ?? false;
  }

  get phase() {
    return this.currentPhase;
  }

  get linesCounted() {
    return this.counted;
  }

  isNoise(line: string) {
    return anyMatch(this.rules.noise, line);
  }

  levelOf(line: string): LogLevel {
    return this.rules.levels.find((rule) => rule.matches(line))?.level ?? 'info';
  }

  /** Returns null for blank and noise lines, which are dropped entirely. */
  classify(rawLine: string): LineClassification | null {
    const line = rawLine.trimEnd();
    if (!line || this.isNoise(line)) {
      return null;
    }

    this.counted += 1;
    const level = this.levelOf(line);
    const classification: LineClassification = {
      level,
      message: line.slice(0, LOG_MESSAGE_LIMIT),
      forward:
        this.counted % this.rules.forwardEvery === 0 ||
        level === 'error' ||
        level === 'warning' ||
        anyMatch(this.rules.forwardMarkers, line),
    };

    const next = this.rules.phases.find((rule) => rule.matches(line))?.phase;
    if (next && next !== this.currentPhase) {
      this.currentPhase = next;
      classification.phase = next;
      classification.percent = this.rules.phasePercent[next];
      classification.progressMessage = line.slice(0, PROGRESS_MESSAGE_LIMIT);
    } else if (this.trackProgressMarkers && anyMatch(this.rules.progressMarkers, line)) {
      classification.progressMessage = line.slice(0, PROGRESS_MESSAGE_LIMIT);
    }

    const metrics = extractMetrics(line, this.rules.metricKeys);
    if (Object.keys(metrics).length > 0) {
      classification.metrics = metrics;
    }

    return classification;
  }
}
