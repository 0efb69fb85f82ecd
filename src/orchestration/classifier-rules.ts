import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { describeError } from '../trial/errors.js';
import { formatSchemaIssues } from '../utils/zod.js';
import { TRIAL_PHASES, type LogLevel, type TrialPhase } from './types.js';

const phaseSchema = z.enum(['planning', 'evolving', 'backtesting', 'analyzing', 'completed']);
const levelSchema = z.enum(['info', 'warning', 'error', 'success']);

const matcherSchema = z.union([
  z.object({
    contains: z.string().min(1),
    ignoreCase: z.boolean().optional(),
  }).strict(),
  z.object({
    regex: z.string().min(1),
    flags: z.string().regex(/^[imsu]*$/).optional(),
  }).strict(),
]);

export const classifierRulesSchema = z.object({
  noise: z.array(matcherSchema).default([]),
  phases: z.array(z.object({ match: matcherSchema, phase: phaseSchema })).default([]),
  phasePercent: z.record(phaseSchema, z.number().min(0).max(100)).default({}),
  levels: z.array(z.object({ match: matcherSchema, level: levelSchema })).default([]),
  forwardMarkers: z.array(matcherSchema).default([]),
  forwardEvery: z.number().int().min(1).default(3),
  progressMarkers: z.array(matcherSchema).default([]),
  metrics: z.record(z.string().regex(/^[A-Za-z][A-Za-z0-9_]*$/), z.string().min(1)).default({}),
});

export type LineMatcherRule = z.infer<typeof matcherSchema>;

export type LineMatcher = (line: string) => boolean;

export interface CompiledClassifierRules {
  noise: LineMatcher[];
  phases: Array<{ matches: LineMatcher; phase: TrialPhase }>;
  phasePercent: Partial<Record<TrialPhase, number>>;
  levels: Array<{ matches: LineMatcher; level: LogLevel }>;
  forwardMarkers: LineMatcher[];
  forwardEvery: number;
  progressMarkers: LineMatcher[];
  metricKeys: Map<string, string>;
}

export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../config/classifier-rules.json', import.meta.url));

const compileMatcher = (rule: LineMatcherRule): LineMatcher => {
  if ('contains' in rule) {
    if (rule.ignoreCase) {
      const needle = rule.contains.toLowerCase();
      return (line) => line.toLowerCase().includes(needle);
    }
    return (line) => line.includes(rule.contains);
  }

  const pattern = new RegExp(rule.regex, rule.flags ?? '');
  return (line) => pattern.test(line);
};

export const compileClassifierRules = (input: unknown): CompiledClassifierRules => {
  const parsed = classifierRulesSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid classifier rules:\n${formatSchemaIssues(parsed.error.issues)}`);
  }

  const rules = parsed.data;
  const phasePercent: Partial<Record<TrialPhase, number>> = {};
  for (const phase of TRIAL_PHASES) {
    const percent = rules.phasePercent[phase];
    if (percent !== undefined) phasePercent[phase] = percent;
  }

  return {
    noise: rules.noise.map(compileMatcher),
    phases: rules.phases.map((rule) => ({ matches: compileMatcher(rule.match), phase: rule.phase })),
    phasePercent,
    levels: rules.levels.map((rule) => ({ matches: compileMatcher(rule.match), level: rule.level })),
    forwardMarkers: rules.forwardMarkers.map(compileMatcher),
    forwardEvery: rules.forwardEvery,
    progressMarkers: rules.progressMarkers.map(compileMatcher),
    metricKeys: new Map(Object.entries(rules.metrics)),
  };
};

export const loadClassifierRules = (file = DEFAULT_RULES_PATH): CompiledClassifierRules => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new Error(`Unable to read classifier rules from ${file}: ${describeError(error)}`);
  }
  return compileClassifierRules(raw);
};
