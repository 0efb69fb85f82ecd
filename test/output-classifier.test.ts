import { describe, expect, it } from 'vitest';
import { compileClassifierRules, loadClassifierRules } from '../src/orchestration/classifier-rules.js';
import { extractMetrics, LOG_MESSAGE_LIMIT, OutputClassifier } from '../src/orchestration/output-classifier.js';

const rules = loadClassifierRules();

describe('output classifier', () => {
  it('extracts known metrics from NAME=value pairs', () => {
    expect(extractMetrics('RankIC=0.0016,IC=0.01)', rules.metricKeys)).toEqual({ rankIc: 0.0016, ic: 0.01 });
    expect(extractMetrics('ARR=0.15; MDD=-0.08 Sharpe=1.2', rules.metricKeys)).toEqual({
      annualReturn: 0.15,
      maxDrawdown: -0.08,
      sharpeRatio: 1.2,
    });
  });

  it('skips unknown metric names and non-numeric values', () => {
    expect(extractMetrics('loss=0.5 RankIC=nan myIC=0.3', rules.metricKeys)).toEqual({});
  });

  it('drops blank and noise lines without counting them', () => {
    const classifier = new OutputClassifier(rules);
    expect(classifier.classify('   ')).toBeNull();
    expect(classifier.classify('/site-packages/x.py: UserWarning: pkg_resources is deprecated')).toBeNull();
    expect(classifier.classify('[LightGBM] num_leaves is set=31')).toBeNull();
    expect(classifier.linesCounted).toBe(0);
  });

  it('takes the first matching phase rule and reports the phase percent', () => {
    const classifier = new OutputClassifier(rules);

    const first = classifier.classify('running factor_backtest on factor_propose output');
    expect(first?.phase).toBe('evolving');
    expect(first?.percent).toBe(30);
    expect(first?.progressMessage).toBe('running factor_backtest on factor_propose output');

    const repeat = classifier.classify('factor_calculate step 2');
    expect(repeat?.phase).toBeUndefined();
    expect(classifier.phase).toBe('evolving');

    expect(classifier.classify('Backtest window 2020-2022')?.phase).toBe('backtesting');
    expect(classifier.classify('feedback: keep hypothesis')?.percent).toBe(85);
    expect(classifier.classify('程序执行完成')?.phase).toBe('completed');
  });

  it('forwards every third counted line plus marked and severe lines', () => {
    const classifier = new OutputClassifier(rules);
    const forwarded = ['step a', 'step b', 'step c', 'step d', 'INFO step e', 'step f', 'Error: step g', 'step h'].map(
      (line) => classifier.classify(line)?.forward,
    );
    expect(forwarded).toEqual([false, false, true, false, true, true, true, false]);
  });

  it('assigns severity levels in rule order', () => {
    const classifier = new OutputClassifier(rules);
    expect(classifier.levelOf('ERROR and WARNING')).toBe('error');
    expect(classifier.levelOf('WARNING: disk almost full')).toBe('warning');
    expect(classifier.levelOf('Task Success')).toBe('success');
    expect(classifier.levelOf('因子计算完成')).toBe('success');
    expect(classifier.levelOf('plain line')).toBe('info');
  });

  it('refreshes the progress message on marker lines when tracking markers', () => {
    const tracking = new OutputClassifier(rules, { initialPhase: 'backtesting', trackProgressMarkers: true });
    const marked = tracking.classify('加载数据 from cache');
    expect(marked?.progressMessage).toBe('加载数据 from cache');
    expect(marked?.phase).toBeUndefined();
    expect(tracking.phase).toBe('backtesting');

    const plain = new OutputClassifier(rules, { initialPhase: 'backtesting' });
    expect(plain.classify('加载数据 from cache')?.progressMessage).toBeUndefined();
  });

  it('truncates long lines for the log buffer', () => {
    const classifier = new OutputClassifier(rules);
    const result = classifier.classify('x'.repeat(LOG_MESSAGE_LIMIT + 50));
    expect(result?.message).toHaveLength(LOG_MESSAGE_LIMIT);
  });

  it('rejects rule tables with unknown phases', () => {
    expect(() => compileClassifierRules({ phases: [{ match: { contains: 'x' }, phase: 'done' }] })).toThrow(
      /Invalid classifier rules/,
    );
  });

  it('compiles regex and case-insensitive matchers', () => {
    const custom = compileClassifierRules({
      noise: [{ regex: '^DEBUG\\b' }],
      phases: [{ match: { contains: 'MINING', ignoreCase: true }, phase: 'evolving' }],
      forwardEvery: 1,
    });
    const classifier = new OutputClassifier(custom);
    expect(classifier.classify('DEBUG internals')).toBeNull();
    const result = classifier.classify('mining started');
    expect(result?.phase).toBe('evolving');
    expect(result?.percent).toBeUndefined();
    expect(result?.forward).toBe(true);
  });
});
