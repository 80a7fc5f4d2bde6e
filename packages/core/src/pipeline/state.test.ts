import { describe, expect, it } from 'vitest';

import { PipelineStateError } from '../errors.js';
import type { ExecutiveSummary, TechnicalReport } from '../schemas/report.js';

import { PipelineRun, isTerminalPhase } from './state.js';

const report: TechnicalReport = {
  performance: { loadTimeMs: 1200 },
  security: { httpsEnabled: true },
};
const summary: ExecutiveSummary = { overview: 'Healthy site.' };

function newRun(): PipelineRun {
  let tick = 0;
  return new PipelineRun({
    runId: 'run-1',
    url: 'https://example.com',
    startedAt: 0,
    transport: 'stdio',
    analysis: { provider: 'scripted', model: 'scripted-1' },
    now: () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++)),
  });
}

function advanceTo(run: PipelineRun, phase: 'ExecutingTools' | 'SynthesizingReport' | 'SynthesizingSummary' | 'Done') {
  const order = ['ExecutingTools', 'SynthesizingReport', 'SynthesizingSummary', 'Done'] as const;
  for (const next of order) {
    if (next === 'SynthesizingSummary') run.setTechnicalReport(report);
    if (next === 'Done') run.setExecutiveSummary(summary);
    run.advance(next);
    if (next === phase) return;
  }
}

describe('PipelineRun', () => {
  it('starts in SelectingTools', () => {
    const run = newRun();
    expect(run.phase).toBe('SelectingTools');
    expect(run.isTerminal).toBe(false);
  });

  it('moves forward through every phase and logs each transition', () => {
    const run = newRun();
    advanceTo(run, 'Done');

    const state = run.snapshot();
    expect(state.phase).toBe('Done');
    expect(state.transitions).toEqual([
      { from: 'SelectingTools', to: 'ExecutingTools', at: '2026-01-01T00:00:00.000Z' },
      { from: 'ExecutingTools', to: 'SynthesizingReport', at: '2026-01-01T00:00:01.000Z' },
      { from: 'SynthesizingReport', to: 'SynthesizingSummary', at: '2026-01-01T00:00:02.000Z' },
      { from: 'SynthesizingSummary', to: 'Done', at: '2026-01-01T00:00:03.000Z' },
    ]);
  });

  it('rejects skipping and moving backwards', () => {
    const run = newRun();
    expect(() => run.advance('SynthesizingReport')).toThrow('Illegal phase transition SelectingTools -> SynthesizingReport');

    run.advance('ExecutingTools');
    expect(() => run.advance('ExecutingTools')).toThrow(PipelineStateError);
  });

  it('can fail from any non-terminal phase and records where', () => {
    const run = newRun();
    advanceTo(run, 'SynthesizingReport');

    const error = new Error('engine refused');
    run.fail(error);

    const state = run.snapshot();
    expect(state.phase).toBe('Failed');
    expect(state.failure).toEqual({ phase: 'SynthesizingReport', error });
    expect(() => run.fail(new Error('again'))).toThrow('Illegal phase transition Failed -> Failed');
  });

  it('never leaves Done', () => {
    const run = newRun();
    advanceTo(run, 'Done');
    expect(() => run.fail(new Error('late'))).toThrow('Illegal phase transition Done -> Failed');
  });

  it('records tool calls only while selecting', () => {
    const run = newRun();
    run.setToolCalls([{ name: 'navigate_page', arguments: { url: 'https://example.com' } }]);
    run.advance('ExecutingTools');

    expect(() => run.setToolCalls([])).toThrow('Cannot record tool selection in phase ExecutingTools');
    expect(run.snapshot().toolCalls).toEqual([{ name: 'navigate_page', arguments: { url: 'https://example.com' } }]);
  });

  it('records tool results only while executing, overwriting repeats', () => {
    const run = newRun();
    expect(() =>
      run.recordToolResult({ name: 'take_snapshot', status: 'success', output: 1, durationMs: 1 }),
    ).toThrow('Cannot record a tool result in phase SelectingTools');

    run.advance('ExecutingTools');
    run.recordToolResult({ name: 'take_snapshot', status: 'success', output: 1, durationMs: 1 });
    run.recordToolResult({ name: 'take_snapshot', status: 'success', output: 2, durationMs: 3 });
    run.advance('SynthesizingReport');

    expect(run.snapshot().toolResults).toEqual({
      take_snapshot: { name: 'take_snapshot', status: 'success', output: 2, durationMs: 3 },
    });
    expect(() =>
      run.recordToolResult({ name: 'take_snapshot', status: 'success', output: 3, durationMs: 1 }),
    ).toThrow(PipelineStateError);
  });

  it('records a tool named __proto__ as an ordinary entry', () => {
    const run = newRun();
    run.advance('ExecutingTools');
    run.recordToolResult({ name: '__proto__', status: 'success', output: 'odd', durationMs: 2 });
    run.recordToolResult({ name: 'take_snapshot', status: 'success', output: 1, durationMs: 1 });

    const { toolResults } = run.snapshot();
    expect(Object.keys(toolResults)).toEqual(['__proto__', 'take_snapshot']);
    expect(Object.getOwnPropertyDescriptor(toolResults, '__proto__')?.value).toEqual({
      name: '__proto__',
      status: 'success',
      output: 'odd',
      durationMs: 2,
    });
    expect(Object.getPrototypeOf(toolResults)).toBe(Object.prototype);
  });

  it('writes the report and summary once, in their phases', () => {
    const run = newRun();
    expect(() => run.setTechnicalReport(report)).toThrow('Cannot store the technical report in phase SelectingTools');

    run.advance('ExecutingTools');
    run.advance('SynthesizingReport');
    run.setTechnicalReport(report);
    expect(() => run.setTechnicalReport(report)).toThrow('Technical report has already been written');

    run.advance('SynthesizingSummary');
    run.setExecutiveSummary(summary);
    expect(() => run.setExecutiveSummary(summary)).toThrow('Executive summary has already been written');
  });

  it('hands out frozen snapshots', () => {
    const run = newRun();
    const state = run.snapshot();

    expect(Object.isFrozen(state)).toBe(true);
    expect(Object.isFrozen(state.toolResults)).toBe(true);
    expect(Object.isFrozen(state.transitions)).toBe(true);
  });
});

describe('isTerminalPhase', () => {
  it('only Done and Failed are terminal', () => {
    expect(isTerminalPhase('Done')).toBe(true);
    expect(isTerminalPhase('Failed')).toBe(true);
    expect(isTerminalPhase('SynthesizingSummary')).toBe(false);
  });
});
