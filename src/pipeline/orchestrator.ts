import * as core from '@actions/core';

import { PipelineError, StageFailure } from './errors.js';
import { runAnalyzer } from './stages/analyzer.js';
import { runCollector } from './stages/collector.js';
import { runDecision } from './stages/decision.js';
import { runReporter } from './stages/reporter.js';
import { SharedStateStore } from './store.js';
import type { FinalReport, PipelineDeps, StageName } from './types.js';

export type RunState = 'init' | 'collector_done' | 'analyzer_done' | 'decision_done' | 'complete' | 'failed';

type TerminalState = 'complete' | 'failed';
type ActiveState = Exclude<RunState, TerminalState>;

type Transition = { stage: StageName; next: RunState };

// Fixed order, one stage per transition. No branches, no loops.
const TRANSITIONS: Record<ActiveState, Transition> = {
  init: { stage: 'collector', next: 'collector_done' },
  collector_done: { stage: 'analyzer', next: 'analyzer_done' },
  analyzer_done: { stage: 'decision', next: 'decision_done' },
  decision_done: { stage: 'reporter', next: 'complete' },
};

/**
 * One end-to-end pass over the four stages.
 *
 * The store lives exactly as long as the run: it is created with the run and
 * dropped once the run reaches `complete` or `failed`. A failing stage moves
 * the run to `failed` and nothing after it executes.
 */
export class PipelineRun {
  private state: RunState = 'init';
  private store: SharedStateStore | null = new SharedStateStore();
  private report: FinalReport | null = null;
  private failure: StageFailure | null = null;
  private running: StageName | null = null;

  constructor(private readonly deps: PipelineDeps) {}

  get currentState(): RunState {
    return this.state;
  }

  get error(): StageFailure | null {
    return this.failure;
  }

  /** Runs the next stage and returns the state it led to. */
  async step(): Promise<RunState> {
    if (this.state === 'complete' || this.state === 'failed') {
      throw new PipelineError('InvalidTransition', `run is already ${this.state}`);
    }
    if (this.running) {
      throw new PipelineError('InvalidTransition', `stage ${this.running} is still running`);
    }

    const { stage, next } = TRANSITIONS[this.state];
    const store = this.store;
    if (!store) throw new PipelineError('InvalidTransition', `no state store in state ${this.state}`);

    core.debug(`${this.state} -> ${stage}`);
    this.running = stage;
    try {
      await this.invoke(stage, store);
    } catch (e) {
      this.failure = new StageFailure(stage, e);
      this.state = 'failed';
      this.store = null;
      core.debug(`run failed: ${this.failure.message}`);
      throw this.failure;
    } finally {
      this.running = null;
    }

    this.state = next;
    if (next === 'complete') this.store = null;
    core.info(`Stage ${stage} done (${next})`);
    return next;
  }

  async run(): Promise<FinalReport> {
    while (this.state !== 'complete') {
      await this.step();
    }
    if (!this.report) throw new PipelineError('InvalidTransition', 'run completed without a report');
    return this.report;
  }

  private async invoke(stage: StageName, store: SharedStateStore): Promise<void> {
    switch (stage) {
      case 'collector':
        await runCollector(store, this.deps.source);
        return;
      case 'analyzer':
        await runAnalyzer(store, this.deps.analyze);
        return;
      case 'decision':
        runDecision(store);
        return;
      case 'reporter':
        this.report = runReporter(store);
        return;
    }
  }
}

export function runPipeline(deps: PipelineDeps): Promise<FinalReport> {
  return new PipelineRun(deps).run();
}
