// services/analysisOrchestrator.ts
import { randomUUID } from 'crypto';
import {
    AnalysisState,
    FetchOutcome,
    IAnalysisProgress,
    IAnalysisRequest,
    IAnalysisSnapshot,
    IFetchHooks,
    IMetricsRequest,
    IOrchestratorError,
} from '../types';
import RequestPacer from '../utils/RequestPacer';
import { errorMessage, uniqueInOrder } from '../utils/helpers';
import logger from '../utils/logger';

// The slice of MetricsClient the orchestrator needs
export interface IMetricsFetcher {
    fetch(request: IMetricsRequest, hooks?: IFetchHooks): Promise<FetchOutcome>;
}

export type ProgressListener = (progress: IAnalysisProgress, snapshot: IAnalysisSnapshot) => void;

export type StartResult =
    | { ok: true; runId: string; done: Promise<IAnalysisSnapshot> }
    | { ok: false; error: IOrchestratorError };

export type ControlResult = { ok: true; state: AnalysisState } | { ok: false; error: IOrchestratorError };

interface IRun {
    id: string;
    state: AnalysisState;
    request: IAnalysisRequest;
    outcomes: Map<string, FetchOutcome>;
    progress: IAnalysisProgress;
    startedAt: string;
    finishedAt: string | null;
    error: string | null;
    abort: AbortController;
}

const TERMINAL_STATES: ReadonlySet<AnalysisState> = new Set(['completed', 'cancelled', 'failed']);

const emptyProgress = (): IAnalysisProgress => ({
    completed: 0,
    total: 0,
    lastCompletedId: null,
    currentId: null,
    currentAttempt: null,
});

const snapshotOf = (run: IRun): IAnalysisSnapshot => ({
    runId: run.id,
    state: run.state,
    request: { ...run.request, narrativeIds: [...run.request.narrativeIds] },
    progress: { ...run.progress },
    outcomes: Object.fromEntries(run.outcomes),
    startedAt: run.startedAt,
    finishedAt: run.finishedAt,
    error: run.error,
});

/**
 * Drives one batch of narrative fetches at a time:
 * idle -> running -> completed | cancelled | failed, and back to idle via reset().
 *
 * Narrative failures are recorded as outcomes and never fail the batch.
 */
export class AnalysisOrchestrator {
    private run: IRun | null = null;
    private readonly listeners = new Set<ProgressListener>();

    constructor(
        private readonly client: IMetricsFetcher,
        private readonly pacer: RequestPacer
    ) {}

    start(request: IAnalysisRequest): StartResult {
        const state = this.getState();
        if (state === 'running') {
            return {
                ok: false,
                error: { kind: 'AlreadyRunning', message: 'An analysis is already running. Cancel it or wait for it to finish.' },
            };
        }
        if (TERMINAL_STATES.has(state)) this.reset();

        const narrativeIds = uniqueInOrder(request.narrativeIds);
        const run: IRun = {
            id: randomUUID(),
            state: 'running',
            request: { ...request, narrativeIds },
            outcomes: new Map(),
            progress: { ...emptyProgress(), total: narrativeIds.length },
            startedAt: new Date().toISOString(),
            finishedAt: null,
            error: null,
            abort: new AbortController(),
        };

        this.run = run;
        logger.info(`📊 Analysis ${run.id} started: ${narrativeIds.length} narrative(s), ${request.startDate} .. ${request.endDate}`);

        return { ok: true, runId: run.id, done: this.execute(run) };
    }

    /**
     * Moves the run to cancelled at once. A pacing wait ends immediately;
     * a fetch already in flight finishes in the background and its outcome is discarded.
     */
    cancel(): ControlResult {
        const run = this.run;
        if (!run || run.state !== 'running') {
            return { ok: false, error: { kind: 'NotRunning', message: `Nothing to cancel (state: ${this.getState()})` } };
        }
        run.abort.abort();
        this.finish(run, 'cancelled');
        return { ok: true, state: 'cancelled' };
    }

    // Discards the finished run. The metrics cache is left alone.
    reset(): ControlResult {
        if (this.getState() === 'running') {
            return { ok: false, error: { kind: 'InvalidState', message: 'Cannot reset while an analysis is running' } };
        }
        this.run = null;
        return { ok: true, state: 'idle' };
    }

    getState(): AnalysisState {
        return this.run?.state ?? 'idle';
    }

    getSnapshot(): IAnalysisSnapshot {
        if (this.run) return snapshotOf(this.run);
        return {
            runId: null,
            state: 'idle',
            request: null,
            progress: emptyProgress(),
            outcomes: {},
            startedAt: null,
            finishedAt: null,
            error: null,
        };
    }

    onProgress(listener: ProgressListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private async execute(run: IRun): Promise<IAnalysisSnapshot> {
        const { request, progress, abort } = run;

        try {
            for (const narrativeId of request.narrativeIds) {
                if (abort.signal.aborted) break;

                const mayProceed = await this.pacer.waitTurn(abort.signal);
                if (!mayProceed || abort.signal.aborted) break;

                progress.currentId = narrativeId;
                progress.currentAttempt = 1;

                const outcome = await this.client.fetch(
                    { narrativeId, startDate: request.startDate, endDate: request.endDate },
                    {
                        onAttempt: (attempt) => {
                            if (abort.signal.aborted) return;
                            progress.currentAttempt = attempt;
                            this.emit(run);
                        },
                    }
                );

                // Cancelled while the fetch was in flight
                if (abort.signal.aborted) break;

                run.outcomes.set(narrativeId, outcome);
                progress.completed += 1;
                progress.lastCompletedId = narrativeId;
                progress.currentId = null;
                progress.currentAttempt = null;
                this.emit(run);
            }

            this.finish(run, 'completed');
        } catch (error: unknown) {
            if (run.state === 'running') {
                run.error = errorMessage(error);
                logger.error(`🔥 Analysis ${run.id} failed: ${run.error}`);
                this.finish(run, 'failed');
            }
        }

        return snapshotOf(run);
    }

    // No-op once the run has left `running`
    private finish(run: IRun, state: AnalysisState): void {
        if (run.state !== 'running') return;

        run.state = state;
        run.finishedAt = new Date().toISOString();
        run.progress.currentId = null;
        run.progress.currentAttempt = null;

        const outcomes = Array.from(run.outcomes.values());
        const failed = outcomes.filter(o => o.status === 'failure').length;
        logger.info(`🏁 Analysis ${run.id} ${state}: ${outcomes.length - failed} succeeded, ${failed} failed, ${run.progress.total - outcomes.length} not run`);
    }

    private emit(run: IRun): void {
        if (this.listeners.size === 0 || this.run !== run) return;
        const snapshot = snapshotOf(run);
        for (const listener of this.listeners) {
            try {
                listener({ ...run.progress }, snapshot);
            } catch (error: unknown) {
                logger.warn(`Progress listener threw: ${errorMessage(error)}`);
            }
        }
    }
}

export default AnalysisOrchestrator;
