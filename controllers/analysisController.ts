// controllers/analysisController.ts
import { Request, Response } from 'express';
import { NarrativeCatalog } from '../services/narrativeCatalog';
import { MetricsClient } from '../services/metricsClient';
import { AnalysisOrchestrator } from '../services/analysisOrchestrator';
import { summarizeOutcomes } from '../services/snapshotService';
import validate from '../middleware/validate';
import { AnalysisQuerySchema, AnalysisStartSchema } from '../utils/validationSchemas';
import { resolveDateRange, sendConflict } from './httpHelpers';

export interface AnalysisControllerDeps {
  catalog: NarrativeCatalog;
  client: MetricsClient;
  orchestrator: AnalysisOrchestrator;
}

export const createAnalysisController = ({ catalog, client, orchestrator }: AnalysisControllerDeps) => ({
  // POST /analysis
  startAnalysis: validate(AnalysisStartSchema, 'body', async (body, req, res) => {
    const narrativeIds = body.narrativeIds ?? catalog.list(body.group).map(n => n.id);
    const range = resolveDateRange(body, client.latestAvailableDate);

    const result = orchestrator.start({ narrativeIds, ...range });
    if (!result.ok) {
      sendConflict(res, result.error);
      return;
    }

    res.status(202).json({ success: true, data: { ...orchestrator.getSnapshot(), runId: result.runId } });
  }),

  // GET /analysis
  getAnalysis: validate(AnalysisQuerySchema, 'query', async ({ date, threshold }, req, res) => {
    const snapshot = orchestrator.getSnapshot();
    const selectedDate = date ?? snapshot.request?.endDate ?? client.latestAvailableDate;
    const dashboard = summarizeOutcomes(snapshot, catalog, selectedDate, { threshold });

    res.json({ success: true, data: { ...snapshot, selectedDate, dashboard } });
  }),

  // POST /analysis/cancel
  cancelAnalysis: (req: Request, res: Response) => {
    const result = orchestrator.cancel();
    if (!result.ok) return sendConflict(res, result.error);
    res.json({ success: true, data: { state: result.state } });
  },

  // POST /analysis/reset
  resetAnalysis: (req: Request, res: Response) => {
    const result = orchestrator.reset();
    if (!result.ok) return sendConflict(res, result.error);
    res.json({ success: true, data: { state: result.state } });
  },
});

export type AnalysisController = ReturnType<typeof createAnalysisController>;
