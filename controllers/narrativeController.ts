// controllers/narrativeController.ts
import { z } from 'zod';
import { NarrativeCatalog } from '../services/narrativeCatalog';
import { MetricsClient } from '../services/metricsClient';
import { summarizeSeries } from '../services/snapshotService';
import RequestPacer from '../utils/RequestPacer';
import validate from '../middleware/validate';
import { MetricsQuerySchema, NarrativeListQuerySchema, NarrativeParamsSchema } from '../utils/validationSchemas';
import { resolveDateRange, sendFailure } from './httpHelpers';

const MetricsRequestSchema = z.object({
  params: NarrativeParamsSchema,
  query: MetricsQuerySchema,
});

export const createNarrativeController = (catalog: NarrativeCatalog, client: MetricsClient, pacer: RequestPacer) => ({
  // GET /narratives
  listNarratives: validate(NarrativeListQuerySchema, 'query', async ({ group, search }, req, res) => {
    const narratives = search ? catalog.search(search, group) : catalog.list(group);
    res.json({ success: true, count: narratives.length, data: narratives });
  }),

  // GET /narratives/:id
  getNarrative: validate(NarrativeParamsSchema, 'params', async ({ id }, req, res) => {
    res.json({ success: true, data: catalog.resolve(id) });
  }),

  // GET /narratives/:id/metrics
  getNarrativeMetrics: validate(MetricsRequestSchema, 'request', async ({ params, query }, req, res) => {
    const narrative = catalog.resolve(params.id);
    const range = resolveDateRange(query, client.latestAvailableDate);

    const request = { narrativeId: narrative.id, ...range };

    // Only calls that reach the backend take a pacing slot
    if (!client.isCached(request)) await pacer.waitTurn();

    const outcome = await client.fetch(request);
    if (outcome.status === 'failure') {
      sendFailure(res, outcome);
      return;
    }

    const snapshot = summarizeSeries(narrative, outcome.series, query.date ?? range.endDate, {
      threshold: query.threshold,
    });

    res.json({
      success: true,
      data: {
        narrative,
        series: outcome.series,
        snapshot,
        attempts: outcome.attempts,
        fromCache: outcome.fromCache,
        violations: outcome.violations,
      },
    });
  }),
});

export type NarrativeController = ReturnType<typeof createNarrativeController>;
