// controllers/alertController.ts
import { NarrativeCatalog } from '../services/narrativeCatalog';
import { MetricsClient } from '../services/metricsClient';
import { AlertService } from '../services/alertService';
import validate from '../middleware/validate';
import { AlertScanQuerySchema } from '../utils/validationSchemas';
import { resolveDateRange } from './httpHelpers';

export const createAlertController = (catalog: NarrativeCatalog, client: MetricsClient, alertService: AlertService) => ({
  // GET /alerts
  scanAlerts: validate(AlertScanQuerySchema, 'query', async (query, req, res) => {
    const range = resolveDateRange(
      { startDate: query.startDate, endDate: query.endDate, period: '30d' },
      client.latestAvailableDate
    );
    const narrativeIds = query.narrativeIds ?? catalog.list().map(n => n.id);

    const report = await alertService.scan({
      narrativeIds,
      ...range,
      horizons: query.horizons,
      threshold: query.threshold,
    });

    res.json({ success: true, data: { ...range, threshold: query.threshold, ...report } });
  }),
});

export type AlertController = ReturnType<typeof createAlertController>;
