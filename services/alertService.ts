// services/alertService.ts
import {
    FetchOutcome,
    IAlertScanReport,
    IAlertScanSummary,
    IFetchFailureOutcome,
    IMetricsRequest,
    IScannedAlert,
} from '../types';
import { NarrativeCatalog } from './narrativeCatalog';
import { horizonMoves, toAlerts } from './metricsEngine';
import RequestPacer from '../utils/RequestPacer';
import { CONSTANTS } from '../utils/constants';
import { addDays, uniqueInOrder } from '../utils/helpers';
import logger from '../utils/logger';

export interface IMetricsSource {
    fetch(request: IMetricsRequest): Promise<FetchOutcome>;
}

export interface AlertServiceDeps {
    client: IMetricsSource;
    catalog: NarrativeCatalog;
    pacer: RequestPacer;
}

export interface AlertScanRequest {
    narrativeIds: string[];
    startDate: string;
    endDate: string;
    horizons?: readonly number[];
    threshold?: number;
}

const round = (value: number, digits = 4): number => {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
};

export const summarizeAlerts = (alerts: readonly IScannedAlert[], top: number = CONSTANTS.ALERTS.TOP_NARRATIVES): IAlertScanSummary => {
    const counts = new Map<string, number>();
    let sum = 0;
    let max: number | null = null;

    for (const alert of alerts) {
        counts.set(alert.narrativeId, (counts.get(alert.narrativeId) ?? 0) + 1);
        sum += alert.absMove;
        if (max === null || alert.absMove > max) max = alert.absMove;
    }

    const topNarratives = Array.from(counts, ([narrativeId, count]) => ({ narrativeId, count }))
        .sort((a, b) => b.count - a.count || a.narrativeId.localeCompare(b.narrativeId))
        .slice(0, top);

    return {
        total: alerts.length,
        avgAbsMove: alerts.length > 0 ? round(sum / alerts.length) : null,
        maxAbsMove: max === null ? null : round(max),
        narratives: counts.size,
        topNarratives,
    };
};

/**
 * Historical alert scan: every date in a range where a narrative's
 * intensity moved by more than the threshold over any horizon.
 */
export class AlertService {
    constructor(private readonly deps: AlertServiceDeps) {}

    async scan(request: AlertScanRequest): Promise<IAlertScanReport> {
        const { client, catalog, pacer } = this.deps;
        const {
            startDate,
            endDate,
            horizons = CONSTANTS.STATS.HORIZONS,
            threshold = CONSTANTS.STATS.ALERT_THRESHOLD,
        } = request;

        // Calendar padding so the earliest dates in range still have trading-day lookback
        const maxHorizon = Math.max(1, ...horizons);
        const fetchStart = addDays(startDate, -2 * maxHorizon);

        const alerts: IScannedAlert[] = [];
        const failures: IFetchFailureOutcome[] = [];

        for (const narrativeId of uniqueInOrder(request.narrativeIds)) {
            await pacer.waitTurn();
            const outcome = await client.fetch({ narrativeId, startDate: fetchStart, endDate });

            if (outcome.status === 'failure') {
                failures.push(outcome);
                continue;
            }

            const displayName = catalog.find(narrativeId)?.displayName ?? narrativeId;
            const { points } = outcome.series;

            for (const point of points) {
                if (point.date < startDate || point.date > endDate) continue;

                const moves = horizonMoves(points, point.date, horizons);
                for (const alert of toAlerts(narrativeId, point.date, moves, threshold)) {
                    alerts.push({
                        ...alert,
                        displayName,
                        intensityZ: point.intensityZ,
                        sentiment: point.sentiment,
                        articleCount: point.articleCount ?? null,
                    });
                }
            }
        }

        alerts.sort((a, b) => {
            if (a.date !== b.date) return a.date < b.date ? 1 : -1;
            return b.absMove - a.absMove;
        });

        logger.info(`🚨 Alert scan ${startDate} .. ${endDate}: ${alerts.length} alert(s), ${failures.length} failure(s)`);
        return { alerts, summary: summarizeAlerts(alerts), failures };
    }
}

export default AlertService;
