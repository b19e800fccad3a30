// services/snapshotService.ts
import {
    IAlert,
    IAnalysisSnapshot,
    IFetchFailureOutcome,
    IMetricSeries,
    INarrative,
    INarrativeSnapshot,
} from '../types';
import { NarrativeCatalog } from './narrativeCatalog';
import { detectAlerts, horizonMoves, indexOfDate } from './metricsEngine';
import { CONSTANTS } from '../utils/constants';

export interface SnapshotOptions {
    horizons?: readonly number[];
    threshold?: number;
}

export interface IDashboard {
    rows: INarrativeSnapshot[];
    alerts: IAlert[];
    failures: IFetchFailureOutcome[];
}

/**
 * One dashboard row: the metrics of `series` on `date`.
 * If the series has no point on that date the latest point is used instead.
 * Returns null for an empty series.
 */
export const summarizeSeries = (
    narrative: INarrative,
    series: IMetricSeries,
    date: string,
    options: SnapshotOptions = {}
): INarrativeSnapshot | null => {
    const { horizons = CONSTANTS.STATS.HORIZONS, threshold = CONSTANTS.STATS.ALERT_THRESHOLD } = options;
    const { points } = series;
    if (points.length === 0) return null;

    let idx = indexOfDate(points, date);
    const usedLatestFallback = idx === -1;
    if (usedLatestFallback) idx = points.length - 1;

    const point = points[idx];
    const moves = horizonMoves(points, point.date, horizons);

    return {
        narrativeId: narrative.id,
        displayName: narrative.displayName,
        group: narrative.group,
        requestedDate: date,
        date: point.date,
        usedLatestFallback,
        intensityZ: point.intensityZ,
        intensityPercentile: point.intensityPercentile,
        sentiment: point.sentiment,
        sentimentPercentile: point.sentimentPercentile,
        articleCount: point.articleCount ?? null,
        moves,
        alerts: detectAlerts(moves, threshold),
    };
};

/**
 * Dashboard view of an analysis run. Rows follow catalog order;
 * failed narratives are listed separately.
 */
export const summarizeOutcomes = (
    snapshot: IAnalysisSnapshot,
    catalog: NarrativeCatalog,
    date: string,
    options: SnapshotOptions = {}
): IDashboard => {
    const rows: INarrativeSnapshot[] = [];
    const alerts: IAlert[] = [];
    const failures: IFetchFailureOutcome[] = [];

    for (const narrative of catalog.list()) {
        const outcome = snapshot.outcomes[narrative.id];
        if (!outcome) continue;

        if (outcome.status === 'failure') {
            failures.push(outcome);
            continue;
        }

        const row = summarizeSeries(narrative, outcome.series, date, options);
        if (!row) continue;

        rows.push(row);
        for (const alert of row.alerts) {
            alerts.push({ narrativeId: row.narrativeId, date: row.date, ...alert });
        }
    }

    alerts.sort((a, b) => b.absMove - a.absMove);
    return { rows, alerts, failures };
};
