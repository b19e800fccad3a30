// services/narrativeCatalog.ts
import { INarrative, NarrativeGroupFilter } from '../types';
import { NarrativeNotFoundError } from '../utils/AppError';

// --- NARRATIVE TAXONOMY ---
// `id` is the label the metrics service classifies articles under; keep it byte-exact.
const DEFINITIONS: INarrative[] = [
    // Core
    {
        id: 'Goldilocks economy',
        displayName: 'Goldilocks Economy',
        description: 'Growth steady, inflation cooling; risk-on, soft-landing narrative.',
        group: 'core',
    },
    {
        id: 'Market crash',
        displayName: 'Market Crash',
        description: 'Sharp, broad selloffs; crisis and contagion; systemic stress.',
        group: 'core',
    },
    {
        id: 'Inflation',
        displayName: 'Inflation',
        description: 'Prices rising or sticky; cost of living; CPI/PCE prints; inflation expectations.',
        group: 'core',
    },
    {
        id: 'Growth slowdown',
        displayName: 'US Growth Slowdown',
        description: 'Weakening macro: slowing GDP, recession risk, weak demand, falling output.',
        group: 'core',
    },
    {
        id: 'Stagflation',
        displayName: 'Stagflation',
        description: 'High inflation together with weak or contracting growth.',
        group: 'core',
    },

    // Supplementary
    {
        id: 'Worker layoffs',
        displayName: 'Worker Layoffs',
        description: 'Job cuts, restructurings and downsizing announcements.',
        group: 'supplementary',
    },
    {
        id: 'Labor market',
        displayName: 'Labor Market',
        description: 'Hiring, jobs, wages, participation and unemployment trends.',
        group: 'supplementary',
    },
    {
        id: 'International conflict',
        displayName: 'International Conflict',
        description: 'State-level military conflict or major geopolitical escalation.',
        group: 'supplementary',
    },
    {
        id: 'Trade war',
        displayName: 'Trade War',
        description: 'Tariffs, export controls, sanctions and retaliatory trade measures.',
        group: 'supplementary',
    },
    {
        id: 'Fiscal sustainability',
        displayName: 'Fiscal Sustainability',
        description: 'Government deficits, debt, debt ceiling and sovereign downgrades.',
        group: 'supplementary',
    },
    {
        // Contains "/": the HTTP provider sends it as one encoded path segment
        id: 'Markets/Rate-watch',
        displayName: 'Markets / Rate-Watch',
        description: 'Market pricing of central-bank rate moves; rate decisions and guidance.',
        group: 'supplementary',
    },
];

const NARRATIVES: readonly INarrative[] = Object.freeze(DEFINITIONS.map(n => Object.freeze({ ...n })));

export class NarrativeCatalog {
    private readonly narratives: readonly INarrative[];
    private readonly byId: ReadonlyMap<string, INarrative>;

    constructor(narratives: readonly INarrative[] = NARRATIVES) {
        const byId = new Map<string, INarrative>();
        for (const narrative of narratives) {
            if (byId.has(narrative.id)) {
                throw new Error(`Duplicate narrative id in catalog: "${narrative.id}"`);
            }
            byId.set(narrative.id, narrative);
        }
        this.narratives = narratives;
        this.byId = byId;
    }

    /**
     * Narratives in declaration order, optionally restricted to one group.
     */
    list(group: NarrativeGroupFilter = 'all'): INarrative[] {
        if (group === 'all') return [...this.narratives];
        return this.narratives.filter(n => n.group === group);
    }

    resolve(id: string): INarrative {
        const narrative = this.byId.get(id);
        if (!narrative) throw new NarrativeNotFoundError(id);
        return narrative;
    }

    find(id: string): INarrative | undefined {
        return this.byId.get(id);
    }

    has(id: string): boolean {
        return this.byId.has(id);
    }

    // Case-insensitive match on the display name (dashboard search box)
    search(query: string, group: NarrativeGroupFilter = 'all'): INarrative[] {
        const needle = query.trim().toLowerCase();
        const candidates = this.list(group);
        if (!needle) return candidates;
        return candidates.filter(n => n.displayName.toLowerCase().includes(needle));
    }

    get size(): number {
        return this.narratives.length;
    }
}

export default new NarrativeCatalog();
