import { describe, it, expect } from 'vitest';
import catalog, { NarrativeCatalog } from '../narrativeCatalog';
import { NarrativeNotFoundError } from '../../utils/AppError';

describe('NarrativeCatalog', () => {
    it('lists the eleven narratives in declaration order', () => {
        const ids = catalog.list().map(n => n.id);
        expect(ids).toHaveLength(11);
        expect(new Set(ids).size).toBe(11);
        expect(ids[0]).toBe('Goldilocks economy');
        expect(ids[10]).toBe('Markets/Rate-watch');
    });

    it('resolves every listed id back to itself', () => {
        for (const narrative of catalog.list()) {
            expect(catalog.resolve(narrative.id).id).toBe(narrative.id);
        }
    });

    it('filters by group', () => {
        expect(catalog.list('core').map(n => n.id)).toEqual([
            'Goldilocks economy',
            'Market crash',
            'Inflation',
            'Growth slowdown',
            'Stagflation',
        ]);
        expect(catalog.list('supplementary')).toHaveLength(6);
    });

    it('resolves known ids and rejects unknown ones', () => {
        expect(catalog.resolve('Growth slowdown').displayName).toBe('US Growth Slowdown');

        expect(() => catalog.resolve('Tulip mania')).toThrow(NarrativeNotFoundError);
        try {
            catalog.resolve('Tulip mania');
        } catch (error) {
            expect(error).toMatchObject({ kind: 'NotFound', statusCode: 404, narrativeId: 'Tulip mania' });
        }
        expect(catalog.find('Tulip mania')).toBeUndefined();
    });

    it('searches display names case-insensitively', () => {
        expect(catalog.search('MARKET').map(n => n.id)).toEqual(['Market crash', 'Labor market', 'Markets/Rate-watch']);
        expect(catalog.search('market', 'core').map(n => n.id)).toEqual(['Market crash']);
        expect(catalog.search('  ')).toHaveLength(11);
    });

    it('hands out copies of its list', () => {
        const list = catalog.list();
        list.pop();
        expect(catalog.size).toBe(11);
    });

    it('refuses duplicate ids', () => {
        const narrative = { id: 'X', displayName: 'X', description: '', group: 'core' as const };
        expect(() => new NarrativeCatalog([narrative, narrative])).toThrow('Duplicate narrative id');
    });
});
