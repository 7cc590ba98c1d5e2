/**
 * progress.test.ts
 *
 * Set progress: rarity grouping by symbol image and the per-set and
 * per-group counters.
 */

import {describe, it, expect} from 'vitest';
import {buildRarityGroups, computeSetProgress, percent} from '../src/tracker/progress.js';

const rarities = [
    {name: 'common', order: 1, imageName: 'diamond_1'},
    {name: 'uncommon', order: 2, imageName: 'diamond_2'},
    {name: 'shiny_rare', order: 9, imageName: 'shiny'},
    {name: 'double_shiny_rare', order: 10, imageName: 'shiny'},
    {name: 'promo', order: 11, imageName: null},
];

describe('percent', () => {
    it('rounds to two decimals', () => {
        expect(percent(1, 3)).toBe(33.33);
        expect(percent(2, 3)).toBe(66.67);
    });

    it('is 0 for an empty whole', () => {
        expect(percent(0, 0)).toBe(0);
    });
});

describe('buildRarityGroups', () => {
    it('groups rarities sharing an image and keys image-less ones by name', () => {
        const groups = buildRarityGroups(rarities);
        expect(groups.map((g) => g.key)).toEqual(['diamond_1', 'diamond_2', 'shiny', 'promo']);
        expect(groups[2]).toEqual({key: 'shiny', order: 9, rarities: ['shiny_rare', 'double_shiny_rare']});
    });

    it('orders a group by its lowest member order', () => {
        const groups = buildRarityGroups([
            {name: 'b', order: 5, imageName: 'x'},
            {name: 'c', order: 3, imageName: 'y'},
            {name: 'a', order: 1, imageName: 'x'},
        ]);
        expect(groups.map((g) => [g.key, g.order])).toEqual([['x', 1], ['y', 3]]);
    });
});

describe('computeSetProgress', () => {
    const groups = buildRarityGroups(rarities);

    it('counts collected and total cards of the set only', () => {
        const totals = [
            {setId: 1, rarity: 'common', count: 6},
            {setId: 1, rarity: 'shiny_rare', count: 1},
            {setId: 1, rarity: 'double_shiny_rare', count: 1},
            {setId: 2, rarity: 'common', count: 50},
        ];
        const collected = [
            {setId: 1, rarity: 'common', count: 3},
            {setId: 1, rarity: 'double_shiny_rare', count: 1},
            {setId: 2, rarity: 'common', count: 20},
        ];

        const p = computeSetProgress(1, groups, totals, collected);
        expect(p.total).toBe(8);
        expect(p.collected).toBe(4);
        expect(p.progressPercent).toBe(50);

        const shiny = p.rarityProgress.find((g) => g.group.key === 'shiny');
        expect(shiny?.collected).toBe(1);
        expect(shiny?.total).toBe(2);
        const uncommon = p.rarityProgress.find((g) => g.group.key === 'diamond_2');
        expect(uncommon).toMatchObject({collected: 0, total: 0});
    });

    it('reports 0 percent for a set without cards', () => {
        const p = computeSetProgress(3, groups, [], []);
        expect(p).toMatchObject({collected: 0, total: 0, progressPercent: 0});
        expect(p.rarityProgress).toHaveLength(4);
    });
});
