import { countByDeployment, countByTag } from '../src/engine/aggregate.js';
import { obs } from './helpers/test-utils.js';

const independent = [
    obs('site2', 'Fox', '2024-05-01 08:00:00'),
    obs('site1', 'Fox', '2024-05-01 09:00:00'),
    obs('site2', 'Fox', '2024-05-01 12:00:00'),
    obs('site1', 'Deer', '2024-05-01 10:00:00'),
];

describe('countByDeployment', () => {
    it('counts per (deployment, tag) in first-seen order', () => {
        expect(countByDeployment(independent)).toEqual([
            { deployment: 'site2', tag: 'Fox', count: 2 },
            { deployment: 'site1', tag: 'Fox', count: 1 },
            { deployment: 'site1', tag: 'Deer', count: 1 },
        ]);
    });

    it('returns no rows for no events', () => {
        expect(countByDeployment([])).toEqual([]);
    });
});

describe('countByTag', () => {
    it('counts per tag across deployments in first-seen order', () => {
        expect(countByTag(independent)).toEqual([
            { tag: 'Fox', count: 3 },
            { tag: 'Deer', count: 1 },
        ]);
    });
});
