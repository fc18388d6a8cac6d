import { filterObservations } from '../src/engine/exclusion.js';
import { DEFAULT_EXCLUDE_TAGS } from '../src/types.js';
import { raw, ts } from './helpers/test-utils.js';

const T = ts('2024-05-01 10:00:00');

const rows = [
    raw({ path: 'a.jpg', deployment: 'site1', tag: 'Fox', time: T }),
    raw({ path: 'b.jpg', deployment: 'site1', tag: 'Blank', time: T }),
    raw({ path: 'c.jpg', deployment: 'site1', tag: 'Human', time: T }),
    raw({ path: 'd.jpg', deployment: 'site1', tag: '', time: T }),
    raw({ path: 'e.jpg', deployment: 'site1', tag: 'Deer', time: null }),
    raw({ path: 'f.jpg', deployment: null, tag: 'Deer', time: T }),
    raw({ path: 'g.jpg', deployment: 'site2', tag: null, time: T }),
    raw({ path: 'h.jpg', deployment: 'site2', tag: 'Badger', time: T }),
];

describe('filterObservations', () => {
    it('uses the default exclusion list', () => {
        expect(DEFAULT_EXCLUDE_TAGS).toEqual(['', 'Blank', 'Useless data', 'Unidentified', 'Human', 'Unknown', 'Blur']);
        expect(filterObservations(rows).map(r => r.path)).toEqual(['a.jpg', 'h.jpg']);
    });

    it('keeps excluded tags with noExclude but still drops null key fields', () => {
        expect(filterObservations(rows, { noExclude: true }).map(r => r.path))
            .toEqual(['a.jpg', 'b.jpg', 'c.jpg', 'd.jpg', 'h.jpg']);
    });

    it('accepts a custom exclusion list', () => {
        expect(filterObservations(rows, { excludeTags: ['Fox'] }).map(r => r.path))
            .toEqual(['b.jpg', 'c.jpg', 'd.jpg', 'h.jpg']);
    });

    it('returns an empty list when everything is filtered', () => {
        expect(filterObservations([rows[1], rows[4]])).toEqual([]);
    });
});
