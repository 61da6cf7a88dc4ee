import { mergeSnapshot, SnapshotMergeService } from './snapshotMerge.service';
import { createTestConfig, makeRecord } from '../testing/testHelpers';
import { recordIdentityKey } from '../utils/identity.utils';

describe('mergeSnapshot', () => {
    const now = new Date(2026, 2, 1);
    const retain = { now, expiredIssuePolicy: 'retain' as const };

    const a = makeRecord({ title: 'A', detailUrl: 'https://example.org/si/a' });
    const b = makeRecord({ title: 'B', detailUrl: 'https://example.org/si/b' });
    const c = makeRecord({ title: 'C', detailUrl: 'https://example.org/si/c' });

    it('puts fresh records first, then previous-only records in their old order', () => {
        const { records, stats } = mergeSnapshot('Cities', [c, a], [b, a], retain);

        expect(records.map(record => record.title)).toEqual(['B', 'A', 'C']);
        expect(stats).toEqual({ added: 1, updated: 0, retained: 1, expired: 0 });
    });

    it('never keeps two records with the same identity key', () => {
        const duplicate = makeRecord({ title: 'A (repeated)', detailUrl: a.detailUrl });
        const noUrl1 = makeRecord({ title: 'Same', deadline: '2026-05-01', detailUrl: '' });
        const noUrl2 = makeRecord({ title: ' same ', deadline: '2026-05-01', detailUrl: '' });

        const { records } = mergeSnapshot('Cities', [a], [a, duplicate, noUrl1, noUrl2], retain);
        const keys = records.map(record => recordIdentityKey('Cities', record));

        expect(new Set(keys).size).toBe(keys.length);
        expect(records.map(record => record.title)).toEqual(['A', 'Same']);
    });

    it('is idempotent for an unchanged page', () => {
        const first = mergeSnapshot('Cities', [], [a, b], retain);
        const second = mergeSnapshot('Cities', first.records, [a, b], retain);

        expect(second.records).toEqual(first.records);
        expect(second.stats).toEqual({ added: 0, updated: 0, retained: 0, expired: 0 });
    });

    it('lets fresh fields win and keeps the translation when only the deadline changed', () => {
        const previous = makeRecord({ ...a, description: 'About A', translatedTitle: '甲', translatedDescription: '关于甲' });
        const fresh = makeRecord({ ...a, description: 'About A', deadline: '2026-04-15' });

        const { records, stats } = mergeSnapshot('Cities', [previous], [fresh], retain);

        expect(records).toEqual([{ ...fresh, translatedTitle: '甲', translatedDescription: '关于甲' }]);
        expect(stats.updated).toBe(1);
    });

    it('drops the old translation when the title changed', () => {
        const previous = makeRecord({ ...a, translatedTitle: '甲' });
        const fresh = makeRecord({ ...a, title: 'A, revised' });

        expect(mergeSnapshot('Cities', [previous], [fresh], retain).records[0].translatedTitle).toBe('');
    });

    it('removes past deadlines under the drop policy only', () => {
        const past = makeRecord({ title: 'Past', deadline: '2026-02-28', detailUrl: 'https://example.org/si/past' });
        const today = makeRecord({ title: 'Today', deadline: '2026-03-01', detailUrl: 'https://example.org/si/today' });
        const opaque = makeRecord({ title: 'Opaque', deadline: 'Rolling', detailUrl: 'https://example.org/si/opaque' });

        const dropped = mergeSnapshot('Cities', [past], [today, opaque], { now, expiredIssuePolicy: 'drop' });
        expect(dropped.records.map(record => record.title)).toEqual(['Today', 'Opaque']);
        expect(dropped.stats).toEqual({ added: 2, updated: 0, retained: 0, expired: 1 });

        const retained = mergeSnapshot('Cities', [past], [today, opaque], retain);
        expect(retained.records.map(record => record.title)).toEqual(['Today', 'Opaque', 'Past']);
    });
});

describe('SnapshotMergeService', () => {
    it('applies the configured expiry policy', () => {
        const service = new SnapshotMergeService(createTestConfig({ EXPIRED_ISSUE_POLICY: 'drop' }));
        const past = makeRecord({ deadline: '2020-01-01' });

        expect(service.merge('Cities', [], [past], new Date(2026, 2, 1)).records).toEqual([]);
    });
});
