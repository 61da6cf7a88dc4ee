import { recordIdentityKey } from './identity.utils';

describe('recordIdentityKey', () => {
    it('uses the detail URL when there is one', () => {
        const a = recordIdentityKey('Cities', { title: 'A', deadline: '2026-03-01', detailUrl: 'https://example.org/si/1' });
        const b = recordIdentityKey('Cities', { title: 'B', deadline: '2027-01-01', detailUrl: 'https://example.org/si/1' });
        expect(a).toBe(b);
        expect(a).toBe('cities|url|https://example.org/si/1');
    });

    it('hashes the normalized title and deadline otherwise', () => {
        const a = recordIdentityKey('Cities', { title: 'Urban  Data', deadline: '2026-03-01', detailUrl: '' });
        const b = recordIdentityKey('cities', { title: 'urban data ', deadline: '2026-03-01', detailUrl: '' });
        const c = recordIdentityKey('Cities', { title: 'Urban Data', deadline: '2026-04-01', detailUrl: '' });
        expect(a).toBe(b);
        expect(a).not.toBe(c);
        expect(a).toMatch(/^cities\|sha1\|[0-9a-f]{40}$/);
    });
});
