import { SessionContext } from '../../../../src/infrastructure/http/SessionContext';
import { UnexpectedPageStructureError } from '../../../../src/domain/errors/ReviewErrors';

describe('SessionContext', () => {
    it('should keep cookies from Set-Cookie headers and send them back', () => {
        const session = new SessionContext();

        session.absorb(['PHPSESSID=abc123; path=/; HttpOnly', 'lang=en; Secure']);

        expect(session.getCookie('PHPSESSID')).toBe('abc123');
        expect(session.headers({ Referer: 'https://example.test/' })).toEqual({
            Referer: 'https://example.test/',
            Cookie: 'PHPSESSID=abc123; lang=en',
        });
    });

    it('should accept a single header value and drop cleared cookies', () => {
        const session = new SessionContext();
        session.absorb('token=one');
        session.absorb('token=; expires=Thu, 01 Jan 1970 00:00:00 GMT');

        expect(session.getCookie('token')).toBeUndefined();
        expect(session.headers()).toEqual({});
    });

    it('should ignore malformed or missing headers', () => {
        const session = new SessionContext();
        session.absorb(undefined);
        session.absorb(['novalue', '=orphan']);

        expect(session.cookieHeader()).toBe('');
    });

    it('should not share state between instances', () => {
        const first = new SessionContext();
        first.absorb('id=1');
        first.setToken('__VIEWSTATE', 'state');

        const second = new SessionContext();

        expect(second.cookieHeader()).toBe('');
        expect(() => second.requireToken('__VIEWSTATE')).toThrow(UnexpectedPageStructureError);
    });

    it('should return tokens that were set and ignore undefined ones', () => {
        const session = new SessionContext();
        session.setToken('__EVENTVALIDATION', 'ev');
        session.setToken('__VIEWSTATE', undefined);

        expect(session.requireToken('__EVENTVALIDATION')).toBe('ev');
        expect(() => session.requireToken('__VIEWSTATE')).toThrow('unexpected page structure (missing __VIEWSTATE)');
    });
});
