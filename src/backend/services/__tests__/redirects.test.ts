/**
 * Unit tests for the same-origin redirect check used by the login `next` parameter.
 */

import { isSafeRedirectTarget } from '../redirects';

const HOST_URL = 'http://localhost:5000/';

describe('isSafeRedirectTarget', () => {
    describe('same-origin targets', () => {
        it.each(['/', '/?tab=all', 'entries', 'http://localhost:5000/', 'https://localhost:5000/history'])(
            'should accept %s',
            (target) => {
                expect(isSafeRedirectTarget(target, HOST_URL)).toBe(true);
            }
        );
    });

    describe('foreign targets', () => {
        it.each([
            'https://evil.example/',
            'http://evil.example/login',
            '//evil.example/path',
            '/\\evil.example',
            'http://localhost:5001/',
            'javascript:alert(1)',
            'ftp://localhost:5000/file',
        ])('should reject %s', (target) => {
            expect(isSafeRedirectTarget(target, HOST_URL)).toBe(false);
        });
    });

    it('should reject everything when the host URL cannot be parsed', () => {
        expect(isSafeRedirectTarget('/', 'not a url')).toBe(false);
    });
});
