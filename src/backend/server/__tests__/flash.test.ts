/**
 * Flash cookie decoding tests
 */

import { parseFlashCookie } from '../flash';

describe('parseFlashCookie', () => {
    it('should decode a JSON list of messages', () => {
        const raw = JSON.stringify([
            { category: 'success', message: 'Entry saved successfully.' },
            { category: 'error', message: 'Username already exists.' },
        ]);

        expect(parseFlashCookie(raw)).toEqual([
            { category: 'success', message: 'Entry saved successfully.' },
            { category: 'error', message: 'Username already exists.' },
        ]);
    });

    it('should ignore a cookie with a bad signature', () => {
        expect(parseFlashCookie(false)).toEqual([]);
    });

    it('should ignore a missing cookie', () => {
        expect(parseFlashCookie(undefined)).toEqual([]);
    });

    it('should ignore values that are not JSON', () => {
        expect(parseFlashCookie('{not json')).toEqual([]);
    });

    it('should ignore messages with an unknown category', () => {
        expect(parseFlashCookie(JSON.stringify([{ category: 'info', message: 'hello' }]))).toEqual([]);
    });
});
