import { formatNoteTimestamp, NOTE_TIMESTAMP_PATTERN } from '../dateHelpers.js';

describe('formatNoteTimestamp', () => {
    it('zero-pads every component', () => {
        // Local-time constructor, so the result does not depend on the machine timezone
        expect(formatNoteTimestamp(new Date(2026, 0, 5, 9, 7, 3))).toBe('2026-01-05 09:07:03');
    });

    it('uses a 24-hour clock', () => {
        expect(formatNoteTimestamp(new Date(2025, 11, 31, 23, 59, 59))).toBe('2025-12-31 23:59:59');
    });

    it('produces strings matching NOTE_TIMESTAMP_PATTERN', () => {
        expect(NOTE_TIMESTAMP_PATTERN.test(formatNoteTimestamp(new Date()))).toBe(true);
        expect(NOTE_TIMESTAMP_PATTERN.test('2026-01-05T09:07:03Z')).toBe(false);
    });
});
