export { formatNoteTimestamp, NOTE_TIMESTAMP_PATTERN } from './dateHelpers.js';
