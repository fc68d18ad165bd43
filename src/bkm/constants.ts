/**
 * Bookmark-view (`.bkm`) format constants.
 *
 * These values define the "wire format" of sidecar files:
 * - The two mandatory header keys, in the order they must appear.
 * - The suffix appended to a document path to locate its sidecar.
 */
export const BKM_FILE_SUFFIX = '.bkm';

export const FILE_HEADER_KEY = 'file';
export const TITLE_HEADER_KEY = 'title';

/**
 * View title written on save, regardless of the title that was parsed.
 */
export const DEFAULT_VIEW_TITLE = 'default view';

/**
 * One indentation level is exactly this many leading spaces.
 */
export const INDENT_WIDTH = 2;
